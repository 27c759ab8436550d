/**
 * Iraq. OCR of the given-name line often runs on into the surname.
 */
import { getValue, withField } from '../../ocr/universal-record';
import type { CountryRule } from '../rule-types';

const IRQ: CountryRule = {
  countryCode: 'IRQ',
  countryName: 'Iraq',
  apply(record) {
    const surname = getValue(record, 'surname');
    const name = getValue(record, 'name');
    if (!surname || !name.endsWith(surname)) return record;
    return withField(record, 'name', name.slice(0, -surname.length).trim());
  },
};

export default IRQ;

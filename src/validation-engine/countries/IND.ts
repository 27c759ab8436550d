/**
 * India. The family name is printed in the father's-name slot, so the printed
 * surname moves to the middle name. Only the mother's first name is kept.
 */
import { surnameFromFatherName, truncateDocumentNumber } from '../helpers';
import { getConfidence, getValue, withField } from '../../ocr/universal-record';
import type { CountryRule } from '../rule-types';

const IND: CountryRule = {
  countryCode: 'IND',
  countryName: 'India',
  apply(record) {
    let next = truncateDocumentNumber(record);

    const motherName = getValue(next, 'motherName');
    if (motherName) {
      const firstName = motherName.split(' ')[0] ?? '';
      next = withField(next, 'motherName', firstName, getConfidence(next, 'motherName'));
    }

    return surnameFromFatherName(next);
  },
};

export default IND;

/**
 * Myanmar. Names are printed as a single line; the last word is taken as the
 * surname and the rest as the given name.
 */
import { clearField, getConfidence, getValue, withField } from '../../ocr/universal-record';
import type { UniversalRecord } from '../../types/passport';
import type { CountryRule } from '../rule-types';

function splitFullName(record: UniversalRecord, fullName: string): UniversalRecord | undefined {
  const words = fullName.split(' ').filter(Boolean);
  if (words.length < 2) return undefined;
  const surname = words[words.length - 1] ?? '';
  const next = withField(record, 'surname', surname, getConfidence(record, 'surname'));
  return withField(next, 'name', words.slice(0, -1).join(' '), getConfidence(record, 'name'));
}

const MMR: CountryRule = {
  countryCode: 'MMR',
  countryName: 'Myanmar',
  apply(record) {
    const next = clearField(record, 'middleName');
    // a single-word surname is taken as already correct
    const surname = getValue(next, 'surname');
    const source = surname || getValue(next, 'name');
    return splitFullName(next, source) ?? next;
  },
};

export default MMR;

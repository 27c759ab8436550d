/**
 * Nepal. Passports are issued by the MOFA Department of Passports and carry
 * no middle or parents' names.
 */
import { clearFields, correctOcrDigits, setCertain, truncateDocumentNumber } from '../helpers';
import { matchesAtLeast } from '../../services/matching/fuzzy';
import { getValue } from '../../ocr/universal-record';
import type { CountryRule } from '../rule-types';

const AUTHORITY = 'MOFA DEPARTMENT OF PASSPORTS';
const AUTHORITY_MATCH_THRESHOLD = 80;

const NPL: CountryRule = {
  countryCode: 'NPL',
  countryName: 'Nepal',
  apply(record, ctx) {
    let next = record;
    if (matchesAtLeast(getValue(next, 'placeOfIssue'), AUTHORITY, AUTHORITY_MATCH_THRESHOLD, ctx.scorer)) {
      next = setCertain(next, { placeOfIssue: 'MOFA', countryOfIssue: 'NEPAL' });
    }
    next = truncateDocumentNumber(next, (number) => correctOcrDigits(number, 2, 9));
    return clearFields(next, ['middleName', 'motherName', 'fatherName']);
  },
};

export default NPL;

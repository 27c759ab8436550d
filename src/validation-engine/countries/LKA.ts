/**
 * Sri Lanka. The issuing authority reads "AUTHORITY COLOMBO".
 */
import { clearFields, setCertain, truncateDocumentNumber } from '../helpers';
import { matchesAtLeast } from '../../services/matching/fuzzy';
import { getValue } from '../../ocr/universal-record';
import type { CountryRule } from '../rule-types';

const AUTHORITY = 'AUTHORITY COLOMBO';
const AUTHORITY_MATCH_THRESHOLD = 90;

const LKA: CountryRule = {
  countryCode: 'LKA',
  countryName: 'Sri Lanka',
  apply(record, ctx) {
    let next = record;
    if (matchesAtLeast(getValue(next, 'placeOfIssue'), AUTHORITY, AUTHORITY_MATCH_THRESHOLD, ctx.scorer)) {
      next = setCertain(next, { placeOfIssue: 'COLOMBO', countryOfIssue: 'SRI LANKA' });
    }
    next = truncateDocumentNumber(next);
    return clearFields(next, ['middleName', 'motherName', 'fatherName']);
  },
};

export default LKA;

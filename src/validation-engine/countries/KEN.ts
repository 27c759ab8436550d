/**
 * Kenya. Numbers are AK, BK or CK followed by seven digits. The issuing
 * authority is printed in one of two fixed forms.
 */
import {
  BAD_DIGITS,
  BAD_PREFIX,
  DOCUMENT_NUMBER_LENGTH,
  TOO_SHORT,
  TRUNCATED,
  VALID,
  clearFields,
  correctOcrDigits,
  scoreDocumentNumber,
  setCertain,
} from '../helpers';
import { matchesAtLeast } from '../../services/matching/fuzzy';
import { getValue, withField } from '../../ocr/universal-record';
import type { CountryRule, NumberValidation } from '../rule-types';

const PREFIXES = ['AK', 'BK', 'CK'];
const AUTHORITIES = ['GOVERNMENT OF KENYA', 'REGISTRAR GENERAL HRE'];
const AUTHORITY_MATCH_THRESHOLD = 90;

export function validateKenyaNumber(raw: string): NumberValidation {
  if (raw.length < DOCUMENT_NUMBER_LENGTH) return [raw, TOO_SHORT];
  if (raw.length > DOCUMENT_NUMBER_LENGTH) return [raw.slice(0, DOCUMENT_NUMBER_LENGTH), TRUNCATED];
  if (!PREFIXES.some((prefix) => raw.startsWith(prefix))) return [raw, BAD_PREFIX];

  // the final digit is left uncorrected
  const number = correctOcrDigits(raw, 2, 8);
  if (!/^\d+$/.test(number.slice(2))) return [number, BAD_DIGITS];
  return [number, VALID];
}

const KEN: CountryRule = {
  countryCode: 'KEN',
  countryName: 'Kenya',
  apply(record, ctx) {
    let next = scoreDocumentNumber(record, validateKenyaNumber);

    const placeOfIssue = getValue(next, 'placeOfIssue');
    if (!placeOfIssue) {
      next = withField(next, 'placeOfIssue', '', 0);
    } else {
      const authority = AUTHORITIES.find((canonical) =>
        matchesAtLeast(placeOfIssue, canonical, AUTHORITY_MATCH_THRESHOLD, ctx.scorer)
      );
      if (authority) next = withField(next, 'placeOfIssue', authority, 1.0);
    }

    next = setCertain(next, { countryOfIssue: 'KENYA' });
    return clearFields(next, ['motherName', 'fatherName', 'middleName']);
  },
};

export default KEN;

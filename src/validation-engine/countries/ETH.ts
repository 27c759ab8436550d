/**
 * Ethiopia. Numbers are EP or EQ followed by seven digits; the issuing
 * authority is always Ethiopia and parents' names are not printed.
 */
import {
  BAD_DIGITS,
  BAD_PREFIX,
  DOCUMENT_NUMBER_LENGTH,
  TOO_SHORT,
  VALID,
  clearFields,
  correctOcrDigits,
  scoreDocumentNumber,
  setCertain,
} from '../helpers';
import type { CountryRule, NumberValidation } from '../rule-types';

const PREFIXES = ['EQ', 'EP'];

export function validateEthiopiaNumber(raw: string): NumberValidation {
  if (raw.length < DOCUMENT_NUMBER_LENGTH) return [raw, TOO_SHORT];
  if (!PREFIXES.some((prefix) => raw.startsWith(prefix))) return [raw, BAD_PREFIX];

  const number = correctOcrDigits(raw, 2, 9);
  if (!/^\d+$/.test(number.slice(2))) return [number, BAD_DIGITS];
  return [number, VALID];
}

const ETH: CountryRule = {
  countryCode: 'ETH',
  countryName: 'Ethiopia',
  apply(record) {
    let next = scoreDocumentNumber(record, validateEthiopiaNumber);
    next = setCertain(next, { placeOfIssue: 'ETHIOPIA', countryOfIssue: 'ETHIOPIA' });
    return clearFields(next, ['motherName', 'fatherName']);
  },
};

export default ETH;

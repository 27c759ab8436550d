/**
 * Philippines. Passport numbers are a letter, seven digits and a trailing
 * series letter A, B or C; OCR tends to read that letter as 8 or 0.
 */
import {
  CORRECTED,
  DOCUMENT_NUMBER_LENGTH,
  TOO_SHORT,
  TRUNCATED,
  VALID,
  clearFields,
  correctOcrDigits,
  scoreDocumentNumber,
} from '../helpers';
import type { CountryRule, NumberValidation } from '../rule-types';

const SERIES_LETTERS = ['A', 'B', 'C'];
const SERIES_FIXES: Record<string, string> = { '8': 'B', '0': 'C' };

export function validatePhilippinesNumber(raw: string): NumberValidation {
  if (raw.length < DOCUMENT_NUMBER_LENGTH) return [raw, TOO_SHORT];
  if (raw.length > DOCUMENT_NUMBER_LENGTH) return [raw.slice(0, DOCUMENT_NUMBER_LENGTH), TRUNCATED];

  const number = correctOcrDigits(raw, 1, 8);
  const last = number.charAt(8);
  if (SERIES_LETTERS.includes(last)) return [number, VALID];

  const fix = SERIES_FIXES[last];
  if (fix) return [number.slice(0, 8) + fix, CORRECTED];

  return [number, TOO_SHORT];
}

const PHL: CountryRule = {
  countryCode: 'PHL',
  countryName: 'Philippines',
  apply(record) {
    const next = scoreDocumentNumber(record, validatePhilippinesNumber);
    return clearFields(next, ['motherName', 'fatherName']);
  },
};

export default PHL;

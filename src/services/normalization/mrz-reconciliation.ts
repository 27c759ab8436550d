import { documentNumberFromMrz } from '../validation/mrz-checksum';
import { getConfidence, getValue, withField } from '../../ocr/universal-record';
import type { UniversalRecord } from '../../types/passport';

/**
 * Takes the document number from MRZ line 2 when its check digit verifies and
 * it disagrees with the resolved number. The MRZ line's confidence comes along.
 */
export function recoverDocumentNumber(record: UniversalRecord): UniversalRecord {
  const fromMrz = documentNumberFromMrz(getValue(record, 'mrzLine2'));
  if (!fromMrz || fromMrz === getValue(record, 'number')) return record;
  return withField(record, 'number', fromMrz, getConfidence(record, 'mrzLine2'));
}

/**
 * Drops an issuing-country code that OCR glued to the front of the surname.
 * With an MRZ line 1 to compare against, a surname that really begins with the
 * code shows up as the code twice in a row (P<KENKENNEDY) and is left alone.
 * Without one, only a code followed by whitespace is stripped.
 */
export function stripSurnameCountryPrefix(record: UniversalRecord): UniversalRecord {
  const code = getValue(record, 'country');
  const surname = getValue(record, 'surname');
  if (!/^[A-Z]{3}$/.test(code) || !surname.toUpperCase().startsWith(code)) return record;

  const mrzLine1 = getValue(record, 'mrzLine1');
  if (mrzLine1) {
    if (mrzLine1.includes(code + code)) return record;
  } else if (!/^\s/.test(surname.slice(3))) {
    return record;
  }

  return withField(record, 'surname', surname.slice(3).trim());
}

import { transliterate } from 'transliteration';
import { getValue, hasField, withField } from '../../ocr/universal-record';
import type { UniversalField, UniversalRecord } from '../../types/passport';

export const STRING_FIELDS: readonly UniversalField[] = [
  'number',
  'country',
  'name',
  'surname',
  'middleName',
  'gender',
  'placeOfBirth',
  'motherName',
  'fatherName',
  'spouseName',
  'placeOfIssue',
  'countryOfIssue',
];

const NULL_TOKENS = new Set(['NAN', 'NONE', 'NULL', 'N/A', 'NA']);

/**
 * Upper-cases, maps placeholder tokens to '', transliterates to ASCII (so
 * Cyrillic, Greek and accented Latin names keep their letters), turns anything
 * but letters, digits and whitespace into a space and collapses runs of
 * whitespace.
 */
export function cleanString(value: string): string {
  const upper = value.trim().toUpperCase();
  if (NULL_TOKENS.has(upper)) return '';
  return transliterate(upper.normalize('NFC'))
    .toUpperCase()
    .replace(/[^A-Z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Cleans every present text field. Confidence is never touched. */
export function cleanStringFields(record: UniversalRecord): UniversalRecord {
  let next = record;
  for (const field of STRING_FIELDS) {
    if (!hasField(next, field)) continue;
    next = withField(next, field, cleanString(getValue(next, field)));
  }
  return next;
}

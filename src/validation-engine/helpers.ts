import { combineConfidence } from '../ocr/probability';
import { clearField, getConfidence, getValue, withField } from '../ocr/universal-record';
import { UNIVERSAL_FIELDS } from '../types/passport';
import type { UniversalField, UniversalRecord } from '../types/passport';
import type { CountryRule, NumberValidation } from './rule-types';

/** Validation scores shared by the document-number checks. */
export const VALID = 1.0;
export const CORRECTED = 0.8;
export const TRUNCATED = 0.5;
export const BAD_DIGITS = 0.4;
export const TOO_SHORT = 0.3;
export const BAD_PREFIX = 0.2;

export const DOCUMENT_NUMBER_LENGTH = 9;
const TRUNCATION_FLOOR = 0.7;
const TRUNCATION_FACTOR = 0.8;

// Letters OCR commonly reads in place of digits.
const LETTER_TO_DIGIT: Record<string, string> = {
  O: '0',
  I: '1',
  S: '5',
  B: '8',
  G: '6',
  Z: '2',
  D: '0',
  l: '1',
  o: '0',
  s: '5',
  g: '6',
  z: '2',
};

export function correctOcrCharacters(text: string): string {
  return Array.from(text, (ch) => LETTER_TO_DIGIT[ch] ?? ch).join('');
}

/** Applies the letter → digit corrections to `text[start, end)` only. */
export function correctOcrDigits(text: string, start: number, end: number): string {
  if (!text || start >= text.length || end > text.length || start >= end) return text;
  return text.slice(0, start) + correctOcrCharacters(text.slice(start, end)) + text.slice(end);
}

/** Runs a number check and folds its score into the extraction confidence. */
export function scoreDocumentNumber(
  record: UniversalRecord,
  validate: (number: string) => NumberValidation
): UniversalRecord {
  const raw = getValue(record, 'number');
  const [number, validation]: NumberValidation = raw ? validate(raw.trim().toUpperCase()) : ['', 0];
  return withField(record, 'number', number, combineConfidence(getConfidence(record, 'number'), validation));
}

/**
 * Cuts the document number to nine characters, after an optional correction.
 * An untouched number keeps its confidence; a changed one scores
 * max(0.7, 0.8 × original), capped at the original.
 */
export function truncateDocumentNumber(
  record: UniversalRecord,
  correct: (number: string) => string = (n) => n
): UniversalRecord {
  const number = getValue(record, 'number');
  const processed = correct(number.slice(0, DOCUMENT_NUMBER_LENGTH));
  const original = getConfidence(record, 'number');
  if (processed === number) return withField(record, 'number', processed, original);
  const validation = Math.max(TRUNCATION_FLOOR, original * TRUNCATION_FACTOR);
  return withField(record, 'number', processed, combineConfidence(original, validation));
}

export function clearFields(record: UniversalRecord, fields: readonly UniversalField[]): UniversalRecord {
  return fields.reduce((current, field) => clearField(current, field), record);
}

/** Sets fields whose value is fixed for a country's passports, at full confidence. */
export function setCertain(
  record: UniversalRecord,
  values: Partial<Record<UniversalField, string>>
): UniversalRecord {
  let next = record;
  for (const field of UNIVERSAL_FIELDS) {
    const value = values[field];
    if (value !== undefined) next = withField(next, field, value, 1.0);
  }
  return next;
}

/**
 * Layouts that print the family name in the father's-name slot: the printed
 * surname moves to the middle name and the father's name becomes the surname.
 * Each destination carries its source field's confidence unchanged.
 */
export function surnameFromFatherName(record: UniversalRecord): UniversalRecord {
  const surname = getValue(record, 'surname');
  const surnameConfidence = getConfidence(record, 'surname');
  const fatherName = getValue(record, 'fatherName');
  const fatherConfidence = getConfidence(record, 'fatherName');
  const next = withField(record, 'middleName', surname, surnameConfidence);
  return withField(next, 'surname', fatherName, fatherConfidence);
}

/** A rule for countries whose passports always name the same issuing authority. */
export function fixedIssuerRule(
  countryCode: string,
  countryName: string,
  values: Partial<Record<UniversalField, string>>
): CountryRule {
  return {
    countryCode,
    countryName,
    apply: (record) => setCertain(record, values),
  };
}

import { addYears, format, isAfter, isBefore, isValid, startOfDay, subYears } from 'date-fns';
import { getConfidence, getValue, hasField, withField } from '../../ocr/universal-record';
import type { DateField, UniversalRecord } from '../../types/passport';
import type { PostprocessContext } from '../context';

export const DATE_FIELDS: readonly DateField[] = ['birthDate', 'issueDate', 'expiryDate'];

export const DATE_OUTPUT_FORMAT = 'dd/MM/yyyy';
export const UNPARSED_DATE_PENALTY = 0.5;
export const EXPIRY_WINDOW_YEARS = 25;

interface DateParts {
  day: number;
  month: number;
  year: number;
  twoDigitYear: boolean;
}

// Keyed by 4- or 3-letter prefix; English plus the French and Spanish forms
// printed beside it on bilingual passports.
const MONTH_PREFIXES: Record<string, number> = {
  JAN: 1, FEB: 2, MAR: 3, APR: 4, MAY: 5, JUN: 6,
  JUL: 7, AUG: 8, SEP: 9, OCT: 10, NOV: 11, DEC: 12,
  FEV: 2, AVR: 4, MAI: 5, JUIN: 6, JUIL: 7, AOU: 8,
  ENE: 1, ABR: 4, AGO: 8, DIC: 12,
};

function monthFromToken(token: string | undefined): number | undefined {
  if (!token || token.length < 3) return undefined;
  return MONTH_PREFIXES[token.slice(0, 4)] ?? MONTH_PREFIXES[token.slice(0, 3)];
}

function toInt(value: string | undefined): number {
  return value === undefined ? NaN : parseInt(value, 10);
}

function parts(day: string | undefined, month: number | undefined, year: string | undefined): DateParts | null {
  if (month === undefined || year === undefined) return null;
  return { day: toInt(day), month, year: toInt(year), twoDigitYear: year.length === 2 };
}

type DateMatcher = (input: string) => DateParts | null;

const MATCHERS: DateMatcher[] = [
  // YYMMDD, as printed in the MRZ
  (s) => {
    const m = s.match(/^(\d{2})(\d{2})(\d{2})$/);
    return m ? parts(m[3], toInt(m[2]), m[1]) : null;
  },
  // DDMMYYYY
  (s) => {
    const m = s.match(/^(\d{2})(\d{2})(\d{4})$/);
    return m ? parts(m[1], toInt(m[2]), m[3]) : null;
  },
  // YYYY-MM-DD
  (s) => {
    const m = s.match(/^(\d{4})[/\-. ](\d{1,2})[/\-. ](\d{1,2})$/);
    return m ? parts(m[3], toInt(m[2]), m[1]) : null;
  },
  // DD/MM/YY(YY), day first
  (s) => {
    const m = s.match(/^(\d{1,2})[/\-. ](\d{1,2})[/\-. ](\d{4}|\d{2})$/);
    return m ? parts(m[1], toInt(m[2]), m[3]) : null;
  },
  // 18 MAR 74, 18MAR1974, 18 MAR/MARS 74
  (s) => {
    const m = s.match(/^(\d{1,2})[\s/\-.]*([A-Z]+)(?:\s*\/\s*|\s+)?([A-Z]*)[\s/\-.]*(\d{4}|\d{2})$/);
    return m ? parts(m[1], monthFromToken(m[2]) ?? monthFromToken(m[3]), m[4]) : null;
  },
  // MARCH 18, 1974
  (s) => {
    const m = s.match(/^([A-Z]+)[\s/\-.]+(\d{1,2}),?[\s/\-.]+(\d{4})$/);
    return m ? parts(m[2], monthFromToken(m[1]), m[3]) : null;
  },
];

function expandYear(p: DateParts, field: DateField, now: Date): number {
  if (!p.twoDigitYear) return p.year;
  if (field === 'expiryDate') return 2000 + p.year;
  const pivot = now.getFullYear() % 100;
  return p.year > pivot ? 1900 + p.year : 2000 + p.year;
}

function toDate(day: number, month: number, year: number): Date | null {
  if (year < 1000 || month < 1 || month > 12 || day < 1) return null;
  const date = new Date(year, month - 1, day);
  if (!isValid(date) || date.getDate() !== day || date.getMonth() !== month - 1) return null;
  return date;
}

/**
 * Parses a free-form passport date into `dd/MM/yyyy`. Returns undefined when
 * no known form matches.
 *
 * Birth and issue dates never lie in the future: two-digit years pivot on the
 * current year, and any future date moves back a century. A two-digit expiry
 * year starts in the 2000s; a date already past moves forward a century and a
 * date more than 25 years out moves back one.
 */
export function standardizeDate(raw: string, field: DateField, now: Date): string | undefined {
  const input = raw
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .replace(/\s+/g, ' ')
    .trim();
  if (!input) return undefined;

  let found: DateParts | null = null;
  for (const matcher of MATCHERS) {
    found = matcher(input);
    if (found) break;
  }
  if (!found) return undefined;

  let date = toDate(found.day, found.month, expandYear(found, field, now));
  if (!date) return undefined;

  const today = startOfDay(now);
  if (field !== 'expiryDate') {
    if (isAfter(date, today)) date = subYears(date, 100);
  } else if (found.twoDigitYear) {
    // An expired date tries the next century; anything past the window goes
    // back one, so an expired passport stays expired rather than moving ahead.
    const limit = addYears(today, EXPIRY_WINDOW_YEARS);
    if (isBefore(date, today)) date = addYears(date, 100);
    if (isAfter(date, limit)) date = subYears(date, 100);
  }

  return format(date, DATE_OUTPUT_FORMAT);
}

/** Rewrites one date field; an unparseable value stays as-is at half confidence. */
export function standardizeDateField(
  record: UniversalRecord,
  field: DateField,
  ctx: PostprocessContext
): UniversalRecord {
  if (!hasField(record, field)) return record;
  const raw = getValue(record, field);
  const standardized = standardizeDate(raw, field, ctx.now);
  if (standardized !== undefined) {
    return withField(record, field, standardized);
  }
  ctx.logger.debug({ documentRef: ctx.documentRef, field, value: raw }, 'Unparseable date');
  return withField(record, field, raw, getConfidence(record, field) * UNPARSED_DATE_PENALTY);
}

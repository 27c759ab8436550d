import { getConfidence, getValue, hasField, withConfidence, withField } from '../../ocr/universal-record';
import type { UniversalRecord } from '../../types/passport';
import type { PostprocessContext } from '../context';

export const UNKNOWN_COUNTRY_PENALTY = 0.5;

/**
 * Accepts a known alpha-3 code, maps a country name to its code, or keeps the
 * value and halves its confidence.
 */
export function validateCountry(record: UniversalRecord, ctx: PostprocessContext): UniversalRecord {
  if (!hasField(record, 'country')) return record;

  const raw = getValue(record, 'country');
  const candidate = raw.replace(/\s+/g, ' ').trim().toUpperCase();

  if (ctx.tables.countryCodes.has(candidate)) {
    return withField(record, 'country', candidate);
  }

  const code = ctx.tables.countryCodeByName.get(candidate);
  if (code) {
    return withField(record, 'country', code);
  }

  ctx.logger.debug({ documentRef: ctx.documentRef, country: raw }, 'Unrecognized country');
  return withConfidence(record, 'country', getConfidence(record, 'country') * UNKNOWN_COUNTRY_PENALTY);
}

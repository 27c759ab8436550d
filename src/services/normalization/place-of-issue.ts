import { bestMatch } from '../matching/fuzzy';
import { getConfidence, getValue, withField } from '../../ocr/universal-record';
import type { UniversalRecord } from '../../types/passport';
import type { PostprocessContext } from '../context';

export const CITY_MATCH_THRESHOLD = 90;
export const COUNTRY_NAME_MATCH_THRESHOLD = 90;

/**
 * Fuzzy-matches the place of issue against the city table. A close enough
 * match sets the country of issue, which inherits the place of issue's
 * confidence as-is. Ugandan passports also get the matched city name.
 */
export function deriveCountryOfIssue(record: UniversalRecord, ctx: PostprocessContext): UniversalRecord {
  const place = getValue(record, 'placeOfIssue').trim().toUpperCase();
  if (!place) return record;

  const match = bestMatch(place, ctx.tables.cities, ([city]) => city, ctx.scorer);
  if (!match || match.score < CITY_MATCH_THRESHOLD) return record;

  const [city, country] = match.item;
  let next = withField(record, 'countryOfIssue', country, getConfidence(record, 'placeOfIssue'));
  if (getValue(record, 'country') === 'UGA') {
    next = withField(next, 'placeOfIssue', city);
  }
  return next;
}

/**
 * Rewrites the country of issue to a canonical country name: a known code maps
 * to its name, a known name stays, anything else takes the closest name when
 * it scores high enough.
 */
export function canonicalizeCountryOfIssue(
  record: UniversalRecord,
  ctx: PostprocessContext
): UniversalRecord {
  const value = getValue(record, 'countryOfIssue').replace(/\s+/g, ' ').trim().toUpperCase();
  if (!value) return record;

  const byCode = ctx.tables.countryNameByCode.get(value);
  if (byCode) return withField(record, 'countryOfIssue', byCode);
  if (ctx.tables.countryCodeByName.has(value)) return withField(record, 'countryOfIssue', value);

  const match = bestMatch(value, ctx.tables.countryNames, (name) => name, ctx.scorer);
  if (match && match.score >= COUNTRY_NAME_MATCH_THRESHOLD) {
    return withField(record, 'countryOfIssue', match.item);
  }
  return record;
}

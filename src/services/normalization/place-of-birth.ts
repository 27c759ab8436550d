import { cleanString } from './string-cleaning';
import { getConfidence, getValue, hasField, withField } from '../../ocr/universal-record';
import type { UniversalRecord } from '../../types/passport';
import type { PostprocessContext } from '../context';

export const KNOWN_BIRTH_PLACE_BOOST = 1.2;

/**
 * Strips a trailing country code or country name matching the document's
 * country, and boosts confidence when what is left is a known place of birth.
 * A place of birth that is only the code becomes the country name.
 */
export function cleanPlaceOfBirth(record: UniversalRecord, ctx: PostprocessContext): UniversalRecord {
  if (!hasField(record, 'placeOfBirth')) return record;

  const code = getValue(record, 'country');
  const countryName = ctx.tables.countryNameByCode.get(code);
  let place = getValue(record, 'placeOfBirth').replace(/\s+/g, ' ').trim().toUpperCase();

  if (/^[A-Z]{3}$/.test(code)) {
    if (place === code && countryName) {
      place = countryName;
    } else if (place.endsWith(` ${code}`)) {
      place = place.slice(0, -(code.length + 1)).trim();
    } else if (countryName && place.endsWith(` ${countryName}`)) {
      place = place.slice(0, -(countryName.length + 1)).trim();
    }
  }

  const confidence = getConfidence(record, 'placeOfBirth');
  return withField(record, 'placeOfBirth', place, boostKnownBirthPlace(place, confidence, ctx));
}

/** Raises a known place of birth's confidence by the boost factor, capped at 1. */
export function boostKnownBirthPlace(place: string, confidence: number, ctx: PostprocessContext): number {
  if (!ctx.tables.birthPlaces.has(cleanString(place))) return confidence;
  return Math.min(1, confidence * KNOWN_BIRTH_PLACE_BOOST);
}

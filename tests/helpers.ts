import { vi } from 'vitest';
import { createReferenceTables } from '../src/ocr/reference-tables';
import { partialRatioScorer } from '../src/services/matching/fuzzy';
import { UNIVERSAL_FIELDS } from '../src/types/passport';
import type { PostprocessContext } from '../src/services/context';
import type { UniversalField, UniversalRecord } from '../src/types/passport';

export const TEST_NOW = new Date(2026, 9, 19);

export const testTables = createReferenceTables({
  countryCodes: {
    countries: [
      { name: 'Kenya', code: 'KEN' },
      { name: 'Kuwait', code: 'KWT' },
      { name: 'Philippines', code: 'PHL' },
      { name: 'Uganda', code: 'UGA' },
      { name: 'India', code: 'IND' },
      { name: 'United Kingdom', code: 'GBR' },
      { name: 'Great Britain', code: 'GBR' },
    ],
  },
  cityCountry: {
    cities: [
      { city: 'Nairobi', country: 'Kenya' },
      { city: 'Kuwait', country: 'Kuwait' },
      { city: 'Kampala', country: 'Uganda' },
      { city: 'Manila', country: 'Philippines' },
    ],
  },
  birthPlaces: { places: ['Nairobi', 'Manila', 'Lahore', 'Casablanca'] },
});

export function createTestLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function createTestContext(overrides: Partial<PostprocessContext> = {}): PostprocessContext {
  return {
    documentRef: 'doc-test',
    tables: testTables,
    scorer: partialRatioScorer,
    now: TEST_NOW,
    logger: createTestLogger(),
    ...overrides,
  };
}

/** Builds a record from `field: [value, confidence]` pairs. */
export function makeRecord(entries: Partial<Record<UniversalField, [string, number]>>): UniversalRecord {
  const record: UniversalRecord = { fields: {}, confidences: {} };
  for (const field of UNIVERSAL_FIELDS) {
    const entry = entries[field];
    if (!entry) continue;
    record.fields[field] = entry[0];
    record.confidences[field] = entry[1];
  }
  return record;
}

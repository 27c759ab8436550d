import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { config } from '../config';

/**
 * Process-wide lookup data: country names and codes, city → country, and the
 * set of known places of birth. Loaded once on first access. The object and its
 * arrays are frozen; the maps and sets are read-only through their types only.
 */
export interface ReferenceTables {
  /** Upper-cased country name → alpha-3 code. */
  readonly countryCodeByName: ReadonlyMap<string, string>;
  /** Alpha-3 code → canonical upper-cased country name (first listed name wins). */
  readonly countryNameByCode: ReadonlyMap<string, string>;
  readonly countryCodes: ReadonlySet<string>;
  /** Canonical upper-cased country names, in file order. */
  readonly countryNames: readonly string[];
  /** Upper-cased city → upper-cased country, in file order. */
  readonly cities: readonly (readonly [city: string, country: string])[];
  readonly birthPlaces: ReadonlySet<string>;
}

export class ReferenceDataError extends Error {
  constructor(message: string, public readonly file: string) {
    super(message);
    this.name = 'ReferenceDataError';
  }
}

const countryCodesSchema = z.object({
  countries: z
    .array(
      z.object({
        name: z.string().min(1),
        code: z.string().regex(/^[A-Z]{3}$/),
      })
    )
    .min(1),
});

const cityCountrySchema = z.object({
  cities: z.array(
    z.object({
      city: z.string().min(1),
      country: z.string().min(1),
    })
  ),
});

const birthPlacesSchema = z.object({
  places: z.array(z.string().min(1)),
});

export type CountryCodesFile = z.infer<typeof countryCodesSchema>;
export type CityCountryFile = z.infer<typeof cityCountrySchema>;
export type BirthPlacesFile = z.infer<typeof birthPlacesSchema>;

export const REFERENCE_FILES = {
  countryCodes: 'country-codes.json',
  cityCountry: 'city-country.json',
  birthPlaces: 'birth-places.json',
} as const;

export function createReferenceTables(input: {
  countryCodes: CountryCodesFile;
  cityCountry: CityCountryFile;
  birthPlaces: BirthPlacesFile;
}): ReferenceTables {
  const countryCodeByName = new Map<string, string>();
  const countryNameByCode = new Map<string, string>();
  const countryNames: string[] = [];

  for (const { name, code } of input.countryCodes.countries) {
    const upperName = name.trim().toUpperCase();
    countryCodeByName.set(upperName, code);
    if (!countryNameByCode.has(code)) {
      countryNameByCode.set(code, upperName);
      countryNames.push(upperName);
    }
  }

  const cities = input.cityCountry.cities.map(
    ({ city, country }) =>
      Object.freeze([city.trim().toUpperCase(), country.trim().toUpperCase()] as const)
  );

  const birthPlaces = new Set(input.birthPlaces.places.map((p) => p.trim().toUpperCase()));

  return Object.freeze({
    countryCodeByName,
    countryNameByCode,
    countryCodes: new Set(countryNameByCode.keys()),
    countryNames: Object.freeze(countryNames),
    cities: Object.freeze(cities),
    birthPlaces,
  });
}

function readJsonFile<T>(dir: string, file: string, schema: z.ZodType<T>): T {
  const fullPath = path.join(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ReferenceDataError(`Cannot read reference file: ${reason}`, fullPath);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ReferenceDataError(
      `Invalid reference file: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`,
      fullPath
    );
  }
  return parsed.data;
}

export function loadReferenceTables(dir: string): ReferenceTables {
  return createReferenceTables({
    countryCodes: readJsonFile(dir, REFERENCE_FILES.countryCodes, countryCodesSchema),
    cityCountry: readJsonFile(dir, REFERENCE_FILES.cityCountry, cityCountrySchema),
    birthPlaces: readJsonFile(dir, REFERENCE_FILES.birthPlaces, birthPlacesSchema),
  });
}

let cached: ReferenceTables | undefined;

/**
 * Shared tables, loaded from `config.referenceDataDir` on first call.
 * Loading is synchronous, so two callers can never both observe the cache as
 * empty and build it twice.
 */
export function getReferenceTables(): ReferenceTables {
  if (!cached) {
    cached = loadReferenceTables(config.referenceDataDir);
  }
  return cached;
}

import type { UniversalRecord } from '../types/passport';
import type { PostprocessContext } from '../services/context';

/**
 * Country-specific passport quirks. A rule receives a frozen record and must
 * return a new one; it never writes to its input.
 */
export interface CountryRule {
  /** ISO 3166-1 alpha-3, upper case. */
  readonly countryCode: string;
  readonly countryName: string;
  apply(record: UniversalRecord, ctx: PostprocessContext): UniversalRecord;
}

/** A document-number check: the (possibly corrected) number and a 0-1 validation score. */
export type NumberValidation = [number: string, validation: number];

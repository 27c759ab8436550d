import { normalizeProbability } from './probability';
import { emptyRecord } from './universal-record';
import { UNIVERSAL_FIELDS } from '../types/passport';
import type {
  ExtractionSource,
  RawObservation,
  UniversalField,
  UniversalRecord,
} from '../types/passport';

export interface FieldCandidate {
  value: string;
  source: ExtractionSource;
  confidence: number;
}

type ResolvedFieldName = Exclude<UniversalField, 'mrzLine1' | 'mrzLine2'>;

/**
 * Raw field names the OCR engine is known to emit, per universal field.
 * Lookup is case- and whitespace-insensitive.
 */
export const FIELD_ALIASES: Record<ResolvedFieldName, string[]> = {
  number: ['document number', 'number', 'passport number', 'doc number'],
  country: ['nationality code', 'country code'],
  name: ['given names', 'given name(s)', 'first name', 'first names', 'name'],
  surname: ['surname', 'last name', 'secondary id'],
  middleName: ['middle name', 'middle names'],
  gender: ['gender', 'sex'],
  placeOfBirth: ['place of birth', 'birth place'],
  birthDate: ['date of birth', 'birth date'],
  issueDate: ['date of issue', 'issue date'],
  expiryDate: ['date of expiry', 'expiry date', 'expiration date'],
  motherName: ['mother name', "mother's name"],
  fatherName: ['father name', "father's name", 'guardian'],
  spouseName: ['spouse name', 'spouse'],
  placeOfIssue: ['issuing authority', 'issuing state', 'place of issue', 'authority', 'issuing office'],
  countryOfIssue: ['issuing state code', 'issuing country', 'issuing state name'],
};

/** Source that wins outright when it has a value. Unlisted fields prefer VISUAL. */
export const PREFERRED_SOURCE: Partial<Record<UniversalField, ExtractionSource>> = {
  number: 'MRZ',
  birthDate: 'MRZ',
  expiryDate: 'MRZ',
  // the MRZ carries no issue date
  issueDate: 'VISUAL',
};

const MRZ_BLOCK_FIELD = 'mrz strings';
const MRZ_ALPHABET = /^[A-Z0-9<]+$/;
const MIN_MRZ_LINE_LENGTH = 30;

// Ties between non-preferred sources go to the first entry.
const SOURCE_PRIORITY: readonly ExtractionSource[] = ['VISUAL', 'MRZ'];

const RESOLVED_FIELDS = UNIVERSAL_FIELDS.filter(
  (field): field is ResolvedFieldName => field !== 'mrzLine1' && field !== 'mrzLine2'
);

const ALL_ALIASES = new Set(
  RESOLVED_FIELDS.flatMap((field) => FIELD_ALIASES[field].map(normalizeFieldName))
);

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function normalizeFieldName(name: string): string {
  return normalizeWhitespace(name).toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function preferredSourceFor(field: UniversalField): ExtractionSource {
  return PREFERRED_SOURCE[field] ?? 'VISUAL';
}

/**
 * Picks one candidate for a field. A candidate from the preferred source wins
 * regardless of the other source's confidence; otherwise the most confident
 * remaining candidate wins, VISUAL before MRZ on a tie.
 */
export function resolveField(
  candidates: readonly FieldCandidate[],
  preferred: ExtractionSource
): FieldCandidate | undefined {
  const usable = candidates.filter((c) => c.value.trim().length > 0);

  let best: FieldCandidate | undefined;
  for (const candidate of usable) {
    if (candidate.source !== preferred) continue;
    if (!best || candidate.confidence > best.confidence) best = candidate;
  }
  if (best) return best;

  for (const source of SOURCE_PRIORITY) {
    if (source === preferred) continue;
    for (const candidate of usable) {
      if (candidate.source !== source) continue;
      if (!best || candidate.confidence > best.confidence) best = candidate;
    }
  }
  return best;
}

/** Groups observations by normalized raw field name, normalizing values and confidences. */
export function indexObservations(
  observations: readonly RawObservation[]
): Map<string, FieldCandidate[]> {
  const index = new Map<string, FieldCandidate[]>();
  for (const observation of observations) {
    const key = normalizeFieldName(observation.field);
    if (!key) continue;
    const value = normalizeWhitespace(observation.value ?? '');
    if (!value) continue;
    const bucket = index.get(key) ?? [];
    bucket.push({
      value,
      source: observation.source,
      confidence: normalizeProbability(observation.confidence),
    });
    index.set(key, bucket);
  }
  return index;
}

/**
 * Finds the raw field name for a universal field: an exact alias first, then a
 * raw name containing an alias as a whole word, as long as that raw name is not
 * itself an alias of some other field.
 */
function findRawKey(index: Map<string, FieldCandidate[]>, aliases: string[]): string | undefined {
  const normalized = aliases.map(normalizeFieldName);
  const exact = normalized.find((alias) => index.has(alias));
  if (exact) return exact;

  for (const key of index.keys()) {
    if (ALL_ALIASES.has(key)) continue;
    const contains = normalized.some((alias) =>
      new RegExp(`(^|\\s)${escapeRegExp(alias)}(\\s|$)`).test(key)
    );
    if (contains) return key;
  }
  return undefined;
}

/**
 * Splits an MRZ block into its two lines. Only lines that look like MRZ text
 * are kept; the two longest win, in document order when equally long.
 */
export function splitMrzBlock(block: string): [string, string] {
  const lines = block
    .split(/[\r\n]+/)
    .map((line) => normalizeWhitespace(line))
    .filter(
      (line) => line.length >= MIN_MRZ_LINE_LENGTH && line.includes('<') && MRZ_ALPHABET.test(line)
    );
  const sorted = [...lines].sort((a, b) => b.length - a.length);
  return [sorted[0] ?? '', sorted[1] ?? ''];
}

/** Builds the universal record from every observation of one document. */
export function buildUniversalRecord(observations: readonly RawObservation[]): UniversalRecord {
  const index = indexObservations(observations);
  const record = emptyRecord();

  for (const field of RESOLVED_FIELDS) {
    const key = findRawKey(index, FIELD_ALIASES[field]);
    if (!key) continue;
    const chosen = resolveField(index.get(key) ?? [], preferredSourceFor(field));
    if (!chosen) continue;
    record.fields[field] = chosen.value;
    record.confidences[field] = chosen.confidence;
  }

  const mrzBlock = resolveMrzBlock(observations);
  if (mrzBlock) {
    const [line1, line2] = splitMrzBlock(mrzBlock.value);
    if (line1) {
      record.fields.mrzLine1 = line1;
      record.confidences.mrzLine1 = mrzBlock.confidence;
    }
    if (line2) {
      record.fields.mrzLine2 = line2;
      record.confidences.mrzLine2 = mrzBlock.confidence;
    }
  }

  return record;
}

function resolveMrzBlock(observations: readonly RawObservation[]): FieldCandidate | undefined {
  // Line breaks carry meaning here, so the block bypasses indexObservations.
  const candidates: FieldCandidate[] = observations
    .filter((o) => normalizeFieldName(o.field) === MRZ_BLOCK_FIELD && (o.value ?? '').trim())
    .map((o) => ({
      value: o.value,
      source: o.source,
      confidence: normalizeProbability(o.confidence),
    }));
  return resolveField(candidates, 'MRZ');
}

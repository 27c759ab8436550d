/**
 * Converts a raw 0-100 engine confidence to the 0.0-1.0 scale.
 * Missing or non-numeric input yields 0. Out-of-range numbers are not clamped.
 */
export function normalizeProbability(raw: unknown): number {
  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (trimmed.length === 0) return 0;
    value = Number(trimmed);
  } else {
    return 0;
  }
  return Number.isFinite(value) ? value / 100 : 0;
}

/**
 * Merges an extraction confidence with a validation confidence.
 * A field that was extracted can only lose confidence here; a field with no
 * extraction signal takes the validation score as-is.
 */
export function combineConfidence(original: number, validation: number): number {
  return original > 0 ? Math.min(original, validation) : validation;
}

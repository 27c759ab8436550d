import type { UniversalField, UniversalRecord } from '../types/passport';

export function emptyRecord(): UniversalRecord {
  return { fields: {}, confidences: {} };
}

export function getValue(record: UniversalRecord, field: UniversalField): string {
  return record.fields[field] ?? '';
}

export function getConfidence(record: UniversalRecord, field: UniversalField): number {
  return record.confidences[field] ?? 0;
}

export function hasField(record: UniversalRecord, field: UniversalField): boolean {
  return record.fields[field] !== undefined;
}

/**
 * Returns a copy of the record with `field` set. When `confidence` is omitted
 * the field keeps its current confidence (0 if it had none).
 */
export function withField(
  record: UniversalRecord,
  field: UniversalField,
  value: string,
  confidence?: number
): UniversalRecord {
  return {
    fields: { ...record.fields, [field]: value },
    confidences: {
      ...record.confidences,
      [field]: confidence ?? getConfidence(record, field),
    },
  };
}

export function withConfidence(
  record: UniversalRecord,
  field: UniversalField,
  confidence: number
): UniversalRecord {
  return withField(record, field, getValue(record, field), confidence);
}

/** Clears a field the passport layout does not carry; 1.0 marks the absence as certain. */
export function clearField(record: UniversalRecord, field: UniversalField): UniversalRecord {
  return withField(record, field, '', 1.0);
}

export function freezeRecord(record: UniversalRecord): Readonly<UniversalRecord> {
  return Object.freeze({
    fields: Object.freeze({ ...record.fields }),
    confidences: Object.freeze({ ...record.confidences }),
  });
}

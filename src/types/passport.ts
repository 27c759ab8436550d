export const EXTRACTION_SOURCES = ['MRZ', 'VISUAL'] as const;

export type ExtractionSource = (typeof EXTRACTION_SOURCES)[number];

export const UNIVERSAL_FIELDS = [
  'number',
  'country',
  'name',
  'surname',
  'middleName',
  'gender',
  'placeOfBirth',
  'birthDate',
  'issueDate',
  'expiryDate',
  'motherName',
  'fatherName',
  'spouseName',
  'placeOfIssue',
  'countryOfIssue',
  'mrzLine1',
  'mrzLine2',
] as const;

export type UniversalField = (typeof UNIVERSAL_FIELDS)[number];

export type DateField = 'birthDate' | 'issueDate' | 'expiryDate';

/** One value reported by the OCR engine for one field, from one zone of the document. */
export interface RawObservation {
  field: string;
  source: ExtractionSource;
  value: string;
  /** 0-100 as emitted by the engine; anything else normalizes to 0. */
  confidence?: number | string | null;
}

export interface UniversalRecord {
  fields: Partial<Record<UniversalField, string>>;
  confidences: Partial<Record<UniversalField, number>>;
}

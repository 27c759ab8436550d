import { z } from 'zod';
import { EXTRACTION_SOURCES } from '../types/passport';

export const MAX_BATCH_DOCUMENTS = 100;

export const observationSchema = z.object({
  field: z.string(),
  source: z.enum(EXTRACTION_SOURCES),
  value: z.string(),
  confidence: z.union([z.number(), z.string()]).nullable().optional(),
});

export const postprocessSchema = z.object({
  documentRef: z.string().min(1).max(128).optional(),
  observations: z.array(observationSchema),
});

export const batchPostprocessSchema = z.object({
  documents: z.array(postprocessSchema).min(1).max(MAX_BATCH_DOCUMENTS),
});

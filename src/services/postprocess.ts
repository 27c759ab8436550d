import { v4 as uuidv4 } from 'uuid';
import { buildUniversalRecord } from '../ocr/field-resolver';
import { getValue } from '../ocr/universal-record';
import { applyCountryRules } from '../validation-engine/validation-engine';
import { cleanStringFields, runGuarded, runNormalizationStage } from './normalization';
import { createPostprocessContext } from './context';
import { createDocumentLogger } from '../utils/logger';
import type { PostprocessContext, PostprocessOptions } from './context';
import type { NormalizationPass } from './normalization';
import type { RawObservation, UniversalRecord } from '../types/passport';

const STRING_CLEANING_PASS: NormalizationPass = { name: 'string-cleaning', run: cleanStringFields };

/**
 * Runs a universal record through normalization, the issuing country's rule
 * and the final string cleaning. The input record is never modified.
 */
export function postprocessRecord(record: UniversalRecord, ctx: PostprocessContext): UniversalRecord {
  const normalized = runNormalizationStage(record, ctx);
  const countryCode = getValue(normalized, 'country');
  const ruled = applyCountryRules(normalized, countryCode, ctx);
  return runGuarded(STRING_CLEANING_PASS, ruled, ctx);
}

/** Builds and postprocesses one document from its raw OCR observations. */
export function postprocessPassport(
  observations: readonly RawObservation[],
  options: PostprocessOptions = {}
): UniversalRecord {
  const ctx = createPostprocessContext(options);
  ctx.logger.debug({ documentRef: ctx.documentRef, observations: observations.length }, 'Postprocessing passport');
  return postprocessRecord(buildUniversalRecord(observations), ctx);
}

export interface BatchDocument {
  documentRef?: string;
  observations: readonly RawObservation[];
}

export type BatchResult =
  | { documentRef: string; ok: true; record: UniversalRecord }
  | { documentRef: string; ok: false; error: string };

/** Processes documents one after another; a failure is reported per document. */
export function postprocessBatch(
  documents: readonly BatchDocument[],
  options: Omit<PostprocessOptions, 'documentRef'> = {}
): BatchResult[] {
  return documents.map((document): BatchResult => {
    const documentRef = document.documentRef ?? uuidv4();
    try {
      const record = postprocessPassport(document.observations, { ...options, documentRef });
      return { documentRef, ok: true, record };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const log = options.logger ?? createDocumentLogger(documentRef);
      log.error({ err, documentRef }, 'Passport postprocessing failed');
      return { documentRef, ok: false, error: message };
    }
  });
}

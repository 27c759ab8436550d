import type { UniversalRecord } from '../../types/passport';
import type { PostprocessContext } from '../context';

export type RecordTransform = (record: UniversalRecord, ctx: PostprocessContext) => UniversalRecord;

export interface NormalizationPass {
  name: string;
  run: RecordTransform;
}

/**
 * Runs one pass in isolation. A pass that throws leaves the record exactly as
 * it was handed in; the failure is logged and later passes still run.
 */
export function runGuarded(
  pass: NormalizationPass,
  record: UniversalRecord,
  ctx: PostprocessContext
): UniversalRecord {
  try {
    return pass.run(record, ctx);
  } catch (err) {
    ctx.logger.error(
      { err, documentRef: ctx.documentRef, pass: pass.name },
      'Normalization pass failed, keeping previous values'
    );
    return record;
  }
}

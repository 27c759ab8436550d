import { freezeRecord } from '../ocr/universal-record';
import { getCountryRule } from './rule-registry';
import type { UniversalRecord } from '../types/passport';
import type { PostprocessContext } from '../services/context';

/**
 * Applies the issuing country's rule. The rule sees a frozen copy of the
 * record; if it throws, the failure is logged and the record comes back as it
 * was handed in.
 */
export function applyCountryRules(
  record: UniversalRecord,
  countryCode: string,
  ctx: PostprocessContext
): UniversalRecord {
  const rule = getCountryRule(countryCode);
  try {
    return rule.apply(freezeRecord(record), ctx);
  } catch (err) {
    ctx.logger.error(
      { err, documentRef: ctx.documentRef, countryCode },
      'Country rule failed, keeping pre-rule values'
    );
    return record;
  }
}

import { validateCountry } from './country';
import { recoverDocumentNumber, stripSurnameCountryPrefix } from './mrz-reconciliation';
import { standardizeDateField } from './dates';
import { canonicalizeCountryOfIssue, deriveCountryOfIssue } from './place-of-issue';
import { cleanPlaceOfBirth } from './place-of-birth';
import { runGuarded } from './guard';
import type { NormalizationPass } from './guard';
import type { UniversalRecord } from '../../types/passport';
import type { PostprocessContext } from '../context';

export { cleanString, cleanStringFields, STRING_FIELDS } from './string-cleaning';
export { standardizeDate, standardizeDateField, DATE_FIELDS } from './dates';
export { runGuarded } from './guard';
export type { NormalizationPass, RecordTransform } from './guard';

// Country runs first: the MRZ and place-of-birth passes read the validated code.
export const NORMALIZATION_PASSES: readonly NormalizationPass[] = [
  { name: 'country', run: validateCountry },
  { name: 'mrz-document-number', run: recoverDocumentNumber },
  { name: 'mrz-surname-prefix', run: stripSurnameCountryPrefix },
  { name: 'birth-date', run: (record, ctx) => standardizeDateField(record, 'birthDate', ctx) },
  { name: 'issue-date', run: (record, ctx) => standardizeDateField(record, 'issueDate', ctx) },
  { name: 'expiry-date', run: (record, ctx) => standardizeDateField(record, 'expiryDate', ctx) },
  { name: 'place-of-issue', run: deriveCountryOfIssue },
  { name: 'country-of-issue', run: canonicalizeCountryOfIssue },
  { name: 'place-of-birth', run: cleanPlaceOfBirth },
];

export function runNormalizationStage(
  record: UniversalRecord,
  ctx: PostprocessContext,
  passes: readonly NormalizationPass[] = NORMALIZATION_PASSES
): UniversalRecord {
  return passes.reduce((current, pass) => runGuarded(pass, current, ctx), record);
}

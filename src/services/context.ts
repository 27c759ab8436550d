import { v4 as uuidv4 } from 'uuid';
import { getReferenceTables } from '../ocr/reference-tables';
import type { ReferenceTables } from '../ocr/reference-tables';
import { partialRatioScorer } from './matching/fuzzy';
import type { FuzzyScorer } from './matching/fuzzy';
import { createDocumentLogger } from '../utils/logger';
import type { CoreLogger } from '../utils/logger';

/** Collaborators for one document's trip through the pipeline. */
export interface PostprocessContext {
  /** Identifies the document in logs. */
  documentRef: string;
  tables: ReferenceTables;
  scorer: FuzzyScorer;
  /** Clock used for century expansion and expiry windows. */
  now: Date;
  logger: CoreLogger;
}

export type PostprocessOptions = Partial<PostprocessContext>;

export function createPostprocessContext(options: PostprocessOptions = {}): PostprocessContext {
  const documentRef = options.documentRef ?? uuidv4();
  return {
    documentRef,
    tables: options.tables ?? getReferenceTables(),
    scorer: options.scorer ?? partialRatioScorer,
    now: options.now ?? new Date(),
    logger: options.logger ?? createDocumentLogger(documentRef),
  };
}

import { partial_ratio } from 'fuzzball';

/** Approximate similarity of two strings on a 0-100 scale. */
export type FuzzyScorer = (query: string, choice: string) => number;

export const partialRatioScorer: FuzzyScorer = (query, choice) => partial_ratio(query, choice);

export interface FuzzyMatch<T> {
  item: T;
  choice: string;
  score: number;
}

/**
 * Scores every choice against the query and returns the highest-scoring one.
 * Ties go to the longer choice, then to the first listed. Empty queries never
 * match.
 */
export function bestMatch<T>(
  query: string,
  items: readonly T[],
  toChoice: (item: T) => string,
  scorer: FuzzyScorer
): FuzzyMatch<T> | undefined {
  if (!query.trim()) return undefined;
  let best: FuzzyMatch<T> | undefined;
  for (const item of items) {
    const choice = toChoice(item);
    const score = scorer(query, choice);
    const longerTie = best !== undefined && score === best.score && choice.length > best.choice.length;
    if (!best || score > best.score || longerTie) {
      best = { item, choice, score };
    }
  }
  return best;
}

export function matchesAtLeast(
  query: string,
  canonical: string,
  threshold: number,
  scorer: FuzzyScorer
): boolean {
  return query.trim().length > 0 && scorer(query, canonical) >= threshold;
}

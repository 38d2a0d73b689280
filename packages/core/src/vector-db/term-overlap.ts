import { wordSet } from '../utils/similarity.js';

/** Distinct lowercase query terms, in first-seen order. */
export function queryTerms(queryText: string): string[] {
  return [...wordSet(queryText)];
}

/** Share of `terms` that occur as words of `text`, in [0, 1]. */
export function termOverlapScore(terms: readonly string[], text: string): number {
  if (terms.length === 0) {
    return 0;
  }
  const words = wordSet(text);
  return terms.filter((term) => words.has(term)).length / terms.length;
}

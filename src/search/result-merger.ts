import { ScoredHit, SearchHit } from './interfaces/search.interface';

/**
 * Distance given to hits that came back without a vector distance, so they
 * rank after every hit that has one.
 */
export const MISSING_VECTOR_DISTANCE = 999999;

/**
 * Text match descending, then vector distance ascending.
 */
export function byTextMatch(hits: SearchHit[]): SearchHit[] {
  return [...hits].sort(
    (a, b) =>
      compareBigInt(b.textMatchScore, a.textMatchScore) ||
      (a.vectorDistance ?? MISSING_VECTOR_DISTANCE) - (b.vectorDistance ?? MISSING_VECTOR_DISTANCE),
  );
}

function compareBigInt(a: bigint, b: bigint): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

/**
 * Relevance descending. Equal relevance keeps input order.
 */
export function byRelevance(hits: ScoredHit[]): ScoredHit[] {
  return [...hits].sort((a, b) => b.relevance - a.relevance);
}

/**
 * Total of each collection's own found count, taken before any overlay
 * filtering.
 */
export function sumFound(counts: Array<{ found: number }>): number {
  return counts.reduce((total, { found }) => total + found, 0);
}

/**
 * Keyword Chunk Search
 *
 * Ranks chunks by how many distinct query words they contain.
 */

import type { Chunk } from '../types';

export interface ScoredChunk<T extends Chunk = Chunk> {
  chunk: T;
  relevance_score: number;
}

export const DEFAULT_TOP_K = 5;

export function queryTerms(query: string): string[] {
  const terms = query
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => term.length > 0);
  return [...new Set(terms)];
}

/**
 * Score every chunk, drop non-matching ones and return the best `topK`.
 * Equal scores keep their input order.
 */
export function searchChunks<T extends Chunk>(
  query: string,
  chunks: readonly T[],
  topK: number = DEFAULT_TOP_K
): ScoredChunk<T>[] {
  const terms = queryTerms(query);
  if (terms.length === 0) return [];

  const scored: ScoredChunk<T>[] = [];
  for (const chunk of chunks) {
    const text = chunk.text.toLowerCase();
    const score = terms.filter((term) => text.includes(term)).length;
    if (score > 0) {
      scored.push({ chunk, relevance_score: score });
    }
  }

  scored.sort((a, b) => b.relevance_score - a.relevance_score);
  return scored.slice(0, topK);
}

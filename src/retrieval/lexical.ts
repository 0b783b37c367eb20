import { DEFAULT_LEXICAL_FACTOR } from '../config.js';
import type { TableChunk } from '../types.js';

export function queryTerms(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}

/** Everything a table chunk can be matched on, lowercased. */
export function lexicalSurface(chunk: TableChunk): string {
  return `${chunk.tableName} ${chunk.definition} ${JSON.stringify(chunk.metadata)}`.toLowerCase();
}

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export function countTermOccurrences(surface: string, terms: string[]): number {
  return terms.reduce((acc, term) => acc + countOccurrences(surface, term), 0);
}

/** Occurrence count normalised by `termCount × factor`, clamped to [0, 1]. */
export function lexicalSimilarity(occurrences: number, termCount: number, factor = DEFAULT_LEXICAL_FACTOR): number {
  if (termCount <= 0 || factor <= 0) return 0;
  return Math.min(1, Math.max(0, occurrences / (termCount * factor)));
}

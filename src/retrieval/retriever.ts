import type { ChunkStore } from '../db/chunk-store.js';
import { EmbeddingError, errorMessage } from '../errors.js';
import type { PipelineEventHandler } from '../observability.js';
import { CHUNK_KINDS, assertNever, type ChunkKind, type RetrievalCandidate } from '../types.js';
import type { EmbeddingService } from './embeddings.js';
import { DEFAULT_LEXICAL_FACTOR } from '../config.js';
import { lexicalSimilarity, queryTerms } from './lexical.js';

export type KindRetrieval =
  | { status: 'ok'; count: number }
  | { status: 'skipped'; reason: string }
  | { status: 'unavailable'; error: string };

export interface RetrievalResult {
  query: string;
  candidates: RetrievalCandidate[];
  byKind: Record<ChunkKind, KindRetrieval>;
}

export interface RetrieverOptions {
  lexicalFactor?: number;
  onEvent?: PipelineEventHandler;
}

function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

function emptyByKind(status: KindRetrieval): Record<ChunkKind, KindRetrieval> {
  return { text: status, image: status, table: status };
}

/**
 * Fetches candidates per chunk kind (vector search for text and image, keyword
 * matching for tables) and merges them into one list. A failing kind
 * contributes nothing; only a query that cannot be embedded is fatal.
 */
export class HybridRetriever {
  private readonly lexicalFactor: number;

  constructor(
    private readonly store: ChunkStore,
    private readonly embedder: EmbeddingService,
    private readonly options: RetrieverOptions = {}
  ) {
    this.lexicalFactor = options.lexicalFactor ?? DEFAULT_LEXICAL_FACTOR;
  }

  async retrieve(query: string, k: number): Promise<RetrievalResult> {
    if (!query.trim() || k <= 0) {
      return { query, candidates: [], byKind: emptyByKind({ status: 'ok', count: 0 }) };
    }

    let queryVector: number[];
    try {
      queryVector = await this.embedder.embed(query);
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      throw new EmbeddingError(`Failed to embed query: ${errorMessage(error)}`, { cause: error });
    }

    return this.collect(query, k, queryVector);
  }

  /** Keyword-only retrieval for when the query cannot be embedded. */
  async retrieveLexical(query: string, k: number): Promise<RetrievalResult> {
    if (!query.trim() || k <= 0) {
      return { query, candidates: [], byKind: emptyByKind({ status: 'ok', count: 0 }) };
    }
    return this.collect(query, k, null);
  }

  private async collect(query: string, k: number, queryVector: number[] | null): Promise<RetrievalResult> {
    const byKind = emptyByKind({ status: 'ok', count: 0 });
    const candidates: RetrievalCandidate[] = [];

    for (const kind of CHUNK_KINDS) {
      try {
        const found = await this.retrieveKind(kind, query, k, queryVector);
        if (found === null) {
          byKind[kind] = { status: 'skipped', reason: 'no query embedding' };
          continue;
        }
        candidates.push(...found);
        byKind[kind] = { status: 'ok', count: found.length };
      } catch (error) {
        byKind[kind] = { status: 'unavailable', error: errorMessage(error) };
        this.options.onEvent?.({
          level: 'warn',
          eventType: 'store_unavailable',
          event: { kind, message: errorMessage(error) }
        });
      }
    }

    candidates.sort((a, b) => b.similarityScore - a.similarityScore);
    this.options.onEvent?.({
      level: 'info',
      eventType: 'retrieval_completed',
      event: {
        total: candidates.length,
        text: byKind.text.status === 'ok' ? byKind.text.count : 0,
        image: byKind.image.status === 'ok' ? byKind.image.count : 0,
        table: byKind.table.status === 'ok' ? byKind.table.count : 0
      }
    });

    return { query, candidates, byKind };
  }

  private async retrieveKind(
    kind: ChunkKind,
    query: string,
    k: number,
    queryVector: number[] | null
  ): Promise<RetrievalCandidate[] | null> {
    switch (kind) {
      case 'text':
      case 'image': {
        if (!queryVector) return null;
        const hits = await this.store.vectorSearch(kind, queryVector, k);
        return hits.map((hit): RetrievalCandidate => ({
          chunk: hit.chunk,
          similarityScore: clamp01(hit.score),
          retrievalMethod: 'vector_similarity'
        }));
      }
      case 'table': {
        const terms = queryTerms(query);
        if (terms.length === 0) return [];
        const hits = await this.store.lexicalSearch(kind, terms, k);
        return hits
          .map((hit): RetrievalCandidate => ({
            chunk: hit.chunk,
            similarityScore: lexicalSimilarity(hit.score, terms.length, this.lexicalFactor),
            retrievalMethod: 'keyword_matching'
          }))
          .sort((a, b) => b.similarityScore - a.similarityScore)
          .slice(0, k);
      }
      default:
        return assertNever(kind);
    }
  }
}

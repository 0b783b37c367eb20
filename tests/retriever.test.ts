import { describe, it, expect, vi } from 'vitest';
import type { ChunkStore, LexicalChunkKind, ScoredChunk } from '../src/db/chunk-store.js';
import { EmbeddingError, StoreUnavailableError } from '../src/errors.js';
import type { PipelineEvent } from '../src/observability.js';
import type { EmbeddingService } from '../src/retrieval/embeddings.js';
import { HybridRetriever } from '../src/retrieval/retriever.js';
import type { Chunk, TableChunk, VectorChunkKind } from '../src/types.js';

function textChunk(id: string): Chunk {
  return { kind: 'text', chunkId: id, sectionId: 's', sourceDocument: 'd', content: id, embedding: [1, 0], metadata: {} };
}

function imageChunk(id: string): Chunk {
  return { kind: 'image', chunkId: id, sectionId: 's', sourceDocument: 'd', imageType: 'photo', summary: id, embedding: [1, 0], metadata: {} };
}

const salesTable: TableChunk = {
  kind: 'table',
  chunkId: 'tbl',
  sectionId: 's',
  sourceDocument: 'd',
  tableName: 'sales_orders',
  definition: 'CREATE TABLE sales_orders (id INT)',
  embedding: null,
  metadata: {}
};

class FakeStore implements ChunkStore {
  vectorHits: Record<VectorChunkKind, ScoredChunk[] | Error> = { text: [], image: [] };
  tableHits: Array<ScoredChunk<TableChunk>> = [];
  lexicalCalls: string[][] = [];

  async vectorSearch(kind: VectorChunkKind, _queryVector: number[], limit: number): Promise<ScoredChunk[]> {
    const hits = this.vectorHits[kind];
    if (hits instanceof Error) throw hits;
    return hits.slice(0, limit);
  }

  async lexicalSearch(_kind: LexicalChunkKind, terms: string[], limit: number): Promise<Array<ScoredChunk<TableChunk>>> {
    this.lexicalCalls.push(terms);
    return this.tableHits.slice(0, limit);
  }

  async upsert(): Promise<void> {}
}

function embedder(vector: number[] = [1, 0]) {
  return { embed: vi.fn(async (_text: string) => vector) };
}

describe('HybridRetriever', () => {
  it('merges vector and keyword results sorted by similarity', async () => {
    const store = new FakeStore();
    store.vectorHits.text = [{ chunk: textChunk('t1'), score: 0.4 }];
    store.vectorHits.image = [{ chunk: imageChunk('i1'), score: 0.9 }];
    store.tableHits = [{ chunk: salesTable, score: 3 }];

    const result = await new HybridRetriever(store, embedder()).retrieve('Sales Orders', 5);

    expect(store.lexicalCalls).toEqual([['sales', 'orders']]);
    expect(result.candidates.map((c) => [c.chunk.chunkId, c.retrievalMethod])).toEqual([
      ['i1', 'vector_similarity'],
      ['tbl', 'keyword_matching'],
      ['t1', 'vector_similarity']
    ]);
    expect(result.candidates[1].similarityScore).toBeCloseTo(0.5, 10);
    expect(result.byKind).toEqual({
      text: { status: 'ok', count: 1 },
      image: { status: 'ok', count: 1 },
      table: { status: 'ok', count: 1 }
    });
  });

  it('uses the configured lexical factor', async () => {
    const store = new FakeStore();
    store.tableHits = [{ chunk: salesTable, score: 3 }];
    const result = await new HybridRetriever(store, embedder(), { lexicalFactor: 6 }).retrieve('sales', 5);
    expect(result.candidates[0].similarityScore).toBeCloseTo(0.5, 10);
  });

  it('clamps vector similarity into [0, 1]', async () => {
    const store = new FakeStore();
    store.vectorHits.text = [
      { chunk: textChunk('neg'), score: -0.3 },
      { chunk: textChunk('over'), score: 1.0000001 }
    ];
    const result = await new HybridRetriever(store, embedder()).retrieve('q', 5);
    expect(result.candidates.map((c) => c.similarityScore)).toEqual([1, 0]);
  });

  it('returns nothing for a blank query without embedding it', async () => {
    const service = embedder();
    const result = await new HybridRetriever(new FakeStore(), service).retrieve('   ', 5);
    expect(result.candidates).toEqual([]);
    expect(service.embed).not.toHaveBeenCalled();
  });

  it('returns nothing when the store is empty', async () => {
    const result = await new HybridRetriever(new FakeStore(), embedder()).retrieve('anything', 5);
    expect(result.candidates).toEqual([]);
  });

  it('wraps query embedding failures in EmbeddingError', async () => {
    const service: EmbeddingService = {
      embed: async () => {
        throw new Error('quota exceeded');
      }
    };
    await expect(new HybridRetriever(new FakeStore(), service).retrieve('q', 5)).rejects.toThrow(EmbeddingError);
  });

  it('keeps other kinds when one store kind fails', async () => {
    const store = new FakeStore();
    store.vectorHits.text = [{ chunk: textChunk('t1'), score: 0.7 }];
    store.vectorHits.image = new StoreUnavailableError('image', 'image index offline');
    const events: PipelineEvent[] = [];

    const result = await new HybridRetriever(store, embedder(), { onEvent: (e) => events.push(e) }).retrieve('q', 5);

    expect(result.candidates.map((c) => c.chunk.chunkId)).toEqual(['t1']);
    expect(result.byKind.image).toEqual({ status: 'unavailable', error: 'image index offline' });
    expect(events[0]).toEqual({
      level: 'warn',
      eventType: 'store_unavailable',
      event: { kind: 'image', message: 'image index offline' }
    });
    expect(events[1].eventType).toBe('retrieval_completed');
  });

  it('searches only tables in keyword-only mode', async () => {
    const store = new FakeStore();
    store.vectorHits.text = [{ chunk: textChunk('t1'), score: 0.7 }];
    store.tableHits = [{ chunk: salesTable, score: 1 }];
    const service = embedder();

    const result = await new HybridRetriever(store, service).retrieveLexical('sales', 5);

    expect(service.embed).not.toHaveBeenCalled();
    expect(result.candidates.map((c) => c.chunk.chunkId)).toEqual(['tbl']);
    expect(result.byKind.text).toEqual({ status: 'skipped', reason: 'no query embedding' });
  });
});

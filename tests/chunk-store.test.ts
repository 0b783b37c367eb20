import { describe, it, expect, beforeEach, vi } from 'vitest';
import { initDB, type DBContext } from '../src/db/client.js';
import { SqliteChunkStore } from '../src/db/chunk-store.js';
import { StoreUnavailableError } from '../src/errors.js';
import type { ImageChunk, TableChunk, TextChunk } from '../src/types.js';

function text(id: string, content: string, embedding: number[] | null): TextChunk {
  return { kind: 'text', chunkId: id, sectionId: 'Intro', sourceDocument: 'guide', content, embedding, metadata: { tokenCount: 2 } };
}

function table(id: string, tableName: string, definition: string, metadata: Record<string, unknown> = {}): TableChunk {
  return { kind: 'table', chunkId: id, sectionId: 'Data', sourceDocument: 'report', tableName, definition, embedding: null, metadata };
}

describe('SqliteChunkStore', () => {
  let ctx: DBContext;
  let store: SqliteChunkStore;

  beforeEach(() => {
    ctx = initDB(':memory:');
    store = new SqliteChunkStore(ctx);
  });

  it('ranks embedded chunks by cosine similarity and skips unembedded ones', async () => {
    await store.upsert(text('a', 'alpha', [1, 0]));
    await store.upsert(text('b', 'beta', [0, 1]));
    await store.upsert(text('c', 'gamma', null));

    const hits = await store.vectorSearch('text', [1, 0], 5);
    expect(hits.map((h) => h.chunk.chunkId)).toEqual(['a', 'b']);
    expect(hits[0].score).toBeCloseTo(1, 10);
    expect(hits[1].score).toBeCloseTo(0, 10);
    expect(hits[0].chunk).toEqual(text('a', 'alpha', [1, 0]));
  });

  it('skips embeddings of another dimension and warns with the count', async () => {
    const onEvent = vi.fn();
    const warned = new SqliteChunkStore(ctx, { onEvent });
    await warned.upsert(text('a', 'alpha', [1, 0, 0]));
    await warned.upsert(text('b', 'beta', [0.6, 0.8]));

    const hits = await warned.vectorSearch('text', [1, 0], 5);
    expect(hits.map((h) => h.chunk.chunkId)).toEqual(['b']);
    expect(hits[0].score).toBeCloseTo(0.6, 10);
    expect(onEvent).toHaveBeenCalledWith({
      level: 'warn',
      eventType: 'embedding_dimension_mismatch',
      event: { kind: 'text', skipped: 1, dimensions: 2 }
    });
  });

  it('searches image summaries separately from text', async () => {
    const image: ImageChunk = {
      kind: 'image',
      chunkId: 'img',
      sectionId: 'Figures',
      sourceDocument: 'guide',
      imageType: 'chart',
      summary: 'bar chart of revenue',
      embedding: [0, 1],
      metadata: {}
    };
    await store.upsert(image);
    await store.upsert(text('a', 'alpha', [0, 1]));

    const hits = await store.vectorSearch('image', [0, 1], 5);
    expect(hits.map((h) => h.chunk)).toEqual([image]);
  });

  it('counts term occurrences for table chunks', async () => {
    await store.upsert(table('t1', 'sales_orders', 'CREATE TABLE sales_orders (id INT, amount REAL)'));
    await store.upsert(table('t2', 'customers', 'CREATE TABLE customers (id INT, name TEXT)'));
    await store.upsert(table('t3', 'targets', 'CREATE TABLE targets (month TEXT)', { description: 'Monthly revenue' }));

    const sales = await store.lexicalSearch('table', ['sales'], 5);
    expect(sales.map((h) => [h.chunk.chunkId, h.score])).toEqual([['t1', 2]]);

    const revenue = await store.lexicalSearch('table', ['revenue'], 5);
    expect(revenue.map((h) => h.chunk.chunkId)).toEqual(['t3']);

    expect(await store.lexicalSearch('table', ['%'], 5)).toEqual([]);
    expect(await store.lexicalSearch('table', ['id'], 1)).toHaveLength(1);
  });

  it('matches table terms case-insensitively beyond ASCII', async () => {
    await store.upsert(table('t1', 'ÉTUDE_RÉSULTATS', 'CREATE TABLE ÉTUDE_RÉSULTATS (ANNÉE INT)'));

    const hits = await store.lexicalSearch('table', ['étude'], 5);
    expect(hits.map((h) => [h.chunk.chunkId, h.score])).toEqual([['t1', 2]]);
  });

  it('upserts idempotently and keeps the embedding while content is unchanged', async () => {
    await store.upsert(text('a', 'alpha', [1, 0]));
    await store.upsert(text('a', 'alpha', null));
    expect(store.countByKind()).toEqual({ text: 1, image: 0, table: 0 });
    expect(store.getChunk('a')?.embedding).toEqual([1, 0]);

    await store.upsert(text('a', 'alpha changed', null));
    expect(store.getChunk('a')?.embedding).toBeNull();
  });

  it('refuses to store one chunk id under two kinds', async () => {
    await store.upsert(text('x', 'alpha', null));
    await expect(store.upsert(table('x', 'orders', 'CREATE TABLE orders (id INT)'))).rejects.toThrow(
      'Chunk x is already stored as a text chunk'
    );
  });

  it('attaches embeddings only to chunks that have none', async () => {
    await store.upsert(text('a', 'alpha', null));
    expect(store.listPendingEmbeddings('text')).toEqual([{ chunkId: 'a', payload: 'alpha' }]);
    expect(store.attachEmbedding('text', 'a', [0.5, 0.5])).toBe(true);
    expect(store.attachEmbedding('text', 'a', [1, 0])).toBe(false);
    expect(store.getChunk('a')?.embedding).toEqual([0.5, 0.5]);
    expect(store.countEmbedded('text')).toBe(1);
  });

  it('reports a broken table as unavailable', async () => {
    ctx.db.exec('DROP TABLE image_chunks');
    await expect(store.vectorSearch('image', [1, 0], 5)).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

import type { DBContext } from './client.js';
import type { PipelineEventHandler } from '../observability.js';
import { StoreUnavailableError, errorMessage } from '../errors.js';
import { cosineSimilarity } from '../retrieval/embeddings.js';
import { countTermOccurrences, lexicalSurface } from '../retrieval/lexical.js';
import {
  CHUNK_KINDS,
  assertNever,
  chunkPayload,
  type Chunk,
  type ChunkKind,
  type ChunkMetadata,
  type ImageChunk,
  type TableChunk,
  type TextChunk,
  type VectorChunkKind
} from '../types.js';

export interface ScoredChunk<C extends Chunk = Chunk> {
  chunk: C;
  score: number;
}

export type LexicalChunkKind = 'table';

/** Read and write contract the retriever and the ingest pipeline rely on. */
export interface ChunkStore {
  /** Cosine similarity against stored embeddings; chunks without one, or of another dimension, are skipped. */
  vectorSearch(kind: VectorChunkKind, queryVector: number[], limit: number): Promise<ScoredChunk[]>;
  /** Case-insensitive substring match; `score` is the raw term occurrence count. */
  lexicalSearch(kind: LexicalChunkKind, terms: string[], limit: number): Promise<Array<ScoredChunk<TableChunk>>>;
  /** Idempotent on `chunkId`. */
  upsert(chunk: Chunk): Promise<void>;
}

interface TextRow {
  chunk_id: string;
  section_id: string;
  source_document: string;
  content: string;
  embedding_json: string | null;
  metadata_json: string;
}

interface ImageRow {
  chunk_id: string;
  section_id: string;
  source_document: string;
  image_type: string;
  image_summary: string;
  embedding_json: string | null;
  metadata_json: string;
}

interface TableRow {
  chunk_id: string;
  section_id: string;
  source_document: string;
  table_name: string;
  sql_definition: string;
  metadata_json: string;
}

export function tableFor(kind: ChunkKind): string {
  switch (kind) {
    case 'text':
      return 'text_chunks';
    case 'image':
      return 'image_chunks';
    case 'table':
      return 'table_chunks';
    default:
      return assertNever(kind);
  }
}

function parseEmbedding(json: string | null): number[] | null {
  if (!json) return null;
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) && parsed.every((x): x is number => typeof x === 'number') ? parsed : null;
  } catch {
    return null;
  }
}

function parseMetadata(json: string | null): ChunkMetadata {
  if (!json) return {};
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? Object.fromEntries(Object.entries(parsed)) : {};
  } catch {
    return {};
  }
}

function textFromRow(row: TextRow): TextChunk {
  return {
    kind: 'text',
    chunkId: row.chunk_id,
    sectionId: row.section_id,
    sourceDocument: row.source_document,
    content: row.content,
    embedding: parseEmbedding(row.embedding_json),
    metadata: parseMetadata(row.metadata_json)
  };
}

function imageFromRow(row: ImageRow): ImageChunk {
  return {
    kind: 'image',
    chunkId: row.chunk_id,
    sectionId: row.section_id,
    sourceDocument: row.source_document,
    imageType: row.image_type,
    summary: row.image_summary,
    embedding: parseEmbedding(row.embedding_json),
    metadata: parseMetadata(row.metadata_json)
  };
}

function tableFromRow(row: TableRow): TableChunk {
  return {
    kind: 'table',
    chunkId: row.chunk_id,
    sectionId: row.section_id,
    sourceDocument: row.source_document,
    tableName: row.table_name,
    definition: row.sql_definition,
    embedding: null,
    metadata: parseMetadata(row.metadata_json)
  };
}

function byScoreDesc(a: ScoredChunk, b: ScoredChunk): number {
  return b.score - a.score;
}

export class SqliteChunkStore implements ChunkStore {
  constructor(
    private readonly ctx: DBContext,
    private readonly options: { onEvent?: PipelineEventHandler } = {}
  ) {}

  async vectorSearch(kind: VectorChunkKind, queryVector: number[], limit: number): Promise<ScoredChunk[]> {
    if (limit <= 0) return [];
    let chunks: Array<TextChunk | ImageChunk>;
    try {
      chunks = this.loadEmbedded(kind);
    } catch (error) {
      throw new StoreUnavailableError(kind, `Vector search on ${kind} chunks failed: ${errorMessage(error)}`, { cause: error });
    }

    const scored: ScoredChunk[] = [];
    let mismatched = 0;
    for (const chunk of chunks) {
      if (!chunk.embedding) continue;
      if (chunk.embedding.length !== queryVector.length) {
        mismatched++;
        continue;
      }
      scored.push({ chunk, score: cosineSimilarity(queryVector, chunk.embedding) });
    }
    if (mismatched > 0) {
      this.options.onEvent?.({
        level: 'warn',
        eventType: 'embedding_dimension_mismatch',
        event: { kind, skipped: mismatched, dimensions: queryVector.length }
      });
    }
    return scored.sort(byScoreDesc).slice(0, limit);
  }

  async lexicalSearch(kind: LexicalChunkKind, terms: string[], limit: number): Promise<Array<ScoredChunk<TableChunk>>> {
    if (limit <= 0 || terms.length === 0) return [];

    // SQLite LOWER/LIKE fold ASCII only; matching happens on the JS-lowercased surface.
    let rows: TableRow[];
    try {
      rows = this.ctx.db
        .prepare(
          `SELECT chunk_id, section_id, source_document, table_name, sql_definition, metadata_json
           FROM ${tableFor(kind)}
           ORDER BY rowid`
        )
        .all() as TableRow[];
    } catch (error) {
      throw new StoreUnavailableError(kind, `Lexical search on ${kind} chunks failed: ${errorMessage(error)}`, { cause: error });
    }

    return rows
      .map((row) => {
        const chunk = tableFromRow(row);
        return { chunk, score: countTermOccurrences(lexicalSurface(chunk), terms) };
      })
      .filter((r) => r.score > 0)
      .sort(byScoreDesc)
      .slice(0, limit);
  }

  async upsert(chunk: Chunk): Promise<void> {
    this.upsertSync(chunk);
  }

  upsertSync(chunk: Chunk): void {
    const { db } = this.ctx;
    for (const other of CHUNK_KINDS) {
      if (other === chunk.kind) continue;
      const clash = db.prepare(`SELECT 1 AS found FROM ${tableFor(other)} WHERE chunk_id = ?`).get(chunk.chunkId);
      if (clash) {
        throw new Error(`Chunk ${chunk.chunkId} is already stored as a ${other} chunk`);
      }
    }

    const metadata = JSON.stringify(chunk.metadata);
    const embedding = chunk.embedding ? JSON.stringify(chunk.embedding) : null;

    switch (chunk.kind) {
      case 'text':
        db.prepare(
          `INSERT INTO text_chunks (chunk_id, section_id, source_document, content, embedding_json, metadata_json)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(chunk_id) DO UPDATE SET
             section_id = excluded.section_id,
             source_document = excluded.source_document,
             embedding_json = CASE WHEN excluded.content = text_chunks.content
               THEN COALESCE(excluded.embedding_json, text_chunks.embedding_json)
               ELSE excluded.embedding_json END,
             content = excluded.content,
             metadata_json = excluded.metadata_json`
        ).run(chunk.chunkId, chunk.sectionId, chunk.sourceDocument, chunk.content, embedding, metadata);
        return;
      case 'image':
        db.prepare(
          `INSERT INTO image_chunks (chunk_id, section_id, source_document, image_type, image_summary, embedding_json, metadata_json)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(chunk_id) DO UPDATE SET
             section_id = excluded.section_id,
             source_document = excluded.source_document,
             image_type = excluded.image_type,
             embedding_json = CASE WHEN excluded.image_summary = image_chunks.image_summary
               THEN COALESCE(excluded.embedding_json, image_chunks.embedding_json)
               ELSE excluded.embedding_json END,
             image_summary = excluded.image_summary,
             metadata_json = excluded.metadata_json`
        ).run(chunk.chunkId, chunk.sectionId, chunk.sourceDocument, chunk.imageType, chunk.summary, embedding, metadata);
        return;
      case 'table':
        db.prepare(
          `INSERT INTO table_chunks (chunk_id, section_id, source_document, table_name, sql_definition, metadata_json)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(chunk_id) DO UPDATE SET
             section_id = excluded.section_id,
             source_document = excluded.source_document,
             table_name = excluded.table_name,
             sql_definition = excluded.sql_definition,
             metadata_json = excluded.metadata_json`
        ).run(chunk.chunkId, chunk.sectionId, chunk.sourceDocument, chunk.tableName, chunk.definition, metadata);
        return;
      default:
        assertNever(chunk);
    }
  }

  getChunk(chunkId: string): Chunk | null {
    const { db } = this.ctx;
    const text = db.prepare('SELECT * FROM text_chunks WHERE chunk_id = ?').get(chunkId) as TextRow | undefined;
    if (text) return textFromRow(text);
    const image = db.prepare('SELECT * FROM image_chunks WHERE chunk_id = ?').get(chunkId) as ImageRow | undefined;
    if (image) return imageFromRow(image);
    const table = db.prepare('SELECT * FROM table_chunks WHERE chunk_id = ?').get(chunkId) as TableRow | undefined;
    return table ? tableFromRow(table) : null;
  }

  listTextChunks(sourceDocument: string): TextChunk[] {
    const rows = this.ctx.db
      .prepare('SELECT * FROM text_chunks WHERE source_document = ? ORDER BY rowid')
      .all(sourceDocument) as TextRow[];
    return rows.map(textFromRow);
  }

  countTextChunks(sourceDocument: string): number {
    const row = this.ctx.db
      .prepare('SELECT COUNT(*) AS c FROM text_chunks WHERE source_document = ?')
      .get(sourceDocument) as { c: number };
    return Number(row.c);
  }

  deleteTextChunks(sourceDocument: string): number {
    return this.ctx.db.prepare('DELETE FROM text_chunks WHERE source_document = ?').run(sourceDocument).changes;
  }

  /** Chunks of a vector kind that still need an embedding, with the text to embed. */
  listPendingEmbeddings(kind: VectorChunkKind, sourceDocument?: string): Array<{ chunkId: string; payload: string }> {
    const where = sourceDocument ? 'AND source_document = ?' : '';
    const params = sourceDocument ? [sourceDocument] : [];
    switch (kind) {
      case 'text': {
        const rows = this.ctx.db
          .prepare(`SELECT * FROM text_chunks WHERE embedding_json IS NULL ${where} ORDER BY rowid`)
          .all(...params) as TextRow[];
        return rows.map((r) => {
          const chunk = textFromRow(r);
          return { chunkId: chunk.chunkId, payload: chunkPayload(chunk) };
        });
      }
      case 'image': {
        const rows = this.ctx.db
          .prepare(`SELECT * FROM image_chunks WHERE embedding_json IS NULL ${where} ORDER BY rowid`)
          .all(...params) as ImageRow[];
        return rows.map((r) => {
          const chunk = imageFromRow(r);
          return { chunkId: chunk.chunkId, payload: chunkPayload(chunk) };
        });
      }
      default:
        return assertNever(kind);
    }
  }

  countEmbedded(kind: VectorChunkKind, sourceDocument?: string): number {
    const where = sourceDocument ? 'AND source_document = ?' : '';
    const params = sourceDocument ? [sourceDocument] : [];
    const row = this.ctx.db
      .prepare(`SELECT COUNT(*) AS c FROM ${tableFor(kind)} WHERE embedding_json IS NOT NULL ${where}`)
      .get(...params) as { c: number };
    return Number(row.c);
  }

  /** Sets the embedding only if none is present; returns whether it was written. */
  attachEmbedding(kind: VectorChunkKind, chunkId: string, embedding: number[]): boolean {
    const result = this.ctx.db
      .prepare(`UPDATE ${tableFor(kind)} SET embedding_json = ? WHERE chunk_id = ? AND embedding_json IS NULL`)
      .run(JSON.stringify(embedding), chunkId);
    return result.changes > 0;
  }

  countByKind(): Record<ChunkKind, number> {
    const counts: Record<ChunkKind, number> = { text: 0, image: 0, table: 0 };
    for (const kind of CHUNK_KINDS) {
      const row = this.ctx.db.prepare(`SELECT COUNT(*) AS c FROM ${tableFor(kind)}`).get() as { c: number };
      counts[kind] = Number(row.c);
    }
    return counts;
  }

  private loadEmbedded(kind: VectorChunkKind): Array<TextChunk | ImageChunk> {
    switch (kind) {
      case 'text': {
        const rows = this.ctx.db
          .prepare('SELECT * FROM text_chunks WHERE embedding_json IS NOT NULL ORDER BY rowid')
          .all() as TextRow[];
        return rows.map(textFromRow);
      }
      case 'image': {
        const rows = this.ctx.db
          .prepare('SELECT * FROM image_chunks WHERE embedding_json IS NOT NULL ORDER BY rowid')
          .all() as ImageRow[];
        return rows.map(imageFromRow);
      }
      default:
        return assertNever(kind);
    }
  }
}

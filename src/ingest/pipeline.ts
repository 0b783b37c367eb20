import fs from 'node:fs/promises';
import path from 'node:path';
import type { DBContext } from '../db/client.js';
import { SqliteChunkStore } from '../db/chunk-store.js';
import { chunkingDefaultsFromEnv } from '../config.js';
import { errorMessage } from '../errors.js';
import { logEvent, recordJobMetric } from '../observability.js';
import { chunkDocument } from '../utils/chunking.js';
import { tokenizerFromEnv, type Tokenizer } from '../utils/tokenizer.js';

export interface IngestOptions {
  text: string;
  sourceDocument: string;
  targetTokens?: number;
  overlapFraction?: number;
  tokenizer?: Tokenizer;
  plainTextHeadings?: boolean;
  /** Replace text chunks already stored for this document. */
  force?: boolean;
}

export interface IngestResult {
  jobId: number;
  sourceDocument: string;
  chunks: number;
  skipped: boolean;
  replaced: number;
}

function startJob(ctx: DBContext, jobType: string, payload: Record<string, unknown>): number {
  const job = ctx.db
    .prepare('INSERT INTO jobs (job_type, status, payload_json) VALUES (?, ?, ?)')
    .run(jobType, 'running', JSON.stringify(payload));
  return Number(job.lastInsertRowid);
}

function finishJob(ctx: DBContext, jobId: number): void {
  ctx.db.prepare('UPDATE jobs SET status = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?').run('done', jobId);
}

function failJob(ctx: DBContext, jobId: number, error: unknown): void {
  ctx.db
    .prepare('UPDATE jobs SET status = ?, error_text = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
    .run('failed', errorMessage(error), jobId);
}

/**
 * Runs `work` as a tracked job: `running` → `done`, or `failed` with the error
 * recorded and rethrown.
 */
export async function runJob<T>(
  ctx: DBContext,
  jobType: string,
  scope: { sourceDocument?: string; payload?: Record<string, unknown> },
  work: (jobId: number) => Promise<T>
): Promise<T> {
  const jobId = startJob(ctx, jobType, scope.payload ?? {});
  const started = Date.now();
  logEvent(ctx, { jobId, sourceDocument: scope.sourceDocument, eventType: 'job_started', event: { jobType } });

  try {
    const result = await work(jobId);
    finishJob(ctx, jobId);
    recordJobMetric(ctx, { jobId, metricName: 'job_duration_ms', metricValue: Date.now() - started, labels: { jobType } });
    logEvent(ctx, { jobId, sourceDocument: scope.sourceDocument, eventType: 'job_completed' });
    return result;
  } catch (error) {
    failJob(ctx, jobId, error);
    logEvent(ctx, {
      jobId,
      sourceDocument: scope.sourceDocument,
      level: 'error',
      eventType: 'job_failed',
      event: { message: errorMessage(error) }
    });
    throw error;
  }
}

export async function ingestDocument(ctx: DBContext, options: IngestOptions): Promise<IngestResult> {
  const { sourceDocument } = options;
  if (!sourceDocument.trim()) {
    throw new Error('sourceDocument is required');
  }

  const defaults = chunkingDefaultsFromEnv();
  const targetTokens = options.targetTokens ?? defaults.targetTokens;
  const overlapFraction = options.overlapFraction ?? defaults.overlapFraction;
  const store = new SqliteChunkStore(ctx);

  return runJob(
    ctx,
    'ingest',
    { sourceDocument, payload: { sourceDocument, targetTokens, overlapFraction, force: Boolean(options.force) } },
    async (jobId) => {
      const existing = store.countTextChunks(sourceDocument);
      if (existing > 0 && !options.force) {
        logEvent(ctx, { jobId, sourceDocument, eventType: 'ingest_skipped', event: { existing } });
        return { jobId, sourceDocument, chunks: existing, skipped: true, replaced: 0 };
      }

      const chunkStarted = Date.now();
      const chunks = chunkDocument(options.text, sourceDocument, {
        targetTokens,
        overlapFraction,
        tokenizer: options.tokenizer ?? tokenizerFromEnv(),
        plainTextHeadings: options.plainTextHeadings
      });
      recordJobMetric(ctx, { jobId, metricName: 'chunk_ms', metricValue: Date.now() - chunkStarted });

      let replaced = 0;
      const write = ctx.db.transaction(() => {
        if (existing > 0) replaced = store.deleteTextChunks(sourceDocument);
        for (const chunk of chunks) store.upsertSync(chunk);
      });
      write();

      recordJobMetric(ctx, { jobId, metricName: 'chunks_created', metricValue: chunks.length, labels: { sourceDocument } });
      logEvent(ctx, {
        jobId,
        sourceDocument,
        eventType: 'document_chunked',
        event: {
          chunks: chunks.length,
          sections: new Set(chunks.map((c) => c.sectionId)).size,
          split: chunks.filter((c) => c.metadata.isSplit === true).length,
          replaced
        }
      });

      return { jobId, sourceDocument, chunks: chunks.length, skipped: false, replaced };
    }
  );
}

export function sourceDocumentFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export async function ingestFile(
  ctx: DBContext,
  filePath: string,
  options: Omit<IngestOptions, 'text' | 'sourceDocument'> & { sourceDocument?: string } = {}
): Promise<IngestResult> {
  const text = await fs.readFile(filePath, 'utf8');
  return ingestDocument(ctx, {
    ...options,
    text,
    sourceDocument: options.sourceDocument || sourceDocumentFromPath(filePath)
  });
}

import fs from 'node:fs/promises';
import { z } from 'zod';
import type { DBContext } from '../db/client.js';
import { SqliteChunkStore } from '../db/chunk-store.js';
import { logEvent, recordJobMetric } from '../observability.js';
import type { ImageChunk, TableChunk } from '../types.js';
import { runJob } from './pipeline.js';

const base = {
  chunkId: z.string().trim().min(1),
  sectionId: z.string().trim().min(1),
  sourceDocument: z.string().trim().min(1),
  metadata: z.record(z.unknown()).default({})
};

const importRecord = z.discriminatedUnion('kind', [
  z.object({
    ...base,
    kind: z.literal('image'),
    imageType: z.string().min(1),
    summary: z.string().trim().min(1),
    embedding: z.array(z.number()).nullable().default(null)
  }),
  z.object({
    ...base,
    kind: z.literal('table'),
    tableName: z.string().trim().min(1),
    definition: z.string().trim().min(1)
  })
]);

export const importFileSchema = z.array(importRecord);

export interface ImportResult {
  jobId: number;
  image: number;
  table: number;
}

function toChunk(record: z.output<typeof importRecord>): ImageChunk | TableChunk {
  if (record.kind === 'image') {
    return { ...record, embedding: record.embedding };
  }
  return { ...record, embedding: null };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Upserts image and table chunks produced outside this project. The batch is
 * validated up front and written in one transaction, so a bad record imports
 * nothing.
 */
export async function importChunks(ctx: DBContext, records: unknown): Promise<ImportResult> {
  const parsed = importFileSchema.safeParse(records);
  if (!parsed.success) {
    throw new Error(`Invalid chunk records: ${describeIssues(parsed.error)}`);
  }

  const chunks = parsed.data.map(toChunk);
  const store = new SqliteChunkStore(ctx);

  return runJob(ctx, 'import', { payload: { records: chunks.length } }, async (jobId) => {
    ctx.db.transaction(() => {
      for (const chunk of chunks) store.upsertSync(chunk);
    })();

    const image = chunks.filter((c) => c.kind === 'image').length;
    const table = chunks.length - image;
    recordJobMetric(ctx, { jobId, metricName: 'chunks_imported', metricValue: chunks.length, labels: { image, table } });
    logEvent(ctx, { jobId, eventType: 'chunks_imported', event: { image, table } });
    return { jobId, image, table };
  });
}

export async function importChunksFile(ctx: DBContext, filePath: string): Promise<ImportResult> {
  const raw = await fs.readFile(filePath, 'utf8');
  let records: unknown;
  try {
    records = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON`, { cause: error });
  }
  return importChunks(ctx, records);
}

import type { DBContext } from './db/client.js';
import { SqliteChunkStore } from './db/chunk-store.js';
import type { ChunkKind } from './types.js';

export type EventLevel = 'info' | 'warn' | 'error';

export interface PipelineEvent {
  level: EventLevel;
  eventType: string;
  event?: Record<string, unknown>;
}

export type PipelineEventHandler = (event: PipelineEvent) => void;

export function logEvent(
  ctx: DBContext,
  params: { jobId?: number; sourceDocument?: string; level?: EventLevel; eventType: string; event?: Record<string, unknown> }
): void {
  ctx.db
    .prepare(
      `INSERT INTO event_logs (job_id, source_document, level, event_type, event_json)
       VALUES (?, ?, ?, ?, ?)`
    )
    .run(
      params.jobId || null,
      params.sourceDocument || null,
      params.level || 'info',
      params.eventType,
      JSON.stringify(params.event || {})
    );
}

export function recordJobMetric(
  ctx: DBContext,
  params: { jobId?: number; metricName: string; metricValue: number; labels?: Record<string, unknown> }
): void {
  ctx.db
    .prepare('INSERT INTO job_metrics (job_id, metric_name, metric_value, labels_json) VALUES (?, ?, ?, ?)')
    .run(params.jobId || null, params.metricName, params.metricValue, JSON.stringify(params.labels || {}));
}

/** Routes pipeline events into `event_logs`. */
export function eventLogger(ctx: DBContext, scope: { jobId?: number; sourceDocument?: string } = {}): PipelineEventHandler {
  return (e) => logEvent(ctx, { ...scope, level: e.level, eventType: e.eventType, event: e.event });
}

export function healthStatus(ctx: DBContext): {
  dbOk: boolean;
  chunks: Record<ChunkKind, number>;
  embedded: { text: number; image: number };
  jobs: { running: number; done: number; failed: number };
  recentFailures24h: number;
} {
  const store = new SqliteChunkStore(ctx);
  const dbOk = Boolean(ctx.db.prepare('SELECT 1 as ok').get());
  const jobs = ctx.db
    .prepare(
      `SELECT
         SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END) as running,
         SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) as done,
         SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed
       FROM jobs`
    )
    .get() as { running: number | null; done: number | null; failed: number | null };

  const recentFailures24h = Number(
    (
      ctx.db
        .prepare("SELECT COUNT(*) as c FROM jobs WHERE status = 'failed' AND created_at >= datetime('now', '-1 day')")
        .get() as { c: number }
    ).c
  );

  return {
    dbOk,
    chunks: store.countByKind(),
    embedded: { text: store.countEmbedded('text'), image: store.countEmbedded('image') },
    jobs: {
      running: jobs.running || 0,
      done: jobs.done || 0,
      failed: jobs.failed || 0
    },
    recentFailures24h
  };
}

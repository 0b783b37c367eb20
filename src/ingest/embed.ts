import type { DBContext } from '../db/client.js';
import { SqliteChunkStore } from '../db/chunk-store.js';
import { errorMessage } from '../errors.js';
import { logEvent, recordJobMetric } from '../observability.js';
import type { EmbeddingService } from '../retrieval/embeddings.js';
import type { VectorChunkKind } from '../types.js';
import { runJob } from './pipeline.js';

export interface EmbedResult {
  jobId: number;
  embedded: number;
  skipped: number;
  failed: number;
}

const VECTOR_KINDS: readonly VectorChunkKind[] = ['text', 'image'];

/**
 * Embeds every text and image chunk that has no embedding yet. Chunks that
 * already carry one are counted as skipped; a chunk whose embedding fails is
 * logged and left for the next run.
 */
export async function embedPendingChunks(
  ctx: DBContext,
  embedder: EmbeddingService,
  options: { sourceDocument?: string } = {}
): Promise<EmbedResult> {
  const store = new SqliteChunkStore(ctx);
  const { sourceDocument } = options;

  return runJob(ctx, 'embed', { sourceDocument, payload: { sourceDocument: sourceDocument ?? null } }, async (jobId) => {
    const started = Date.now();
    let embedded = 0;
    let skipped = 0;
    let failed = 0;

    for (const kind of VECTOR_KINDS) {
      skipped += store.countEmbedded(kind, sourceDocument);
      for (const pending of store.listPendingEmbeddings(kind, sourceDocument)) {
        try {
          const vector = await embedder.embed(pending.payload);
          if (store.attachEmbedding(kind, pending.chunkId, vector)) embedded++;
          else skipped++;
        } catch (error) {
          failed++;
          logEvent(ctx, {
            jobId,
            sourceDocument,
            level: 'warn',
            eventType: 'embedding_failed',
            event: { kind, chunkId: pending.chunkId, message: errorMessage(error) }
          });
        }
      }
    }

    recordJobMetric(ctx, { jobId, metricName: 'embed_ms', metricValue: Date.now() - started });
    recordJobMetric(ctx, { jobId, metricName: 'chunks_embedded', metricValue: embedded, labels: { skipped, failed } });
    return { jobId, embedded, skipped, failed };
  });
}

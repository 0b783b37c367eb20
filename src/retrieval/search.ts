import type { DBContext } from '../db/client.js';
import { SqliteChunkStore, type ChunkStore } from '../db/chunk-store.js';
import { DEFAULT_LEXICAL_FACTOR, DEFAULT_RERANKER_CONFIG, type RerankerConfig } from '../config.js';
import { getSettings } from '../db/settings.js';
import { EmbeddingError, errorMessage } from '../errors.js';
import { eventLogger, logEvent, recordJobMetric, type PipelineEventHandler } from '../observability.js';
import {
  CHUNK_KINDS,
  chunkPayload,
  type ChunkKind,
  type CrossEncodedCandidate,
  type RankedCandidate,
  type RerankStrategy,
  type RetrievalCandidate
} from '../types.js';
import type { CrossEncoder } from './cross-encoder.js';
import type { EmbeddingService } from './embeddings.js';
import { Reranker } from './ranking.js';
import type { RelevanceScorer } from './relevance.js';
import { HybridRetriever, type KindRetrieval, type RetrievalResult } from './retriever.js';

export interface SearchDeps {
  ctx: DBContext;
  embedder: EmbeddingService;
  scorer: RelevanceScorer | null;
  crossEncoder?: CrossEncoder | null;
  store?: ChunkStore;
  rerankerConfig?: RerankerConfig;
  lexicalFactor?: number;
}

export interface SearchOptions {
  /** Candidates fetched per chunk kind. */
  k?: number;
  /** Ranked candidates returned. */
  topK?: number;
  strategy?: RerankStrategy;
  signal?: AbortSignal;
}

export type RankingOutcome =
  | { method: 'multi_signal'; candidates: RankedCandidate[]; fallbackReason?: string }
  | { method: 'cross_encoder'; candidates: CrossEncodedCandidate[] };

export interface SearchResult {
  query: string;
  byKind: Record<ChunkKind, KindRetrieval>;
  retrieved: number;
  embeddingFailed: boolean;
  ranking: RankingOutcome;
}

async function crossEncode(
  crossEncoder: CrossEncoder,
  query: string,
  candidates: RetrievalCandidate[],
  topK: number,
  signal?: AbortSignal
): Promise<CrossEncodedCandidate[]> {
  const results = await crossEncoder.rerank(
    { query, documents: candidates.map((c) => chunkPayload(c.chunk)), topK },
    signal
  );
  const ranked: CrossEncodedCandidate[] = [];
  for (const r of results) {
    const candidate = candidates[r.index];
    if (!candidate) throw new Error(`Cross-encoder returned unknown index ${r.index}`);
    ranked.push({ ...candidate, crossEncoderScore: r.score, finalScore: r.score });
  }
  return ranked.sort((a, b) => b.finalScore - a.finalScore).slice(0, topK);
}

/**
 * Ranks retrieval candidates with the selected strategy. The cross-encoder is
 * used only when selected and configured; if it fails the multi-signal
 * reranker takes over and the reason is carried on the outcome.
 */
export async function rankCandidates(
  query: string,
  candidates: RetrievalCandidate[],
  topK: number,
  params: {
    strategy: RerankStrategy;
    reranker: Reranker;
    crossEncoder?: CrossEncoder | null;
    signal?: AbortSignal;
    onEvent?: PipelineEventHandler;
  }
): Promise<RankingOutcome> {
  if (candidates.length === 0 || topK <= 0) {
    return { method: params.strategy === 'cross_encoder' && params.crossEncoder ? 'cross_encoder' : 'multi_signal', candidates: [] };
  }

  let fallbackReason: string | undefined;
  if (params.strategy === 'cross_encoder') {
    if (params.crossEncoder) {
      try {
        const ranked = await crossEncode(params.crossEncoder, query, candidates, topK, params.signal);
        return { method: 'cross_encoder', candidates: ranked };
      } catch (error) {
        fallbackReason = errorMessage(error);
      }
    } else {
      fallbackReason = 'cross-encoder not configured';
    }
    params.onEvent?.({ level: 'warn', eventType: 'cross_encoder_fallback', event: { reason: fallbackReason } });
  }

  const ranked = await params.reranker.rerank(query, candidates, topK, { signal: params.signal });
  return fallbackReason === undefined
    ? { method: 'multi_signal', candidates: ranked }
    : { method: 'multi_signal', candidates: ranked, fallbackReason };
}

export async function searchKnowledge(deps: SearchDeps, query: string, options: SearchOptions = {}): Promise<SearchResult> {
  const { ctx } = deps;
  const settings = getSettings(ctx);
  const k = options.k ?? settings.retrievalTopK;
  const topK = options.topK ?? settings.rerankTopK;
  const strategy = options.strategy ?? settings.rerankStrategy;
  const onEvent = eventLogger(ctx);
  const started = Date.now();

  logEvent(ctx, { eventType: 'search_started', event: { query, k, topK, strategy } });

  const retriever = new HybridRetriever(deps.store ?? new SqliteChunkStore(ctx, { onEvent }), deps.embedder, {
    lexicalFactor: deps.lexicalFactor ?? DEFAULT_LEXICAL_FACTOR,
    onEvent
  });

  let retrieval: RetrievalResult;
  let embeddingFailed = false;
  try {
    retrieval = await retriever.retrieve(query, k);
  } catch (error) {
    if (!(error instanceof EmbeddingError)) throw error;
    embeddingFailed = true;
    logEvent(ctx, {
      level: 'warn',
      eventType: 'search_embedding_failed',
      event: { query, message: error.message }
    });
    retrieval = await retriever.retrieveLexical(query, k);
  }

  const reranker = new Reranker(deps.scorer, deps.rerankerConfig ?? DEFAULT_RERANKER_CONFIG, onEvent);
  const ranking = await rankCandidates(query, retrieval.candidates, topK, {
    strategy,
    reranker,
    crossEncoder: deps.crossEncoder,
    signal: options.signal,
    onEvent
  });

  const elapsed = Date.now() - started;
  recordJobMetric(ctx, { metricName: 'search_ms', metricValue: elapsed, labels: { method: ranking.method } });
  recordJobMetric(ctx, { metricName: 'candidates_retrieved', metricValue: retrieval.candidates.length });
  logEvent(ctx, {
    eventType: 'search_completed',
    event: {
      query,
      retrieved: retrieval.candidates.length,
      returned: ranking.candidates.length,
      method: ranking.method,
      embeddingFailed
    }
  });

  return {
    query,
    byKind: retrieval.byKind,
    retrieved: retrieval.candidates.length,
    embeddingFailed,
    ranking
  };
}

function describeKind(kind: ChunkKind, status: KindRetrieval): string {
  switch (status.status) {
    case 'ok':
      return `${kind} ${status.count}`;
    case 'skipped':
      return `${kind} skipped`;
    case 'unavailable':
      return `${kind} unavailable`;
  }
}

function preview(text: string, max = 200): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

export function formatSearchResults(result: SearchResult): string {
  const { ranking } = result;
  const lines: string[] = [
    `Query: ${result.query}`,
    `Retrieved: ${result.retrieved} (${CHUNK_KINDS.map((kind) => describeKind(kind, result.byKind[kind])).join(', ')})`
  ];

  if (ranking.method === 'multi_signal' && ranking.fallbackReason) {
    lines.push(`Ranking: multi_signal (cross-encoder fallback: ${ranking.fallbackReason})`);
  } else {
    lines.push(`Ranking: ${ranking.method}`);
  }
  if (result.embeddingFailed) {
    lines.push('Note: the query could not be embedded; only keyword matches were searched.');
  }

  if (ranking.candidates.length === 0) {
    lines.push('', 'No matching chunks found.');
    return lines.join('\n');
  }

  if (ranking.method === 'cross_encoder') {
    ranking.candidates.forEach((c, i) => {
      lines.push(
        '',
        `${i + 1}. [${c.chunk.kind}] ${c.chunk.chunkId} (${c.chunk.sectionId})`,
        `   score ${c.finalScore.toFixed(3)} | retrieval ${c.similarityScore.toFixed(3)}`,
        `   ${preview(chunkPayload(c.chunk))}`
      );
    });
    return lines.join('\n');
  }

  ranking.candidates.forEach((c, i) => {
    const relevance = c.relevance.status === 'scored' ? 'scored' : `fallback: ${c.relevance.reason}`;
    lines.push(
      '',
      `${i + 1}. [${c.chunk.kind}] ${c.chunk.chunkId} (${c.chunk.sectionId})`,
      `   final ${c.finalScore.toFixed(3)} | weighted ${c.weightedScore.toFixed(3)} | relevance ${c.llmRelevanceScore.toFixed(3)} (${relevance}) | mmr ${c.mmrScore.toFixed(3)}`,
      `   ${preview(chunkPayload(c.chunk))}`
    );
  });
  return lines.join('\n');
}

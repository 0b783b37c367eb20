import { DEFAULT_RERANKER_CONFIG, type RerankerConfig } from '../config.js';
import { RelevanceScoringError, errorMessage } from '../errors.js';
import type { PipelineEventHandler } from '../observability.js';
import {
  chunkPayload,
  type DiversityAdjustedCandidate,
  type RankedCandidate,
  type RelevanceOutcome,
  type RelevanceScoredCandidate,
  type RetrievalCandidate,
  type TypeWeightedCandidate
} from '../types.js';
import type { RelevanceScorer } from './relevance.js';

export interface RerankOptions {
  signal?: AbortSignal;
}

function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

/* ------------------------------------------------------------------ */
/*  Stage A: type weighting                                            */
/* ------------------------------------------------------------------ */

export function applyTypeWeights(
  candidates: RetrievalCandidate[],
  typeWeights: RerankerConfig['typeWeights'] = DEFAULT_RERANKER_CONFIG.typeWeights
): TypeWeightedCandidate[] {
  return candidates.map((c) => {
    const typeWeight = typeWeights[c.chunk.kind];
    return { ...c, typeWeight, weightedScore: c.similarityScore * typeWeight };
  });
}

/* ------------------------------------------------------------------ */
/*  Stage B: external relevance scoring                                */
/* ------------------------------------------------------------------ */

/** Falls back to the weighted score; a table boost can push that past 1, so it is clamped too. */
function fallback(c: TypeWeightedCandidate, relevance: RelevanceOutcome): RelevanceScoredCandidate {
  return { ...c, llmRelevanceScore: clamp01(c.weightedScore), relevance };
}

/**
 * Sends the best `maxScoredCandidates` (by weighted score) to the scorer one at
 * a time. Any candidate the scorer does not score keeps its weighted score as
 * relevance, with the reason recorded on `relevance`.
 */
export async function scoreRelevance(
  query: string,
  candidates: TypeWeightedCandidate[],
  scorer: RelevanceScorer | null,
  config: Pick<RerankerConfig, 'maxScoredCandidates' | 'snippetChars'> = DEFAULT_RERANKER_CONFIG,
  options: RerankOptions & { onEvent?: PipelineEventHandler } = {}
): Promise<RelevanceScoredCandidate[]> {
  const ordered = [...candidates].sort((a, b) => b.weightedScore - a.weightedScore);
  const limit = Math.min(config.maxScoredCandidates, ordered.length);
  const result: RelevanceScoredCandidate[] = [];

  for (let i = 0; i < ordered.length; i++) {
    const candidate = ordered[i];
    if (i >= limit) {
      result.push(fallback(candidate, { status: 'fallback', reason: 'not_sent' }));
      continue;
    }
    if (!scorer) {
      result.push(fallback(candidate, { status: 'fallback', reason: 'unavailable', detail: 'no relevance scorer configured' }));
      continue;
    }
    if (options.signal?.aborted) {
      result.push(fallback(candidate, { status: 'fallback', reason: 'cancelled' }));
      continue;
    }

    try {
      const raw = await scorer.score(
        {
          query,
          content: chunkPayload(candidate.chunk).slice(0, config.snippetChars),
          kind: candidate.chunk.kind
        },
        options.signal
      );
      if (typeof raw !== 'number' || !Number.isFinite(raw)) {
        result.push(fallback(candidate, { status: 'fallback', reason: 'malformed', detail: String(raw) }));
        continue;
      }
      result.push({ ...candidate, llmRelevanceScore: clamp01(raw), relevance: { status: 'scored' } });
    } catch (error) {
      const reason = options.signal?.aborted
        ? 'cancelled'
        : error instanceof RelevanceScoringError && error.malformed
          ? 'malformed'
          : 'unavailable';
      result.push(fallback(candidate, { status: 'fallback', reason, detail: errorMessage(error) }));
    }
  }

  const degraded = result.filter((c) => c.relevance.status === 'fallback' && c.relevance.reason !== 'not_sent').length;
  if (degraded > 0) {
    options.onEvent?.({
      level: 'warn',
      eventType: 'scoring_degraded',
      event: { degraded, attempted: limit }
    });
  }

  return result;
}

/* ------------------------------------------------------------------ */
/*  Stage C: diversity adjustment                                      */
/* ------------------------------------------------------------------ */

/**
 * MMR-style adjustment. Penalties are taken against documents and sections
 * already seen while walking in relevance order, not against a re-evaluated
 * selection set.
 */
export function applyDiversity(
  candidates: RelevanceScoredCandidate[],
  config: Pick<RerankerConfig, 'lambda' | 'sourcePenalty' | 'sectionPenalty'> = DEFAULT_RERANKER_CONFIG
): DiversityAdjustedCandidate[] {
  const ordered = [...candidates].sort((a, b) => b.llmRelevanceScore - a.llmRelevanceScore);
  const seenSources = new Set<string>();
  const seenSections = new Set<string>();

  const adjusted = ordered.map((c) => {
    let diversityPenalty = 0;
    if (seenSources.has(c.chunk.sourceDocument)) diversityPenalty += config.sourcePenalty;
    if (seenSections.has(c.chunk.sectionId)) diversityPenalty += config.sectionPenalty;
    seenSources.add(c.chunk.sourceDocument);
    seenSections.add(c.chunk.sectionId);

    const mmrScore = config.lambda * c.llmRelevanceScore - (1 - config.lambda) * diversityPenalty;
    return { ...c, diversityPenalty, mmrScore };
  });

  return adjusted.sort((a, b) => b.mmrScore - a.mmrScore);
}

/* ------------------------------------------------------------------ */
/*  Stage D: weighted fusion                                           */
/* ------------------------------------------------------------------ */

export function fuseScores(
  candidates: DiversityAdjustedCandidate[],
  topK: number,
  fusionWeights: RerankerConfig['fusionWeights'] = DEFAULT_RERANKER_CONFIG.fusionWeights
): RankedCandidate[] {
  return candidates
    .map((c) => ({
      ...c,
      finalScore:
        fusionWeights.retrieval * c.weightedScore +
        fusionWeights.relevance * c.llmRelevanceScore +
        fusionWeights.diversity * c.mmrScore
    }))
    .sort((a, b) => b.finalScore - a.finalScore)
    .slice(0, Math.max(0, topK));
}

/* ------------------------------------------------------------------ */
/*  Pipeline                                                           */
/* ------------------------------------------------------------------ */

export class Reranker {
  constructor(
    private readonly scorer: RelevanceScorer | null,
    readonly config: RerankerConfig = DEFAULT_RERANKER_CONFIG,
    private readonly onEvent?: PipelineEventHandler
  ) {}

  async rerank(query: string, candidates: RetrievalCandidate[], topK: number, options: RerankOptions = {}): Promise<RankedCandidate[]> {
    if (candidates.length === 0 || topK <= 0) return [];

    const weighted = applyTypeWeights(candidates, this.config.typeWeights);
    const scored = await scoreRelevance(query, weighted, this.scorer, this.config, {
      signal: options.signal,
      onEvent: this.onEvent
    });
    const diversified = applyDiversity(scored, this.config);
    const ranked = fuseScores(diversified, topK, this.config.fusionWeights);

    this.onEvent?.({
      level: 'info',
      eventType: 'rerank_completed',
      event: {
        input: candidates.length,
        output: ranked.length,
        topScore: ranked[0]?.finalScore ?? null
      }
    });
    return ranked;
  }
}

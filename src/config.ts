import path from 'node:path';
import type { ChunkKind, RerankStrategy } from './types.js';

export interface RagSettings {
  rerankStrategy: RerankStrategy;
  retrievalTopK: number;
  rerankTopK: number;
}

export interface FusionWeights {
  retrieval: number;
  relevance: number;
  diversity: number;
}

export interface RerankerConfig {
  readonly typeWeights: Readonly<Record<ChunkKind, number>>;
  readonly fusionWeights: Readonly<FusionWeights>;
  readonly lambda: number;
  readonly sourcePenalty: number;
  readonly sectionPenalty: number;
  readonly maxScoredCandidates: number;
  readonly snippetChars: number;
}

export interface ChunkingDefaults {
  targetTokens: number;
  overlapFraction: number;
}

export const DEFAULT_DB_PATH = path.resolve(process.cwd(), 'data', 'rag.sqlite');

export const DEFAULT_LEXICAL_FACTOR = 3;

export const DEFAULT_RERANKER_CONFIG: RerankerConfig = Object.freeze({
  typeWeights: Object.freeze({ text: 1.0, image: 0.9, table: 1.1 }),
  fusionWeights: Object.freeze({ retrieval: 0.2, relevance: 0.5, diversity: 0.3 }),
  lambda: 0.7,
  sourcePenalty: 0.2,
  sectionPenalty: 0.1,
  maxScoredCandidates: 15,
  snippetChars: 500
});

function parseJsonObject(value: string | undefined): Record<string, unknown> {
  if (!value) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? Object.fromEntries(Object.entries(parsed)) : {};
  } catch {
    return {};
  }
}

function finiteNumber(value: unknown): number | undefined {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const n = finiteNumber(value);
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : fallback;
}

export function isRerankStrategy(value: string): value is RerankStrategy {
  return value === 'multi_signal' || value === 'cross_encoder';
}

/**
 * Builds a frozen reranker configuration. Fusion weights are normalised to sum
 * to 1; anything non-finite falls back to the default.
 */
export function createRerankerConfig(overrides: {
  typeWeights?: Partial<Record<ChunkKind, number>>;
  fusionWeights?: Partial<FusionWeights>;
  lambda?: number;
  sourcePenalty?: number;
  sectionPenalty?: number;
  maxScoredCandidates?: number;
  snippetChars?: number;
} = {}): RerankerConfig {
  const base = DEFAULT_RERANKER_CONFIG;
  const pick = (value: number | undefined, fallback: number): number =>
    value !== undefined && Number.isFinite(value) ? value : fallback;

  const typeWeights = {
    text: pick(overrides.typeWeights?.text, base.typeWeights.text),
    image: pick(overrides.typeWeights?.image, base.typeWeights.image),
    table: pick(overrides.typeWeights?.table, base.typeWeights.table)
  };

  const retrieval = pick(overrides.fusionWeights?.retrieval, base.fusionWeights.retrieval);
  const relevance = pick(overrides.fusionWeights?.relevance, base.fusionWeights.relevance);
  const diversity = pick(overrides.fusionWeights?.diversity, base.fusionWeights.diversity);
  const sum = retrieval + relevance + diversity;
  const fusionWeights =
    sum > 0 && Number.isFinite(sum)
      ? { retrieval: retrieval / sum, relevance: relevance / sum, diversity: diversity / sum }
      : { ...base.fusionWeights };

  const lambda = pick(overrides.lambda, base.lambda);
  if (lambda < 0 || lambda > 1) {
    throw new RangeError(`lambda must be within [0, 1], got ${lambda}`);
  }

  const maxScoredCandidates = pick(overrides.maxScoredCandidates, base.maxScoredCandidates);
  if (!Number.isInteger(maxScoredCandidates) || maxScoredCandidates < 0) {
    throw new RangeError(`maxScoredCandidates must be a non-negative integer, got ${maxScoredCandidates}`);
  }

  return Object.freeze({
    typeWeights: Object.freeze(typeWeights),
    fusionWeights: Object.freeze(fusionWeights),
    lambda,
    sourcePenalty: pick(overrides.sourcePenalty, base.sourcePenalty),
    sectionPenalty: pick(overrides.sectionPenalty, base.sectionPenalty),
    maxScoredCandidates,
    snippetChars: pick(overrides.snippetChars, base.snippetChars)
  });
}

export function rerankerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RerankerConfig {
  const types = parseJsonObject(env.RAG_TYPE_WEIGHTS_JSON);
  const fusion = parseJsonObject(env.RAG_FUSION_WEIGHTS_JSON);
  return createRerankerConfig({
    typeWeights: {
      text: finiteNumber(types.text),
      image: finiteNumber(types.image),
      table: finiteNumber(types.table)
    },
    fusionWeights: {
      retrieval: finiteNumber(fusion.retrieval),
      relevance: finiteNumber(fusion.relevance),
      diversity: finiteNumber(fusion.diversity)
    },
    lambda: finiteNumber(env.RAG_MMR_LAMBDA)
  });
}

export function lexicalFactorFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const n = finiteNumber(env.RAG_LEXICAL_FACTOR);
  return n !== undefined && n > 0 ? n : DEFAULT_LEXICAL_FACTOR;
}

export function chunkingDefaultsFromEnv(env: NodeJS.ProcessEnv = process.env): ChunkingDefaults {
  const overlap = finiteNumber(env.RAG_OVERLAP_FRACTION);
  return {
    targetTokens: positiveInt(env.RAG_TARGET_TOKENS, 800),
    overlapFraction: overlap !== undefined && overlap >= 0 && overlap < 1 ? overlap : 0.1
  };
}

export function defaultSettings(env: NodeJS.ProcessEnv = process.env): RagSettings {
  const strategy = (env.RAG_RERANK_STRATEGY || 'multi_signal').toLowerCase();
  return {
    rerankStrategy: isRerankStrategy(strategy) ? strategy : 'multi_signal',
    retrievalTopK: positiveInt(env.RAG_RETRIEVAL_TOP_K, 10),
    rerankTopK: positiveInt(env.RAG_RERANK_TOP_K, 5)
  };
}

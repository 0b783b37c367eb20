import { describe, it, expect } from 'vitest';
import {
  chunkingDefaultsFromEnv,
  createRerankerConfig,
  DEFAULT_RERANKER_CONFIG,
  defaultSettings,
  lexicalFactorFromEnv,
  rerankerConfigFromEnv
} from '../src/config.js';
import { initDB } from '../src/db/client.js';
import { getSettings, updateSettings } from '../src/db/settings.js';

describe('reranker config', () => {
  it('ships frozen defaults', () => {
    expect(Object.isFrozen(DEFAULT_RERANKER_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RERANKER_CONFIG.typeWeights)).toBe(true);
    expect(DEFAULT_RERANKER_CONFIG.typeWeights).toEqual({ text: 1.0, image: 0.9, table: 1.1 });
    expect(DEFAULT_RERANKER_CONFIG.lambda).toBe(0.7);
  });

  it('normalises fusion weights', () => {
    const config = createRerankerConfig({ fusionWeights: { retrieval: 2, relevance: 1, diversity: 1 } });
    expect(config.fusionWeights.retrieval).toBeCloseTo(0.5, 10);
    expect(config.fusionWeights.relevance).toBeCloseTo(0.25, 10);
    expect(config.fusionWeights.diversity).toBeCloseTo(0.25, 10);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects out-of-range values', () => {
    expect(() => createRerankerConfig({ lambda: 1.5 })).toThrow(RangeError);
    expect(() => createRerankerConfig({ maxScoredCandidates: -1 })).toThrow(RangeError);
  });

  it('reads overrides from the environment', () => {
    const config = rerankerConfigFromEnv({
      RAG_TYPE_WEIGHTS_JSON: '{"table": 2}',
      RAG_FUSION_WEIGHTS_JSON: 'not json',
      RAG_MMR_LAMBDA: '0.5'
    });
    expect(config.typeWeights).toEqual({ text: 1.0, image: 0.9, table: 2 });
    expect(config.fusionWeights.relevance).toBeCloseTo(0.5, 10);
    expect(config.lambda).toBe(0.5);
  });

  it('falls back to defaults for unusable values', () => {
    expect(lexicalFactorFromEnv({ RAG_LEXICAL_FACTOR: '0' })).toBe(3);
    expect(lexicalFactorFromEnv({ RAG_LEXICAL_FACTOR: '4.5' })).toBe(4.5);
    expect(chunkingDefaultsFromEnv({ RAG_TARGET_TOKENS: '250', RAG_OVERLAP_FRACTION: '1.5' })).toEqual({
      targetTokens: 250,
      overlapFraction: 0.1
    });
    expect(defaultSettings({ RAG_RERANK_STRATEGY: 'CROSS_ENCODER', RAG_RETRIEVAL_TOP_K: 'abc' })).toEqual({
      rerankStrategy: 'cross_encoder',
      retrievalTopK: 10,
      rerankTopK: 5
    });
  });
});

describe('persisted settings', () => {
  it('layers stored settings over the defaults', () => {
    const ctx = initDB(':memory:');
    const before = getSettings(ctx);
    const after = updateSettings(ctx, { rerankTopK: 3 });

    expect(after).toEqual({ ...before, rerankTopK: 3 });
    expect(getSettings(ctx).rerankTopK).toBe(3);
  });
});

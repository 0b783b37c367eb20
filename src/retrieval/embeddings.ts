import { z } from 'zod';
import { EmbeddingError, errorMessage } from '../errors.js';

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

const EMBEDDING_DIMS = Number(process.env.EMBEDDING_DIMS || 384);

const openAIEmbeddingResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1)
});

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash *= 16777619;
  }
  return Math.abs(hash >>> 0);
}

function normalize(v: number[]): number[] {
  const norm = Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
  if (!norm) return v;
  return v.map((x) => x / norm);
}

export function localEmbedding(text: string, dims = EMBEDDING_DIMS): number[] {
  const vec: number[] = new Array(dims).fill(0);
  for (const token of text.toLowerCase().split(/\s+/).filter(Boolean)) {
    const idx = hashToken(token) % dims;
    vec[idx] += 1;
  }
  return normalize(vec);
}

/** Hashed bag-of-words vectors; used when no embedding API is configured. */
export function createLocalEmbedder(dims = EMBEDDING_DIMS): EmbeddingService {
  return {
    async embed(text: string): Promise<number[]> {
      if (!text.trim()) throw new EmbeddingError('Cannot embed empty text');
      return localEmbedding(text, dims);
    }
  };
}

export function createOpenAIEmbedder(options: { apiKey: string; model?: string; baseUrl?: string }): EmbeddingService {
  const model = options.model || 'text-embedding-3-small';
  const baseUrl = options.baseUrl || 'https://api.openai.com/v1';

  return {
    async embed(text: string): Promise<number[]> {
      if (!text.trim()) throw new EmbeddingError('Cannot embed empty text');

      let res: Response;
      try {
        res = await fetch(`${baseUrl}/embeddings`, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${options.apiKey}`,
            'Content-Type': 'application/json'
          },
          body: JSON.stringify({ model, input: text })
        });
      } catch (error) {
        throw new EmbeddingError(`Embedding service unreachable: ${errorMessage(error)}`, { cause: error });
      }

      if (!res.ok) {
        throw new EmbeddingError(`Embedding service returned ${res.status}`);
      }

      const parsed = openAIEmbeddingResponse.safeParse(await res.json().catch(() => null));
      if (!parsed.success) {
        throw new EmbeddingError('Embedding service returned a malformed body');
      }
      return parsed.data.data[0].embedding;
    }
  };
}

export function createEmbeddingService(env: NodeJS.ProcessEnv = process.env): EmbeddingService {
  const key = env.OPENAI_API_KEY;
  if (!key) return createLocalEmbedder();
  return createOpenAIEmbedder({ apiKey: key, model: env.OPENAI_EMBEDDING_MODEL });
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom ? dot / denom : 0;
}

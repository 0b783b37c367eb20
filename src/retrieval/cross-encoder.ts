import { z } from 'zod';
import { ExternalRerankerUnavailableError, errorMessage } from '../errors.js';

export interface CrossEncoderRequest {
  query: string;
  documents: string[];
  topK?: number;
}

/** Index into the request's documents and its relevance score, best first. */
export interface CrossEncoderResult {
  index: number;
  score: number;
}

export interface CrossEncoder {
  readonly name: string;
  rerank(request: CrossEncoderRequest, signal?: AbortSignal): Promise<CrossEncoderResult[]>;
}

const cohereRerankResponse = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number()
    })
  )
});

interface CohereRerankOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
}

/**
 * Cohere Rerank API. Any transport failure, non-2xx status or unexpected body
 * surfaces as ExternalRerankerUnavailableError.
 */
export class CohereRerankProvider implements CrossEncoder {
  readonly name = 'cohere';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(options: CohereRerankOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl || 'https://api.cohere.ai/v1';
    this.model = options.model || 'rerank-english-v3.0';
  }

  async rerank(request: CrossEncoderRequest, signal?: AbortSignal): Promise<CrossEncoderResult[]> {
    if (request.documents.length === 0) return [];

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/rerank`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          query: request.query,
          documents: request.documents,
          top_n: request.topK
        }),
        signal
      });
    } catch (error) {
      throw new ExternalRerankerUnavailableError(`Cohere rerank unreachable: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new ExternalRerankerUnavailableError(`Cohere rerank API error: ${res.status} ${body.slice(0, 200)}`.trim());
    }

    const parsed = cohereRerankResponse.safeParse(await res.json().catch(() => null));
    if (!parsed.success) {
      throw new ExternalRerankerUnavailableError('Cohere rerank returned a malformed body');
    }

    const results: CrossEncoderResult[] = [];
    for (const r of parsed.data.results) {
      if (r.index >= request.documents.length) {
        throw new ExternalRerankerUnavailableError(`Cohere rerank returned out-of-range index ${r.index}`);
      }
      results.push({ index: r.index, score: r.relevance_score });
    }
    return results.sort((a, b) => b.score - a.score);
  }
}

export function createCrossEncoder(env: NodeJS.ProcessEnv = process.env): CrossEncoder | null {
  const key = env.COHERE_API_KEY;
  if (!key) return null;
  return new CohereRerankProvider({ apiKey: key, model: env.COHERE_RERANK_MODEL });
}

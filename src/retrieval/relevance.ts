import { z } from 'zod';
import { RelevanceScoringError, errorMessage } from '../errors.js';
import type { ChunkKind } from '../types.js';

export interface RelevanceRequest {
  query: string;
  content: string;
  kind: ChunkKind;
}

/**
 * External relevance judge. Resolves to the raw score, which callers clamp;
 * anything that is not a number must reject rather than resolve to 0.
 */
export interface RelevanceScorer {
  score(request: RelevanceRequest, signal?: AbortSignal): Promise<number>;
}

const chatCompletionResponse = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1)
});

const KIND_HINTS: Record<ChunkKind, string> = {
  text: 'a passage of document text',
  image: 'a generated description of an image or chart',
  table: 'the name and SQL definition of a table extracted from the document'
};

export function buildRelevancePrompt(request: RelevanceRequest): string {
  return [
    'Rate how relevant the content below is to the question.',
    '',
    `Question: "${request.query}"`,
    `Content type: ${request.kind} (${KIND_HINTS[request.kind]})`,
    `Content: "${request.content}"`,
    '',
    'Judge meaning, not shared keywords. 1.0 means it answers the question directly,',
    '0.7-0.9 useful supporting information, 0.4-0.6 loosely related, 0.0-0.3 unrelated.',
    'Reply with the number only.'
  ].join('\n');
}

/** First whitespace-separated token as a number (decimal comma accepted), else null. */
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function parseRelevanceScore(text: string): number | null {
  const token = text.trim().split(/\s+/)[0];
  if (!token) return null;
  const numeric = token.replace(',', '.').replace(/[.;:)]+$/, '');
  if (!DECIMAL.test(numeric)) return null;
  const value = Number(numeric);
  return Number.isFinite(value) ? value : null;
}

export function createOpenAIRelevanceScorer(options: { apiKey: string; model?: string; baseUrl?: string }): RelevanceScorer {
  const model = options.model || 'gpt-4o-mini';
  const baseUrl = options.baseUrl || 'https://api.openai.com/v1';

  return {
    async score(request: RelevanceRequest, signal?: AbortSignal): Promise<number> {
      let res: Response;
      try {
        res = await fetch(`${baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${options.apiKey}`,
            'Content-Type': 'application/json'
          },
          body: JSON.stringify({
            model,
            temperature: 0,
            max_tokens: 8,
            messages: [{ role: 'user', content: buildRelevancePrompt(request) }]
          }),
          signal
        });
      } catch (error) {
        throw new RelevanceScoringError(`Relevance service unreachable: ${errorMessage(error)}`, { cause: error });
      }

      if (!res.ok) {
        throw new RelevanceScoringError(`Relevance service returned ${res.status}`);
      }

      const parsed = chatCompletionResponse.safeParse(await res.json().catch(() => null));
      if (!parsed.success) {
        throw new RelevanceScoringError('Relevance service returned a malformed body', { malformed: true });
      }

      const score = parseRelevanceScore(parsed.data.choices[0].message.content);
      if (score === null) {
        throw new RelevanceScoringError(
          `Relevance service returned a non-numeric answer: ${parsed.data.choices[0].message.content.slice(0, 40)}`,
          { malformed: true }
        );
      }
      return score;
    }
  };
}

export function createRelevanceScorer(env: NodeJS.ProcessEnv = process.env): RelevanceScorer | null {
  const key = env.OPENAI_API_KEY;
  if (!key) return null;
  return createOpenAIRelevanceScorer({ apiKey: key, model: env.OPENAI_RELEVANCE_MODEL });
}

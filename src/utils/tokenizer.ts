import { getEncoding, type Tiktoken } from 'js-tiktoken';

export interface Tokenizer {
  countTokens(text: string): number;
}

export type TokenizerName = 'cl100k_base' | 'words';

export function simpleTokenCount(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

/** Whitespace word counting; works offline and needs no vocabulary. */
export const wordTokenizer: Tokenizer = {
  countTokens: simpleTokenCount
};

let cl100k: Tiktoken | undefined;

/** BPE token counts under the `cl100k_base` vocabulary of the OpenAI models. */
export const cl100kTokenizer: Tokenizer = {
  countTokens(text) {
    cl100k ??= getEncoding('cl100k_base');
    // special-token markers in documents count as plain text
    return cl100k.encode(text, [], []).length;
  }
};

export const defaultTokenizer: Tokenizer = cl100kTokenizer;

export function getTokenizer(name: TokenizerName): Tokenizer {
  return name === 'words' ? wordTokenizer : cl100kTokenizer;
}

export function tokenizerFromEnv(env: NodeJS.ProcessEnv = process.env): Tokenizer {
  return getTokenizer(env.RAG_TOKENIZER === 'words' ? 'words' : 'cl100k_base');
}

import { describe, it, expect } from 'vitest';
import { chunkDocument, splitDocumentSections, splitToBudget } from '../src/utils/chunking.js';
import { cl100kTokenizer, simpleTokenCount, tokenizerFromEnv, wordTokenizer, type Tokenizer } from '../src/utils/tokenizer.js';

const words = (n: number, prefix = 'w') => Array.from({ length: n }, (_, i) => `${prefix}${i + 1}`).join(' ');

describe('splitDocumentSections', () => {
  it('keeps the heading line and uses the heading lineage as section id', () => {
    const sections = splitDocumentSections('# Intro\nbody\n## Scope\nmore\n# Usage\nrun it');
    expect(sections.map((s) => s.sectionId)).toEqual(['Intro', 'Intro > Scope', 'Usage']);
    expect(sections[0].content).toBe('# Intro\nbody');
    expect(sections[1].headers).toEqual(['Intro', 'Scope']);
  });

  it('gives text before the first heading a synthetic id', () => {
    const sections = splitDocumentSections('preamble\n# H\nx');
    expect(sections.map((s) => s.sectionId)).toEqual(['Section_1', 'H']);
  });

  it('ignores headings inside fenced code blocks', () => {
    const sections = splitDocumentSections('```\n# not a heading\n```\nafter');
    expect(sections).toHaveLength(1);
    expect(sections[0].sectionId).toBe('Section_1');
  });

  it('detects ALL CAPS headings only when asked and no markdown headings exist', () => {
    const text = ['SECTION ONE HEADING', 'Body one.', '', 'SECTION TWO HEADING', 'Body two.'].join('\n');
    expect(splitDocumentSections(text)).toHaveLength(1);

    const sections = splitDocumentSections(text, true);
    expect(sections.map((s) => s.sectionId)).toEqual(['SECTION ONE HEADING', 'SECTION TWO HEADING']);
    expect(sections[0].content).toBe('SECTION ONE HEADING\nBody one.');
  });

  it('detects colon-terminated headings preceded by a blank line', () => {
    const text = ['Some intro text here.', '', 'First Topic:', 'Details one.', '', 'Second Topic:', 'Details two.'].join('\n');
    const sections = splitDocumentSections(text, true);
    expect(sections.map((s) => s.sectionId)).toEqual(['Section_1', 'First Topic', 'Second Topic']);
  });
});

describe('splitToBudget', () => {
  it('prefers paragraph boundaries', () => {
    const text = [words(6, 'a'), words(6, 'b'), words(6, 'c')].join('\n\n');
    expect(splitToBudget(text, 10, 0, wordTokenizer)).toEqual([words(6, 'a'), words(6, 'b'), words(6, 'c')]);
  });

  it('falls back to single characters when no coarser unit fits', () => {
    expect(splitToBudget('abcdefghij', 0, 0, wordTokenizer).join('')).toBe('abcdefghij');
  });
});

describe('chunkDocument', () => {
  it('emits one unsplit chunk per heading for short sections', () => {
    const chunks = chunkDocument('# A\n\nshort text\n\n# B\n\nshort text', 'doc', { targetTokens: 100, tokenizer: wordTokenizer });

    expect(chunks).toHaveLength(2);
    expect(chunks.map((c) => c.chunkId)).toEqual(['doc_chunk_1', 'doc_chunk_2']);
    expect(chunks.map((c) => c.sectionId)).toEqual(['A', 'B']);
    expect(chunks.map((c) => c.metadata.isSplit)).toEqual([false, false]);
    expect(chunks[0].content).toBe('# A\n\nshort text');
    expect(chunks[0].metadata.tokenCount).toBe(4);
    expect(chunks[0].embedding).toBeNull();
  });

  it('splits an oversized section with the configured overlap', () => {
    const chunks = chunkDocument(words(25), 'doc', { targetTokens: 10, overlapFraction: 0.2, tokenizer: wordTokenizer });

    expect(chunks.map((c) => c.content)).toEqual([
      'w1 w2 w3 w4 w5 w6 w7 w8 w9 w10',
      'w9 w10 w11 w12 w13 w14 w15 w16 w17 w18',
      'w17 w18 w19 w20 w21 w22 w23 w24 w25'
    ]);
    expect(chunks.every((c) => c.sectionId === 'Section_1')).toBe(true);
    expect(chunks.every((c) => c.metadata.isSplit === true)).toBe(true);
    expect(chunks.map((c) => c.metadata.tokenCount)).toEqual([10, 10, 9]);
  });

  it('never exceeds the token budget for splittable text', () => {
    const text = ['# Long', ...Array.from({ length: 12 }, (_, i) => `${words(7, `p${i}x`)}.`)].join('\n\n');
    const chunks = chunkDocument(text, 'long', { targetTokens: 20, overlapFraction: 0.1, tokenizer: wordTokenizer });

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(simpleTokenCount(chunk.content)).toBeLessThanOrEqual(20);
      expect(chunk.sectionId).toBe('Long');
    }
  });

  it('keeps split chunks within a BPE token budget by default', () => {
    const text = ['# Long', ...Array.from({ length: 12 }, (_, i) => `${words(7, `p${i}x`)}.`)].join('\n\n');
    const chunks = chunkDocument(text, 'bpe', { targetTokens: 30, overlapFraction: 0.1 });

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.metadata.isSplit).toBe(true);
      expect(chunk.metadata.tokenCount).toBe(cl100kTokenizer.countTokens(chunk.content));
      expect(chunk.metadata.tokenCount).toBeLessThanOrEqual(30);
    }
  });

  it('counts BPE tokens rather than words', () => {
    expect(cl100kTokenizer.countTokens('')).toBe(0);
    expect(cl100kTokenizer.countTokens('hello world')).toBe(2);
    expect(cl100kTokenizer.countTokens('before <|endoftext|> after')).toBeGreaterThan(3);
  });

  it('selects the word tokenizer from the environment', () => {
    expect(tokenizerFromEnv({ RAG_TOKENIZER: 'words' })).toBe(wordTokenizer);
    expect(tokenizerFromEnv({})).toBe(cl100kTokenizer);
  });

  it('is deterministic', () => {
    const text = '# One\n' + words(40) + '\n# Two\n' + words(5);
    expect(chunkDocument(text, 'd', { targetTokens: 15 })).toEqual(chunkDocument(text, 'd', { targetTokens: 15 }));
  });

  it('returns nothing for an empty or whitespace document', () => {
    expect(chunkDocument('', 'doc')).toEqual([]);
    expect(chunkDocument('  \n\t ', 'doc')).toEqual([]);
  });

  it('rejects invalid options', () => {
    expect(() => chunkDocument('text', 'doc', { targetTokens: 0 })).toThrow(RangeError);
    expect(() => chunkDocument('text', 'doc', { targetTokens: 2.5 })).toThrow(RangeError);
    expect(() => chunkDocument('text', 'doc', { overlapFraction: 1 })).toThrow(RangeError);
    expect(() => chunkDocument('text', 'doc', { overlapFraction: -0.1 })).toThrow(RangeError);
  });

  it('propagates tokenizer failures', () => {
    const tokenizer: Tokenizer = {
      countTokens: () => {
        throw new Error('tokenizer offline');
      }
    };
    expect(() => chunkDocument('hello world', 'doc', { tokenizer })).toThrow('tokenizer offline');
  });
});

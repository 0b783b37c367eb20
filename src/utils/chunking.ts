import type { TextChunk } from '../types.js';
import { type Tokenizer, defaultTokenizer } from './tokenizer.js';

export interface ChunkingOptions {
  targetTokens?: number;
  overlapFraction?: number;
  tokenizer?: Tokenizer;
  /** Treat ALL CAPS lines and short colon-terminated lines as headings when the text has no markdown headings. */
  plainTextHeadings?: boolean;
}

export interface DocumentSection {
  sectionId: string;
  headers: string[];
  content: string;
  index: number;
}

interface Budget {
  target: number;
  overlap: number;
  count: (text: string) => number;
}

interface Separator {
  name: 'paragraph' | 'line' | 'sentence' | 'word' | 'character';
  split: (text: string) => string[];
  joiner: string;
}

const SEPARATORS: readonly Separator[] = [
  { name: 'paragraph', split: (t) => t.split(/\n\s*\n/), joiner: '\n\n' },
  { name: 'line', split: (t) => t.split('\n'), joiner: '\n' },
  { name: 'sentence', split: (t) => t.split(/(?<=[.!?])\s+/), joiner: ' ' },
  { name: 'word', split: (t) => t.split(/\s+/), joiner: ' ' },
  { name: 'character', split: (t) => Array.from(t), joiner: '' }
];

const MARKDOWN_HEADING = /^(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const CODE_FENCE = /^\s*(```|~~~)/;

/* ------------------------------------------------------------------ */
/*  Structural pass                                                    */
/* ------------------------------------------------------------------ */

function isAllCapsHeading(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed) return false;
  const words = trimmed.split(/\s+/);
  if (words.length < 2 || trimmed.length > 120) return false;
  return /[A-Z]/.test(trimmed) && !/[a-z]/.test(trimmed);
}

function isColonHeading(line: string, prevLine: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length > 120) return false;
  if (!trimmed.endsWith(':')) return false;
  if (trimmed.split(/\s+/).length > 10) return false;
  return prevLine.trim() === '';
}

type HeadingDetector = (line: string, prevLine: string) => { level: number; title: string } | null;

const markdownHeading: HeadingDetector = (line) => {
  const match = MARKDOWN_HEADING.exec(line);
  return match ? { level: match[1].length, title: match[2].trim() } : null;
};

const plainTextHeading: HeadingDetector = (line, prevLine) =>
  isAllCapsHeading(line) || isColonHeading(line, prevLine) ? { level: 1, title: line.trim().replace(/:$/, '') } : null;

function splitWith(lines: string[], detect: HeadingDetector): Array<{ headers: string[]; lines: string[] }> {
  const groups: Array<{ headers: string[]; lines: string[] }> = [];
  const lineage: Array<{ level: number; title: string }> = [];
  let current: { headers: string[]; lines: string[] } = { headers: [], lines: [] };
  let fence: string | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const fenceMatch = CODE_FENCE.exec(line);
    if (fenceMatch) {
      if (fence === null) fence = fenceMatch[1];
      else if (fenceMatch[1] === fence) fence = null;
      current.lines.push(line);
      continue;
    }

    const heading = fence === null ? detect(line, i > 0 ? lines[i - 1] : '') : null;
    if (!heading) {
      current.lines.push(line);
      continue;
    }

    groups.push(current);
    while (lineage.length > 0 && lineage[lineage.length - 1].level >= heading.level) lineage.pop();
    lineage.push(heading);
    current = { headers: lineage.map((h) => h.title), lines: [line] };
  }
  groups.push(current);
  return groups;
}

/**
 * Split a document along its headings. Each section keeps its heading line and
 * carries the heading lineage ("Intro > Scope") as its section id; text outside
 * any heading gets a synthetic `Section_<n>` id.
 */
export function splitDocumentSections(text: string, plainTextHeadings = false): DocumentSection[] {
  const lines = text.split(/\r?\n/);
  let groups = splitWith(lines, markdownHeading);
  if (plainTextHeadings && groups.every((g) => g.headers.length === 0)) {
    groups = splitWith(lines, plainTextHeading);
  }

  const sections: DocumentSection[] = [];
  for (const group of groups) {
    const content = group.lines.join('\n').trim();
    if (!content) continue;
    const index = sections.length;
    sections.push({
      sectionId: group.headers.length > 0 ? group.headers.join(' > ') : `Section_${index + 1}`,
      headers: group.headers,
      content,
      index
    });
  }
  return sections;
}

/* ------------------------------------------------------------------ */
/*  Budget pass                                                        */
/* ------------------------------------------------------------------ */

function mergePieces(pieces: string[], joiner: string, budget: Budget): string[] {
  const merged: string[] = [];
  let window: string[] = [];
  // measured on the joined text: BPE counts are not additive across pieces
  const fits = (parts: string[]) => budget.count(parts.join(joiner)) <= budget.target;

  for (const text of pieces) {
    if (window.length > 0 && !fits([...window, text])) {
      merged.push(window.join(joiner));
      // keep only the trailing pieces that fit in the overlap and still leave room
      while (window.length > 0 && (budget.count(window.join(joiner)) > budget.overlap || !fits([...window, text]))) {
        window = window.slice(1);
      }
    }
    window.push(text);
  }

  if (window.length > 0) merged.push(window.join(joiner));
  return merged;
}

function recursiveSplit(text: string, separators: readonly Separator[], budget: Budget): string[] {
  const [separator, ...rest] = separators;
  const raw = separator.split(text);
  const pieces = separator.name === 'character' ? raw : raw.map((p) => p.trim()).filter(Boolean);

  if (pieces.length <= 1 && rest.length > 0) {
    return recursiveSplit(text, rest, budget);
  }

  const chunks: string[] = [];
  let pending: string[] = [];
  for (const piece of pieces) {
    if (budget.count(piece) <= budget.target) {
      pending.push(piece);
      continue;
    }
    if (pending.length > 0) {
      chunks.push(...mergePieces(pending, separator.joiner, budget));
      pending = [];
    }
    if (rest.length === 0) {
      // a single indivisible unit larger than the budget
      chunks.push(piece);
    } else {
      chunks.push(...recursiveSplit(piece, rest, budget));
    }
  }
  if (pending.length > 0) chunks.push(...mergePieces(pending, separator.joiner, budget));

  return chunks.filter((c) => c.trim().length > 0);
}

export function splitToBudget(text: string, targetTokens: number, overlapTokens: number, tokenizer: Tokenizer = defaultTokenizer): string[] {
  return recursiveSplit(text, SEPARATORS, {
    target: targetTokens,
    overlap: overlapTokens,
    count: (t) => tokenizer.countTokens(t)
  });
}

/* ------------------------------------------------------------------ */
/*  Two-pass chunking                                                  */
/* ------------------------------------------------------------------ */

/**
 * Two-pass hierarchical chunking: headings first, then the token budget.
 * Chunk ids are `<sourceDocument>_chunk_<n>` in reading order, so the same
 * input always yields the same ids.
 */
export function chunkDocument(text: string, sourceDocument: string, options: ChunkingOptions = {}): TextChunk[] {
  const targetTokens = options.targetTokens ?? 800;
  const overlapFraction = options.overlapFraction ?? 0.1;
  const tokenizer = options.tokenizer ?? defaultTokenizer;

  if (!Number.isInteger(targetTokens) || targetTokens < 1) {
    throw new RangeError(`targetTokens must be a positive integer, got ${targetTokens}`);
  }
  if (!(overlapFraction >= 0 && overlapFraction < 1)) {
    throw new RangeError(`overlapFraction must be within [0, 1), got ${overlapFraction}`);
  }
  if (!text.trim()) return [];

  const overlapTokens = Math.floor(targetTokens * overlapFraction);
  const chunks: TextChunk[] = [];

  const emit = (section: DocumentSection, content: string, tokenCount: number, isSplit: boolean): void => {
    chunks.push({
      kind: 'text',
      chunkId: `${sourceDocument}_chunk_${chunks.length + 1}`,
      sectionId: section.sectionId,
      sourceDocument,
      content,
      embedding: null,
      metadata: {
        headers: section.headers,
        sectionIndex: section.index,
        tokenCount,
        isSplit
      }
    });
  };

  for (const section of splitDocumentSections(text, options.plainTextHeadings)) {
    const tokenCount = tokenizer.countTokens(section.content);
    if (tokenCount <= targetTokens) {
      emit(section, section.content, tokenCount, false);
      continue;
    }
    for (const piece of splitToBudget(section.content, targetTokens, overlapTokens, tokenizer)) {
      emit(section, piece, tokenizer.countTokens(piece), true);
    }
  }

  return chunks;
}

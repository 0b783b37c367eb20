export type ChunkKind = 'text' | 'image' | 'table';

export const CHUNK_KINDS: readonly ChunkKind[] = ['text', 'image', 'table'];

export type VectorChunkKind = Exclude<ChunkKind, 'table'>;

export type ChunkMetadata = Record<string, unknown>;

interface ChunkBase {
  chunkId: string;
  sectionId: string;
  sourceDocument: string;
  embedding: number[] | null;
  metadata: ChunkMetadata;
}

export interface TextChunk extends ChunkBase {
  kind: 'text';
  content: string;
}

export interface ImageChunk extends ChunkBase {
  kind: 'image';
  imageType: string;
  summary: string;
}

export interface TableChunk extends ChunkBase {
  kind: 'table';
  tableName: string;
  definition: string;
}

export type Chunk = TextChunk | ImageChunk | TableChunk;

export type RetrievalMethod = 'vector_similarity' | 'keyword_matching';

export interface RetrievalCandidate {
  chunk: Chunk;
  similarityScore: number;
  retrievalMethod: RetrievalMethod;
}

export type RelevanceFallbackReason = 'unavailable' | 'malformed' | 'cancelled' | 'not_sent';

export type RelevanceOutcome =
  | { status: 'scored' }
  | { status: 'fallback'; reason: RelevanceFallbackReason; detail?: string };

export interface TypeWeightedCandidate extends RetrievalCandidate {
  typeWeight: number;
  weightedScore: number;
}

export interface RelevanceScoredCandidate extends TypeWeightedCandidate {
  llmRelevanceScore: number;
  relevance: RelevanceOutcome;
}

export interface DiversityAdjustedCandidate extends RelevanceScoredCandidate {
  diversityPenalty: number;
  mmrScore: number;
}

export interface RankedCandidate extends DiversityAdjustedCandidate {
  finalScore: number;
}

export interface CrossEncodedCandidate extends RetrievalCandidate {
  crossEncoderScore: number;
  finalScore: number;
}

export type RerankStrategy = 'multi_signal' | 'cross_encoder';

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/** The text a chunk is embedded, scored and displayed by. */
export function chunkPayload(chunk: Chunk): string {
  switch (chunk.kind) {
    case 'text':
      return chunk.content;
    case 'image':
      return chunk.summary;
    case 'table':
      return `Table: ${chunk.tableName}\nSQL: ${chunk.definition}`;
    default:
      return assertNever(chunk);
  }
}

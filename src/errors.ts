import type { ChunkKind } from './types.js';

export class EmbeddingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingError';
  }
}

export class StoreUnavailableError extends Error {
  readonly kind: ChunkKind;

  constructor(kind: ChunkKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
    this.kind = kind;
  }
}

export class ExternalRerankerUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExternalRerankerUnavailableError';
  }
}

export class RelevanceScoringError extends Error {
  readonly malformed: boolean;

  constructor(message: string, options?: { cause?: unknown; malformed?: boolean }) {
    super(message, options);
    this.name = 'RelevanceScoringError';
    this.malformed = options?.malformed ?? false;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

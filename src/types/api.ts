import type { SourceReference } from './index';

// Wire types for the HTTP surface
export interface ApiQueryResponse {
  answer: string;
  sources: SourceReference[];
}

export interface ApiStatusResponse {
  status: 'success';
  message: string;
  details?: {
    file_path: string;
  };
}

export interface ApiFileResult {
  filename: string;
  status: 'success' | 'skipped' | 'error';
  message: string;
}

export interface ApiStatsResponse {
  total_documents: number;
  collection_name: string;
  embedding_model: string;
  llm_model: string;
}

export interface ApiErrorResponse {
  detail: string;
}

// Error types
export type RagErrorCode =
  | 'VALIDATION_ERROR'
  | 'EXTRACTION_FAILED'
  | 'ARITY_MISMATCH'
  | 'MODEL_LOAD_FAILED'
  | 'EMBEDDING_FAILED'
  | 'STORE_FAILED'
  | 'GENERATION_FAILED';

export class RagError extends Error {
  constructor(
    message: string,
    public code: RagErrorCode,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'RagError';
  }
}

export class ValidationError extends RagError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

/** The source file could not be opened or parsed */
export class ExtractionError extends RagError {
  constructor(message: string) {
    super(message, 'EXTRACTION_FAILED');
    this.name = 'ExtractionError';
  }
}

/** Chunk and embedding counts disagree; always an internal bug */
export class ArityMismatchError extends RagError {
  constructor(expected: number, actual: number) {
    super(`Expected ${expected} embeddings but got ${actual}`, 'ARITY_MISMATCH');
    this.name = 'ArityMismatchError';
  }
}

export class ModelLoadError extends RagError {
  constructor(message: string) {
    super(message, 'MODEL_LOAD_FAILED');
    this.name = 'ModelLoadError';
  }
}

export class EmbeddingError extends RagError {
  constructor(message: string) {
    super(message, 'EMBEDDING_FAILED');
    this.name = 'EmbeddingError';
  }
}

export class StoreError extends RagError {
  constructor(message: string) {
    super(message, 'STORE_FAILED');
    this.name = 'StoreError';
  }
}

export class GenerationError extends RagError {
  constructor(message: string) {
    super(message, 'GENERATION_FAILED');
    this.name = 'GenerationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Core types for the RAG pipeline
export type FileType = 'pdf' | 'excel';

export type MetadataValue = string | number | boolean;

/**
 * Open extension map for metadata keys the pipeline does not know about,
 * such as fields supplied by the uploader.
 */
export type MetadataExtension = Record<string, MetadataValue>;

export interface SourceDocument {
  path: string;
  fileType: FileType;
}

export interface RecordMetadata {
  sourceFile: string;
  fileName: string;
  fileType: FileType;
  /** 1-based page number, PDF records only */
  page?: number;
  /** 0-based data row index, spreadsheet records only */
  rowIndex?: number;
  extra?: MetadataExtension;
}

/** One page of a PDF or one row of a spreadsheet */
export interface DocumentRecord {
  text: string;
  metadata: RecordMetadata;
}

export interface ChunkMetadata extends RecordMetadata {
  chunkIndex: number;
}

export interface DocumentChunk {
  content: string;
  metadata: ChunkMetadata;
}

export interface StoredMetadata extends ChunkMetadata {
  docIndex: number;
  contentLength: number;
}

export interface StoredDocument {
  id: string;
  content: string;
  embedding: number[];
  metadata: StoredMetadata;
}

export interface SearchResult {
  id: string;
  content: string;
  score: number;
  metadata: StoredMetadata;
}

export interface SourceReference {
  content: string;
  metadata: StoredMetadata;
  relevance_rank: number;
}

export interface QueryResponse {
  answer: string;
  sources: SourceReference[];
}

export interface IngestResult {
  fileName: string;
  fileType: FileType;
  recordsCount: number;
  chunksCount: number;
  processingTime: number;
}

export interface PathIngestResult {
  file: string;
  status: 'success' | 'error';
  chunksCount?: number;
  error?: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface IngestOptions extends OperationOptions {
  extra?: MetadataExtension;
}

export interface CollectionStats {
  totalDocuments: number;
  collectionName: string;
  embeddingModel: string;
  llmModel: string;
}

// Configuration types
export interface RagConfig {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  embeddingModel: string;
  llmModel: string;
  llmTemperature: number;
  groqApiKey?: string;
  vectorDbPath: string;
  collectionName: string;
  uploadDir: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
  maxFileSizeMb: number;
  requestTimeoutMs: number;
}

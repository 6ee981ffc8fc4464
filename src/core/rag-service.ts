import * as path from 'path';
import * as fs from 'fs';
import { logger } from '../utils/logger';
import type { Config } from '../config';
import { DocumentLoader, fileTypeFor } from './document-loader';
import { TextChunker } from './chunker';
import { LocalEmbeddingService, type Embedder } from './embeddings';
import { PersistentVectorDB } from './vector-db';
import { GroqAnswerGenerator, type AnswerGenerator } from './llm';
import { RAGRetriever, buildContext } from './retriever';
import { ValidationError, errorMessage } from '../types/api';
import type {
  CollectionStats,
  IngestOptions,
  IngestResult,
  OperationOptions,
  PathIngestResult,
  QueryResponse,
  SourceDocument
} from '../types';

export const NO_RELEVANT_DOCUMENTS = 'No relevant documents found in the database.';

export interface RAGServiceDeps {
  loader: DocumentLoader;
  chunker: TextChunker;
  embeddings: Embedder;
  vectorDb: PersistentVectorDB;
  generator: AnswerGenerator;
  defaultTopK: number;
}

/**
 * Wires loader, chunker, embedder, store and language model into the two
 * pipeline operations: ingest a source and answer a question.
 */
export class RAGService {
  private readonly loader: DocumentLoader;
  private readonly chunker: TextChunker;
  private readonly embeddings: Embedder;
  private readonly vectorDb: PersistentVectorDB;
  private readonly generator: AnswerGenerator;
  private readonly retriever: RAGRetriever;
  public readonly defaultTopK: number;

  constructor(deps: RAGServiceDeps) {
    this.loader = deps.loader;
    this.chunker = deps.chunker;
    this.embeddings = deps.embeddings;
    this.vectorDb = deps.vectorDb;
    this.generator = deps.generator;
    this.defaultTopK = deps.defaultTopK;
    this.retriever = new RAGRetriever(this.embeddings, this.vectorDb, this.generator);
  }

  /**
   * Load, chunk, embed and store one source. Any stage failing aborts the
   * whole source; nothing reaches the store unless every stage succeeded.
   */
  async ingest(source: SourceDocument, options: IngestOptions = {}): Promise<IngestResult> {
    const { signal, extra } = options;
    const startTime = Date.now();
    const fileName = path.basename(source.path);

    try {
      logger.info(`Ingesting ${source.fileType} document: ${fileName}`);
      signal?.throwIfAborted();

      const records = await this.loader.load(source, extra);
      signal?.throwIfAborted();

      const chunks = await this.chunker.split(records);
      logger.debug('Chunk statistics', { ...this.chunker.getChunkStats(chunks) });
      signal?.throwIfAborted();

      const embeddings = await this.embeddings.generateEmbeddings(chunks.map(chunk => chunk.content));
      signal?.throwIfAborted();

      await this.vectorDb.insert(chunks, embeddings);

      const processingTime = Date.now() - startTime;
      logger.info('Document ingested successfully', {
        file: fileName,
        records: records.length,
        chunks: chunks.length,
        processingTime: `${processingTime}ms`
      });

      return {
        fileName,
        fileType: source.fileType,
        recordsCount: records.length,
        chunksCount: chunks.length,
        processingTime
      };
    } catch (error) {
      logger.error(`Document ingestion failed: ${fileName}`, error);
      throw error;
    }
  }

  /**
   * Ingest a single supported file, or every supported file below a directory.
   * Files are ingested one at a time and a failure only marks that file.
   */
  async ingestPath(targetPath: string, options: IngestOptions = {}): Promise<PathIngestResult[]> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(targetPath);
    } catch {
      throw new ValidationError(`Path does not exist: ${targetPath}`);
    }

    let files: string[];
    if (stats.isDirectory()) {
      files = await this.findSupportedFiles(targetPath);
      if (files.length === 0) {
        throw new ValidationError(`No PDF or Excel files found in directory: ${targetPath}`);
      }
    } else {
      if (!fileTypeFor(targetPath)) {
        throw new ValidationError('Only PDF and Excel files are supported');
      }
      files = [targetPath];
    }

    const results: PathIngestResult[] = [];
    for (const file of files) {
      const fileType = fileTypeFor(file);
      if (!fileType) continue;

      try {
        const result = await this.ingest({ path: file, fileType }, options);
        results.push({ file, status: 'success', chunksCount: result.chunksCount });
      } catch (error) {
        results.push({ file, status: 'error', error: errorMessage(error) });
      }
    }
    return results;
  }

  async answer(question: string, topK: number = this.defaultTopK, options: OperationOptions = {}): Promise<QueryResponse> {
    const { signal } = options;
    const startTime = Date.now();

    logger.info(`Processing query: "${question}"`, { topK });
    signal?.throwIfAborted();

    const results = await this.retriever.retrieve(question, topK);
    if (results.length === 0) {
      return { answer: NO_RELEVANT_DOCUMENTS, sources: [] };
    }
    signal?.throwIfAborted();

    const answer = await this.retriever.generateAnswer(question, buildContext(results), signal);

    logger.performance('Query', Date.now() - startTime, { resultsCount: results.length });

    return {
      answer,
      sources: results.map((result, i) => ({
        content: result.content,
        metadata: result.metadata,
        relevance_rank: i + 1
      }))
    };
  }

  async count(): Promise<number> {
    return this.vectorDb.count();
  }

  async reset(): Promise<void> {
    await this.vectorDb.reset();
  }

  async getStats(): Promise<CollectionStats> {
    return {
      totalDocuments: await this.vectorDb.count(),
      collectionName: this.vectorDb.collectionName,
      embeddingModel: this.embeddings.modelName,
      llmModel: this.generator.modelName
    };
  }

  private async findSupportedFiles(dirPath: string): Promise<string[]> {
    const files: string[] = [];
    const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.findSupportedFiles(fullPath)));
      } else if (fileTypeFor(entry.name)) {
        files.push(fullPath);
      }
    }
    return files;
  }
}

/**
 * Build the process-wide service from configuration. The embedder and the
 * store handle are created here once and shared by every request.
 */
export function createRagService(config: Config): RAGService {
  const { rag } = config;
  return new RAGService({
    loader: new DocumentLoader(),
    chunker: new TextChunker(rag.chunkSize, rag.chunkOverlap),
    embeddings: new LocalEmbeddingService({ modelName: rag.embeddingModel }),
    vectorDb: new PersistentVectorDB({ directory: rag.vectorDbPath, collectionName: rag.collectionName }),
    generator: new GroqAnswerGenerator({
      apiKey: rag.groqApiKey,
      modelName: rag.llmModel,
      temperature: rag.llmTemperature
    }),
    defaultTopK: rag.topK
  });
}

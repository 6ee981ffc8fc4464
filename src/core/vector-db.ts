import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { ArityMismatchError, StoreError, errorMessage } from '../types/api';
import type { DocumentChunk, SearchResult, StoredDocument } from '../types';

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const storedDocumentSchema = z.object({
  id: z.string(),
  content: z.string(),
  embedding: z.array(z.number()),
  metadata: z.object({
    sourceFile: z.string(),
    fileName: z.string(),
    fileType: z.enum(['pdf', 'excel']),
    page: z.number().int().optional(),
    rowIndex: z.number().int().optional(),
    extra: z.record(metadataValueSchema).optional(),
    chunkIndex: z.number().int(),
    docIndex: z.number().int(),
    contentLength: z.number().int()
  })
});

const collectionFileSchema = z.array(storedDocumentSchema);

export interface VectorStoreOptions {
  directory: string;
  collectionName: string;
}

/**
 * Cosine similarity; 0 when either vector has no magnitude
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * A single named collection persisted as one JSON file. Every operation runs
 * behind one lock so inserts, queries and resets never interleave.
 */
export class PersistentVectorDB {
  public readonly collectionName: string;
  private readonly directory: string;
  private documents: StoredDocument[] = [];
  private initialized = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: VectorStoreOptions) {
    this.directory = options.directory;
    this.collectionName = options.collectionName;
  }

  get filePath(): string {
    return path.join(this.directory, `${this.collectionName}.json`);
  }

  /**
   * Store chunks with their embeddings. The collection file is replaced
   * atomically, so either the whole batch is persisted or none of it.
   */
  insert(chunks: DocumentChunk[], embeddings: number[][]): Promise<void> {
    return this.exclusive(async () => {
      if (chunks.length !== embeddings.length) {
        throw new ArityMismatchError(chunks.length, embeddings.length);
      }
      if (chunks.length === 0) {
        return;
      }

      const startTime = Date.now();
      this.checkDimensions(embeddings);

      const batchId = uuidv4();
      const added: StoredDocument[] = chunks.map((chunk, i) => ({
        id: `${batchId}_chunk_${i}`,
        content: chunk.content,
        embedding: embeddings[i],
        metadata: {
          ...chunk.metadata,
          docIndex: i,
          contentLength: chunk.content.length
        }
      }));

      const next = [...this.documents, ...added];
      await this.persist(next);
      this.documents = next;

      logger.performance('Vector store insert', Date.now() - startTime, {
        collection: this.collectionName,
        added: added.length,
        total: next.length
      });
    });
  }

  /**
   * The k most similar records, closest first; equal scores keep insertion order
   */
  query(queryEmbedding: number[], k: number): Promise<SearchResult[]> {
    return this.exclusive(async () => {
      if (this.documents.length === 0 || k < 1) {
        return [];
      }

      const dimension = this.documents[0].embedding.length;
      if (queryEmbedding.length !== dimension) {
        throw new StoreError(
          `Query vector has ${queryEmbedding.length} dimensions, collection uses ${dimension}`
        );
      }

      // Array.prototype.sort is stable, so ties stay in insertion order
      const ranked = this.documents
        .map(doc => ({ doc, score: cosineSimilarity(queryEmbedding, doc.embedding) }))
        .sort((a, b) => b.score - a.score)
        .slice(0, k);

      // Callers get copies; stored records are never handed out
      return ranked.map(({ doc, score }) => {
        const { extra, ...metadata } = doc.metadata;
        return {
          id: doc.id,
          content: doc.content,
          score,
          metadata: extra ? { ...metadata, extra: { ...extra } } : metadata
        };
      });
    });
  }

  /**
   * Drop every record and leave an empty collection behind
   */
  reset(): Promise<void> {
    return this.exclusive(async () => {
      await this.persist([]);
      this.documents = [];
      logger.info(`Collection '${this.collectionName}' reset successfully`);
    });
  }

  count(): Promise<number> {
    return this.exclusive(async () => this.documents.length);
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      await this.ensureInitialized();
      return task();
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initialized) return;

    this.documents = await this.loadFromDisk();
    this.initialized = true;
    logger.info(`Vector store '${this.collectionName}' loaded with ${this.documents.length} records`);
  }

  private async loadFromDisk(): Promise<StoredDocument[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new StoreError(`Cannot read collection ${this.collectionName}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`Collection file ${this.filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const result = collectionFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StoreError(`Collection file ${this.filePath} is malformed: ${result.error.message}`);
    }
    return result.data;
  }

  private async persist(documents: StoredDocument[]): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(this.directory, { recursive: true });
      await fs.promises.writeFile(tempPath, JSON.stringify(documents));
      await fs.promises.rename(tempPath, this.filePath);
      logger.debug(`Saved collection ${this.collectionName} to disk`);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      logger.error(`Failed to save collection ${this.collectionName}`, error);
      throw new StoreError(`Failed to persist collection ${this.collectionName}: ${errorMessage(error)}`);
    }
  }

  private checkDimensions(embeddings: number[][]): void {
    const dimension = this.documents[0]?.embedding.length ?? embeddings[0].length;
    if (dimension === 0) {
      throw new StoreError('Embeddings must not be empty');
    }
    const bad = embeddings.findIndex(embedding => embedding.length !== dimension);
    if (bad !== -1) {
      throw new StoreError(
        `Embedding ${bad} has ${embeddings[bad].length} dimensions, expected ${dimension}`
      );
    }
  }
}

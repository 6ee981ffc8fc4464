import { logger } from '../utils/logger';
import { cache as sharedCache, type Cache } from '../utils/cache';
import { ArityMismatchError, EmbeddingError, ModelLoadError, errorMessage } from '../types/api';

/** Turns one string into one vector */
export type FeatureExtractor = (text: string) => Promise<number[]>;

export type ExtractorLoader = (modelName: string) => Promise<FeatureExtractor>;

export interface Embedder {
  readonly modelName: string;
  generateEmbeddings(texts: string[]): Promise<number[][]>;
  generateQueryEmbedding(text: string): Promise<number[]>;
}

export interface EmbeddingServiceOptions {
  modelName: string;
  loader?: ExtractorLoader;
  /** Pass false to bypass the process-wide embedding cache */
  cache?: Cache | false;
  batchSize?: number;
}

/**
 * Loads a sentence-transformers model through @xenova/transformers.
 * Mean pooling with normalization gives unit-length sentence vectors.
 */
export const loadTransformersExtractor: ExtractorLoader = async (modelName) => {
  const { pipeline } = await import('@xenova/transformers');
  const extractor = await pipeline('feature-extraction', modelName);

  return async (text: string) => {
    const output = await extractor(text, {
      pooling: 'mean',
      normalize: true
    });
    return Array.from(output.data, Number);
  };
};

export class LocalEmbeddingService implements Embedder {
  public readonly modelName: string;
  private readonly loader: ExtractorLoader;
  private readonly cache: Cache | false;
  private readonly batchSize: number;
  private loading: Promise<FeatureExtractor> | null = null;
  private initialized = false;

  constructor(options: EmbeddingServiceOptions) {
    this.modelName = options.modelName;
    this.loader = options.loader ?? loadTransformersExtractor;
    this.cache = options.cache ?? sharedCache;
    this.batchSize = options.batchSize ?? 50;
  }

  /**
   * Load the model once. The first outcome is memoized: after a failed load
   * every call rejects with the same ModelLoadError without retrying.
   */
  initialize(): Promise<FeatureExtractor> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<FeatureExtractor> {
    const startTime = Date.now();
    logger.info(`Initializing embedding model: ${this.modelName}`);

    try {
      const extractor = await this.loader(this.modelName);
      this.initialized = true;
      logger.performance('Embedding model load', Date.now() - startTime, { model: this.modelName });
      return extractor;
    } catch (error) {
      logger.error(`Failed to load embedding model ${this.modelName}`, error);
      throw new ModelLoadError(`Embedding model initialization failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Generate embeddings for multiple texts, in input order
   */
  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    const extractor = await this.initialize();
    const startTime = Date.now();
    const embeddings: number[][] = [];

    logger.debug(`Generating embeddings for ${texts.length} texts (batched)`);

    for (let batchStart = 0; batchStart < texts.length; batchStart += this.batchSize) {
      const batch = texts.slice(batchStart, batchStart + this.batchSize);
      const batchEmbeddings = await Promise.all(batch.map(text => this.embed(extractor, text)));
      embeddings.push(...batchEmbeddings);
      logger.debug(`Processed ${embeddings.length}/${texts.length} embeddings`);
    }

    if (embeddings.length !== texts.length) {
      throw new ArityMismatchError(texts.length, embeddings.length);
    }

    if (texts.length > 0) {
      const processingTime = Date.now() - startTime;
      logger.performance('Embedding generation', processingTime, {
        textsCount: texts.length,
        averageTimePerText: Math.round(processingTime / texts.length)
      });
    }

    return embeddings;
  }

  async generateQueryEmbedding(text: string): Promise<number[]> {
    const extractor = await this.initialize();
    return this.embed(extractor, text);
  }

  getModelInfo(): { name: string; initialized: boolean } {
    return {
      name: this.modelName,
      initialized: this.initialized
    };
  }

  private async embed(extractor: FeatureExtractor, text: string): Promise<number[]> {
    const cached = this.cache ? this.cache.getEmbedding(this.modelName, text) : undefined;
    if (cached) {
      return cached;
    }

    let embedding: number[];
    try {
      embedding = await extractor(text);
    } catch (error) {
      logger.error('Embedding generation failed', error);
      throw new EmbeddingError(`Failed to generate embedding: ${errorMessage(error)}`);
    }

    if (this.cache) {
      this.cache.setEmbedding(this.modelName, text, embedding);
    }
    return embedding;
  }
}

import NodeCache from 'node-cache';
import { createHash } from 'crypto';
import { logger } from './logger';

export class Cache {
  private static instance: Cache;
  private cache: NodeCache;

  private constructor() {
    const ttl = parseInt(process.env.CACHE_TTL || '3600');
    this.cache = new NodeCache({
      stdTTL: isNaN(ttl) ? 3600 : ttl, // seconds
      checkperiod: 600,
      useClones: false,
      deleteOnExpire: true
    });

    this.cache.on('expired', (key: string) => {
      logger.debug(`Cache expired: ${key}`);
    });
  }

  public static getInstance(): Cache {
    if (!Cache.instance) {
      Cache.instance = new Cache();
    }
    return Cache.instance;
  }

  public set<T>(key: string, value: T): boolean {
    try {
      return this.cache.set(key, value);
    } catch (error) {
      logger.error('Cache set error', error);
      return false;
    }
  }

  public get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  // Embeddings are keyed by model so two models never share vectors
  public setEmbedding(model: string, text: string, embedding: number[]): boolean {
    return this.set(this.embeddingKey(model, text), embedding);
  }

  public getEmbedding(model: string, text: string): number[] | undefined {
    return this.get<number[]>(this.embeddingKey(model, text));
  }

  private embeddingKey(model: string, text: string): string {
    const digest = createHash('sha256').update(model).update('\0').update(text).digest('hex');
    return `embedding:${digest}`;
  }
}

export const cache = Cache.getInstance();

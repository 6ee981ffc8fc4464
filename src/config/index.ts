import type { RagConfig, ServerConfig } from '../types';

type Env = Record<string, string | undefined>;

export class Config {
  private static instance: Config;
  public readonly rag: RagConfig;
  public readonly server: ServerConfig;

  constructor(env: Env = process.env) {
    this.rag = {
      chunkSize: parseInt(env.RAG_CHUNK_SIZE || '500'),
      chunkOverlap: parseInt(env.RAG_CHUNK_OVERLAP || '100'),
      topK: parseInt(env.RAG_TOP_K || '3'),
      embeddingModel: env.EMBEDDING_MODEL || 'Xenova/all-MiniLM-L6-v2',
      llmModel: env.GROQ_MODEL || 'llama-3.1-8b-instant',
      llmTemperature: parseFloat(env.GROQ_TEMPERATURE || '0.7'),
      groqApiKey: env.GROQ_API_KEY || undefined,
      vectorDbPath: env.VECTOR_STORE_PATH || './data/vec_store',
      collectionName: env.COLLECTION_NAME || 'pdf_documents',
      uploadDir: env.UPLOAD_DIR || './uploads'
    };

    this.server = {
      port: parseInt(env.PORT || '8000'),
      host: env.HOST || '0.0.0.0',
      corsOrigin: env.CORS_ORIGIN || '*',
      maxFileSizeMb: parseInt(env.MAX_FILE_SIZE_MB || '50'),
      requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS || '0')
    };
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config();
    }
    return Config.instance;
  }

  public validate(): void {
    // Validate chunk settings
    if (!(this.rag.chunkSize > 0)) {
      throw new Error('RAG_CHUNK_SIZE must be positive');
    }
    if (!(this.rag.chunkOverlap >= 0) || this.rag.chunkOverlap >= this.rag.chunkSize) {
      throw new Error('RAG_CHUNK_OVERLAP must be non-negative and less than RAG_CHUNK_SIZE');
    }
    if (!(this.rag.topK >= 1)) {
      throw new Error('RAG_TOP_K must be at least 1');
    }
    if (!(this.rag.llmTemperature >= 0 && this.rag.llmTemperature <= 2)) {
      throw new Error('GROQ_TEMPERATURE must be between 0 and 2');
    }

    // Validate server settings
    if (!(this.server.port >= 1 && this.server.port <= 65535)) {
      throw new Error('PORT must be between 1 and 65535');
    }
    if (!(this.server.maxFileSizeMb > 0)) {
      throw new Error('MAX_FILE_SIZE_MB must be positive');
    }
    if (!(this.server.requestTimeoutMs >= 0)) {
      throw new Error('REQUEST_TIMEOUT_MS must be zero or positive');
    }
  }
}

export const config = Config.getInstance();

import express from 'express';
import cors from 'cors';
import multer from 'multer';
import * as http from 'http';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { logger } from './utils/logger';
import { Config, config as defaultConfig } from './config';
import { RAGService } from './core/rag-service';
import { fileTypeFor } from './core/document-loader';
import { RagError, ValidationError, errorMessage } from './types/api';
import type {
  ApiErrorResponse,
  ApiFileResult,
  ApiQueryResponse,
  ApiStatsResponse,
  ApiStatusResponse
} from './types/api';
import type { FileType, MetadataExtension, OperationOptions } from './types';

const VERSION = '2.0.0';

const queryBodySchema = z.object({
  question: z.string().trim().min(1, 'Question is required'),
  top_k: z.number().int().positive().optional()
});

const ingestPathBodySchema = z.object({
  filePath: z.string().min(1, 'filePath is required')
});

const extraMetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const FILE_TYPE_LABELS: Record<FileType, string> = {
  pdf: 'PDF',
  excel: 'Excel file'
};

export class RAGServer {
  private app: express.Application;
  private upload: multer.Multer;
  private httpServer: http.Server | null = null;

  constructor(
    private readonly ragService: RAGService,
    private readonly config: Config = defaultConfig
  ) {
    this.app = express();
    this.upload = multer({
      storage: multer.memoryStorage(),
      limits: {
        fileSize: config.server.maxFileSizeMb * 1024 * 1024
      }
    });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Setup middleware
   */
  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.config.server.corsOrigin,
      credentials: true
    }));

    this.app.use(express.json({ limit: '10mb' }));
    this.app.use(express.urlencoded({ extended: true }));

    // Request logging
    this.app.use((req, _res, next) => {
      logger.info(`${req.method} ${req.path}`, {
        ip: req.ip,
        userAgent: req.get('User-Agent')
      });
      next();
    });
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      res.json({ status: 'healthy', version: VERSION });
    });

    this.app.post('/upload-pdf', this.upload.single('file'), async (req, res) => {
      await this.handleSingleUpload(req, res, 'pdf');
    });

    this.app.post('/upload-excel', this.upload.single('file'), async (req, res) => {
      await this.handleSingleUpload(req, res, 'excel');
    });

    this.app.post('/upload-multiple', this.upload.array('files'), async (req, res) => {
      const files = Array.isArray(req.files) ? req.files : [];
      const results: ApiFileResult[] = [];

      // Each file succeeds or fails on its own
      for (const file of files) {
        const fileType = fileTypeFor(file.originalname);
        if (!fileType) {
          results.push({ filename: file.originalname, status: 'skipped', message: 'Unsupported file type' });
          continue;
        }

        try {
          const filePath = await this.saveUpload(file);
          await this.ragService.ingest({ path: filePath, fileType }, this.operationOptions());
          results.push({ filename: file.originalname, status: 'success', message: 'Ingested successfully' });
        } catch (error) {
          logger.warn(`Failed to ingest ${file.originalname}`, error);
          results.push({ filename: file.originalname, status: 'error', message: errorMessage(error) });
        }
      }

      res.json({ results });
    });

    this.app.post('/ingest-path', async (req, res) => {
      try {
        const parsed = ingestPathBodySchema.safeParse(req.body);
        if (!parsed.success) {
          throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid request body');
        }

        const results = await this.ragService.ingestPath(parsed.data.filePath, this.operationOptions());
        const totalChunks = results.reduce((sum, result) => sum + (result.chunksCount ?? 0), 0);
        res.json({ results, totalChunks });
      } catch (error) {
        this.sendError(res, 'Ingest path failed', error);
      }
    });

    this.app.post('/query', async (req, res) => {
      try {
        const parsed = queryBodySchema.safeParse(req.body);
        if (!parsed.success) {
          throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid request body');
        }

        const { question, top_k } = parsed.data;
        const result = await this.ragService.answer(
          question,
          top_k ?? this.ragService.defaultTopK,
          this.operationOptions()
        );

        const body: ApiQueryResponse = { answer: result.answer, sources: result.sources };
        res.json(body);
      } catch (error) {
        this.sendError(res, 'Query failed', error);
      }
    });

    this.app.get('/stats', async (_req, res) => {
      try {
        const stats = await this.ragService.getStats();
        const body: ApiStatsResponse = {
          total_documents: stats.totalDocuments,
          collection_name: stats.collectionName,
          embedding_model: stats.embeddingModel,
          llm_model: stats.llmModel
        };
        res.json(body);
      } catch (error) {
        this.sendError(res, 'Stats failed', error);
      }
    });

    this.app.delete('/reset', async (_req, res) => {
      try {
        await this.ragService.reset();
        res.json({ status: 'success', message: 'Vector database reset successfully' });
      } catch (error) {
        this.sendError(res, 'Reset failed', error);
      }
    });
  }

  private async handleSingleUpload(req: express.Request, res: express.Response, fileType: FileType): Promise<void> {
    try {
      const file = req.file;
      if (!file) {
        throw new ValidationError('No file uploaded');
      }

      if (fileTypeFor(file.originalname) !== fileType) {
        throw new ValidationError(
          fileType === 'pdf' ? 'Only PDF files are allowed' : 'Only Excel files (.xlsx, .xls) are allowed'
        );
      }

      const extra = this.parseExtraMetadata(req.body?.metadata);
      const filePath = await this.saveUpload(file);

      logger.info(`Upload request: ${file.originalname}`);
      await this.ragService.ingest({ path: filePath, fileType }, { ...this.operationOptions(), extra });

      const body: ApiStatusResponse = {
        status: 'success',
        message: `${FILE_TYPE_LABELS[fileType]} '${file.originalname}' uploaded and ingested successfully`,
        details: { file_path: filePath }
      };
      res.json(body);
    } catch (error) {
      this.sendError(res, 'Upload failed', error);
    }
  }

  /**
   * Uploads keep their original base name; a later upload with the same name
   * overwrites the earlier file.
   */
  private async saveUpload(file: Express.Multer.File): Promise<string> {
    const uploadDir = this.config.rag.uploadDir;
    await fs.promises.mkdir(uploadDir, { recursive: true });

    const filePath = path.join(uploadDir, path.basename(file.originalname));
    await fs.promises.writeFile(filePath, file.buffer);
    return filePath;
  }

  private parseExtraMetadata(raw: unknown): MetadataExtension | undefined {
    if (raw === undefined || raw === '') {
      return undefined;
    }
    if (typeof raw !== 'string') {
      throw new ValidationError('metadata must be a JSON object string');
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      throw new ValidationError('metadata is not valid JSON');
    }

    const parsed = extraMetadataSchema.safeParse(value);
    if (!parsed.success) {
      throw new ValidationError('metadata must map keys to strings, numbers or booleans');
    }
    return parsed.data;
  }

  private operationOptions(): OperationOptions {
    const timeout = this.config.server.requestTimeoutMs;
    return timeout > 0 ? { signal: AbortSignal.timeout(timeout) } : {};
  }

  private sendError(res: express.Response, context: string, error: unknown): void {
    logger.error(context, error);

    const status = error instanceof RagError ? error.statusCode : 500;
    const body: ApiErrorResponse = { detail: errorMessage(error) };
    res.status(status).json(body);
  }

  /**
   * Setup error handling
   */
  private setupErrorHandling(): void {
    // 404 handler
    this.app.use((_req, res) => {
      const body: ApiErrorResponse = { detail: 'Not Found' };
      res.status(404).json(body);
    });

    // Global error handler; multer and body-parser failures are client errors
    this.app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (error instanceof multer.MulterError) {
        this.sendError(res, 'Upload rejected', new ValidationError(error.message));
        return;
      }
      if (error instanceof SyntaxError) {
        this.sendError(res, 'Malformed request body', new ValidationError(error.message));
        return;
      }
      this.sendError(res, 'Unhandled error', error);
    });
  }

  /**
   * Start the server
   */
  start(port: number = this.config.server.port, host: string = this.config.server.host): Promise<http.Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        logger.info(`RAG Server running on http://${host}:${port}`);
        logger.info(`CORS enabled for: ${this.config.server.corsOrigin}`);
        resolve(server);
      });
      server.once('error', reject);
      this.httpServer = server;
    });
  }

  stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Get the Express app (for testing)
   */
  getApp(): express.Application {
    return this.app;
  }
}

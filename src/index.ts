#!/usr/bin/env node

import 'dotenv/config';
import { config } from './config';
import { logger } from './utils/logger';
import { createRagService } from './core/rag-service';
import { RAGServer } from './server';

async function main() {
  config.validate();

  logger.info('Starting document Q&A server');
  logger.info(`Vector store path: ${config.rag.vectorDbPath}`);
  logger.info(`Upload directory: ${config.rag.uploadDir}`);
  if (!config.rag.groqApiKey) {
    logger.warn('GROQ_API_KEY is not set; queries with matching documents will fail');
  }

  const ragService = createRagService(config);
  logger.info(`Existing records in collection '${config.rag.collectionName}': ${await ragService.count()}`);

  const server = new RAGServer(ragService, config);
  await server.start();

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error while closing the HTTP server', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', reason);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});

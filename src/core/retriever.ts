import { logger } from '../utils/logger';
import type { Embedder } from './embeddings';
import type { PersistentVectorDB } from './vector-db';
import type { AnswerGenerator } from './llm';
import type { SearchResult } from '../types';

export const PROMPT_INSTRUCTIONS =
  "Use the following context to answer the question. If you don't know the answer based on the context, say so.";

export function buildPrompt(question: string, context: string): string {
  return `${PROMPT_INSTRUCTIONS}

Context: ${context}

Question: ${question}

Answer:`;
}

/**
 * Joins retrieved chunk texts in rank order
 */
export function buildContext(results: SearchResult[]): string {
  return results.map(result => result.content).join('\n\n');
}

export class RAGRetriever {
  constructor(
    private readonly embeddings: Embedder,
    private readonly vectorDb: PersistentVectorDB,
    private readonly generator: AnswerGenerator
  ) {}

  async retrieve(question: string, topK: number): Promise<SearchResult[]> {
    const queryEmbedding = await this.embeddings.generateQueryEmbedding(question);
    const results = await this.vectorDb.query(queryEmbedding, topK);
    logger.debug(`Retrieved ${results.length} chunks`, { topK });
    return results;
  }

  async generateAnswer(question: string, context: string, signal?: AbortSignal): Promise<string> {
    return this.generator.generate(buildPrompt(question, context), signal);
  }
}

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { logger } from '../utils/logger';
import type { DocumentChunk, DocumentRecord } from '../types';

// Tried in order; "" means a hard character cut
export const CHUNK_SEPARATORS = ['\n\n', '\n', '.', '!', '?', ' ', ''];

export interface ChunkStats {
  totalChunks: number;
  averageChunkSize: number;
  minChunkSize: number;
  maxChunkSize: number;
}

export class TextChunker {
  private splitter: RecursiveCharacterTextSplitter;

  constructor(
    public readonly chunkSize: number,
    public readonly chunkOverlap: number
  ) {
    if (chunkSize <= 0) {
      throw new Error('Chunk size must be positive');
    }

    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error('Overlap size must be less than chunk size');
    }

    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize,
      chunkOverlap,
      separators: CHUNK_SEPARATORS,
      keepSeparator: true
    });
  }

  /**
   * Split text into overlapping windows of at most chunkSize characters
   */
  async chunkText(text: string): Promise<string[]> {
    if (!text.trim()) {
      return [];
    }
    return this.splitter.splitText(text);
  }

  /**
   * Split each record; chunks inherit the record's metadata plus their
   * zero-based index within that record.
   */
  async split(records: DocumentRecord[]): Promise<DocumentChunk[]> {
    const chunks: DocumentChunk[] = [];

    for (const record of records) {
      const pieces = await this.chunkText(record.text);
      pieces.forEach((content, chunkIndex) => {
        chunks.push({
          content,
          metadata: { ...record.metadata, chunkIndex }
        });
      });
    }

    logger.debug(`Text chunked: ${chunks.length} chunks from ${records.length} records`);
    return chunks;
  }

  getChunkStats(chunks: DocumentChunk[]): ChunkStats {
    if (chunks.length === 0) {
      return {
        totalChunks: 0,
        averageChunkSize: 0,
        minChunkSize: 0,
        maxChunkSize: 0
      };
    }

    const sizes = chunks.map(chunk => chunk.content.length);
    const totalSize = sizes.reduce((sum, size) => sum + size, 0);

    return {
      totalChunks: chunks.length,
      averageChunkSize: Math.round(totalSize / chunks.length),
      minChunkSize: Math.min(...sizes),
      maxChunkSize: Math.max(...sizes)
    };
  }
}

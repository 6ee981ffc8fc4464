import { describe, it, expect } from 'vitest';
import { TextChunker } from '../../src/core/chunker';
import type { DocumentRecord, RecordMetadata } from '../../src/types';

const metadata: RecordMetadata = {
  sourceFile: '/tmp/report.pdf',
  fileName: 'report.pdf',
  fileType: 'pdf',
  page: 3
};

function record(text: string): DocumentRecord {
  return { text, metadata };
}

describe('TextChunker', () => {
  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => new TextChunker(100, 100)).toThrow('Overlap size must be less than chunk size');
    expect(() => new TextChunker(0, 0)).toThrow('Chunk size must be positive');
  });

  it('keeps a short record as a single chunk with inherited metadata', async () => {
    const chunker = new TextChunker(500, 100);
    const chunks = await chunker.split([record('Paris is the capital of France.')]);

    expect(chunks).toEqual([
      {
        content: 'Paris is the capital of France.',
        metadata: { ...metadata, chunkIndex: 0 }
      }
    ]);
  });

  it('keeps a spreadsheet row intact', async () => {
    const chunker = new TextChunker(500, 100);
    const chunks = await chunker.split([
      { text: 'name: Ann | age: 30', metadata: { sourceFile: 'people.xlsx', fileName: 'people.xlsx', fileType: 'excel', rowIndex: 0 } }
    ]);

    expect(chunks.map(chunk => chunk.content)).toEqual(['name: Ann | age: 30']);
    expect(chunks[0].metadata.rowIndex).toBe(0);
  });

  it('produces no chunks for an empty record', async () => {
    const chunker = new TextChunker(500, 100);
    expect(await chunker.split([record(''), record('   ')])).toEqual([]);
  });

  it('splits on paragraph breaks before anything else', async () => {
    const chunker = new TextChunker(30, 5);
    const chunks = await chunker.split([record('First paragraph sentence.\n\nSecond paragraph sentence.')]);

    expect(chunks.map(chunk => chunk.content)).toEqual([
      'First paragraph sentence.',
      'Second paragraph sentence.'
    ]);
    expect(chunks.map(chunk => chunk.metadata.chunkIndex)).toEqual([0, 1]);
  });

  it('bounds every chunk and overlaps neighbours for long text', async () => {
    const words = Array.from({ length: 40 }, (_, i) => `w${String(i).padStart(2, '0')}`);
    const chunker = new TextChunker(20, 8);
    const chunks = await chunker.split([record(words.join(' '))]);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(20);
    }
    expect(chunks.map(chunk => chunk.metadata.chunkIndex)).toEqual(chunks.map((_, i) => i));

    // The next window starts inside the previous one
    for (let i = 1; i < chunks.length; i++) {
      const firstWord = chunks[i].content.split(' ')[0];
      expect(chunks[i - 1].content.split(' ')).toContain(firstWord);
    }

    const seen = new Set(chunks.flatMap(chunk => chunk.content.split(' ')));
    expect(words.every(word => seen.has(word))).toBe(true);
  });

  it('falls back to hard character cuts when no separator exists', async () => {
    const chunker = new TextChunker(20, 5);
    const chunks = await chunker.split([record('a'.repeat(50))]);

    expect(chunks[0].content).toBe('a'.repeat(20));
    expect(chunks.length).toBeGreaterThan(2);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(20);
    }
  });

  it('numbers chunks per record', async () => {
    const chunker = new TextChunker(30, 5);
    const chunks = await chunker.split([
      record('First paragraph sentence.\n\nSecond paragraph sentence.'),
      record('Only one here.')
    ]);

    expect(chunks.map(chunk => chunk.metadata.chunkIndex)).toEqual([0, 1, 0]);
  });

  it('reports chunk statistics', async () => {
    const chunker = new TextChunker(30, 5);
    const chunks = await chunker.split([record('First paragraph sentence.\n\nSecond paragraph sentence.')]);

    expect(chunker.getChunkStats(chunks)).toEqual({
      totalChunks: 2,
      averageChunkSize: 26,
      minChunkSize: 25,
      maxChunkSize: 26
    });
    expect(chunker.getChunkStats([])).toEqual({
      totalChunks: 0,
      averageChunkSize: 0,
      minChunkSize: 0,
      maxChunkSize: 0
    });
  });
});

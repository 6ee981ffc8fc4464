import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { Config } from '../../src/config';
import { RAGServer } from '../../src/server';
import { NO_RELEVANT_DOCUMENTS } from '../../src/core/rag-service';
import { buildPdf } from '../helpers/pdf-fixture';
import { buildWorkbook } from '../helpers/xlsx-fixture';
import { makeTempDir, removeDir } from '../helpers/fakes';
import { createTestPipeline, type TestPipeline } from '../helpers/service';

const CAPITALS = ['Paris is the capital of France.', 'Berlin is the capital of Germany.'];

describe('RAGServer', () => {
  let dir: string;
  let uploadDir: string;
  let pipeline: TestPipeline;
  let server: RAGServer;
  let baseUrl: string;

  beforeEach(async () => {
    dir = makeTempDir('rag-server');
    uploadDir = path.join(dir, 'uploads');
    pipeline = createTestPipeline(dir);
    const config = new Config({ UPLOAD_DIR: uploadDir, MAX_FILE_SIZE_MB: '1' });
    server = new RAGServer(pipeline.service, config);

    const httpServer = await server.start(0, '127.0.0.1');
    const address = httpServer.address();
    if (!address || typeof address === 'string') {
      throw new Error('server did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await server.stop();
    removeDir(dir);
  });

  function form(field: string, files: Array<[string, Buffer | string]>, extra: Record<string, string> = {}): FormData {
    const body = new FormData();
    for (const [name, content] of files) {
      body.append(field, new Blob([content]), name);
    }
    for (const [key, value] of Object.entries(extra)) {
      body.append(key, value);
    }
    return body;
  }

  function postJson(route: string, payload: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload)
    });
  }

  it('answers the health probe', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'healthy', version: '2.0.0' });
  });

  describe('POST /upload-pdf', () => {
    it('saves and ingests a PDF', async () => {
      const res = await fetch(`${baseUrl}/upload-pdf`, {
        method: 'POST',
        body: form('file', [['capitals.pdf', buildPdf(CAPITALS)]])
      });

      const filePath = path.join(uploadDir, 'capitals.pdf');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'success',
        message: "PDF 'capitals.pdf' uploaded and ingested successfully",
        details: { file_path: filePath }
      });
      expect(fs.existsSync(filePath)).toBe(true);
      expect(await pipeline.service.count()).toBe(2);
    });

    it('rejects other suffixes with 400', async () => {
      const res = await fetch(`${baseUrl}/upload-pdf`, {
        method: 'POST',
        body: form('file', [['notes.txt', 'hello']])
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: 'Only PDF files are allowed' });
      expect(fs.existsSync(path.join(uploadDir, 'notes.txt'))).toBe(false);
    });

    it('reports ingestion failures as 500 with the error text', async () => {
      const res = await fetch(`${baseUrl}/upload-pdf`, {
        method: 'POST',
        body: form('file', [['broken.pdf', 'not really a pdf']])
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ detail: 'Invalid PDF file format: broken.pdf' });
    });

    it('rejects metadata that is not a JSON object of scalars', async () => {
      const res = await fetch(`${baseUrl}/upload-pdf`, {
        method: 'POST',
        body: form('file', [['capitals.pdf', buildPdf(CAPITALS)]], { metadata: '{"tags": ["a"]}' })
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: 'metadata must map keys to strings, numbers or booleans' });
    });

    it('rejects a request without a file', async () => {
      const res = await fetch(`${baseUrl}/upload-pdf`, { method: 'POST', body: new FormData() });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: 'No file uploaded' });
    });

    it('rejects files over the size limit', async () => {
      const res = await fetch(`${baseUrl}/upload-pdf`, {
        method: 'POST',
        body: form('file', [['huge.pdf', Buffer.alloc(2 * 1024 * 1024, 32)]])
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: 'File too large' });
    });
  });

  describe('POST /upload-excel', () => {
    it('saves and ingests a workbook', async () => {
      const res = await fetch(`${baseUrl}/upload-excel`, {
        method: 'POST',
        body: form('file', [['people.xlsx', buildWorkbook([['name', 'age'], ['Ann', 30], ['Bo', 40]])]])
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'success',
        message: "Excel file 'people.xlsx' uploaded and ingested successfully",
        details: { file_path: path.join(uploadDir, 'people.xlsx') }
      });
      expect(pipeline.embedder.batchCalls).toEqual([['name: Ann | age: 30', 'name: Bo | age: 40']]);
    });

    it('reports a corrupt workbook as 500', async () => {
      const res = await fetch(`${baseUrl}/upload-excel`, {
        method: 'POST',
        body: form('file', [['broken.xlsx', 'this is not a spreadsheet at all\nsecond line']])
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ detail: 'Invalid spreadsheet file format: broken.xlsx' });
      expect(await pipeline.service.count()).toBe(0);
    });

    it('rejects a PDF', async () => {
      const res = await fetch(`${baseUrl}/upload-excel`, {
        method: 'POST',
        body: form('file', [['capitals.pdf', buildPdf(CAPITALS)]])
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: 'Only Excel files (.xlsx, .xls) are allowed' });
    });
  });

  describe('POST /upload-multiple', () => {
    it('reports each file on its own', async () => {
      const res = await fetch(`${baseUrl}/upload-multiple`, {
        method: 'POST',
        body: form('files', [
          ['capitals.pdf', buildPdf(CAPITALS)],
          ['notes.txt', 'hello'],
          ['broken.pdf', 'nope']
        ])
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        results: [
          { filename: 'capitals.pdf', status: 'success', message: 'Ingested successfully' },
          { filename: 'notes.txt', status: 'skipped', message: 'Unsupported file type' },
          { filename: 'broken.pdf', status: 'error', message: 'Invalid PDF file format: broken.pdf' }
        ]
      });
      expect(await pipeline.service.count()).toBe(2);
    });
  });

  describe('POST /query', () => {
    it('returns the answer with ranked sources', async () => {
      fs.writeFileSync(path.join(dir, 'capitals.pdf'), buildPdf(CAPITALS));
      await pipeline.service.ingest({ path: path.join(dir, 'capitals.pdf'), fileType: 'pdf' });

      const res = await postJson('/query', { question: 'What is the capital of France?', top_k: 1 });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        answer: 'From the documents: Paris is the capital of France.',
        sources: [
          {
            content: 'Paris is the capital of France.',
            relevance_rank: 1,
            metadata: { fileName: 'capitals.pdf', fileType: 'pdf', page: 1, chunkIndex: 0, contentLength: 31 }
          }
        ]
      });
    });

    it('answers with the fixed message on an empty store', async () => {
      const res = await postJson('/query', { question: 'Anything?' });

      expect(await res.json()).toEqual({ answer: NO_RELEVANT_DOCUMENTS, sources: [] });
      expect(pipeline.generator.prompts).toEqual([]);
    });

    it('rejects an empty question', async () => {
      const res = await postJson('/query', { question: '   ' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: 'Question is required' });
    });

    it('rejects a non-positive top_k', async () => {
      const res = await postJson('/query', { question: 'Where?', top_k: 0 });

      expect(res.status).toBe(400);
    });
  });

  describe('GET /stats and DELETE /reset', () => {
    it('counts records and wipes them', async () => {
      fs.writeFileSync(path.join(dir, 'people.xlsx'), buildWorkbook([['name', 'age'], ['Ann', 30], ['Bo', 40]]));
      await pipeline.service.ingest({ path: path.join(dir, 'people.xlsx'), fileType: 'excel' });

      const before = await fetch(`${baseUrl}/stats`);
      expect(await before.json()).toEqual({
        total_documents: 2,
        collection_name: 'pdf_documents',
        embedding_model: 'keyword-test-model',
        llm_model: 'recording-test-model'
      });

      const reset = await fetch(`${baseUrl}/reset`, { method: 'DELETE' });
      expect(await reset.json()).toEqual({ status: 'success', message: 'Vector database reset successfully' });

      const after = await fetch(`${baseUrl}/stats`);
      expect(await after.json()).toMatchObject({ total_documents: 0 });
    });
  });

  describe('POST /ingest-path', () => {
    it('ingests a server-side directory', async () => {
      const docs = path.join(dir, 'docs');
      fs.mkdirSync(docs);
      fs.writeFileSync(path.join(docs, 'capitals.pdf'), buildPdf(CAPITALS));

      const res = await postJson('/ingest-path', { filePath: docs });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        results: [{ file: path.join(docs, 'capitals.pdf'), status: 'success', chunksCount: 2 }],
        totalChunks: 2
      });
    });

    it('rejects a missing path with 400', async () => {
      const missing = path.join(dir, 'missing');
      const res = await postJson('/ingest-path', { filePath: missing });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: `Path does not exist: ${missing}` });
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Not Found' });
  });
});

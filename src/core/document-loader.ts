import * as fs from 'fs';
import * as path from 'path';
import { createRequire } from 'module';
import { pathToFileURL } from 'url';
import * as XLSX from 'xlsx';
import { logger } from '../utils/logger';
import { ExtractionError, errorMessage } from '../types/api';
import type { DocumentRecord, FileType, MetadataExtension, RecordMetadata, SourceDocument } from '../types';

// Use legacy build for Node.js compatibility
import { getDocument, GlobalWorkerOptions, VerbosityLevel } from 'pdfjs-dist/legacy/build/pdf.mjs';

// Set worker source for PDF.js (legacy build for Node.js)
const nodeRequire = createRequire(import.meta.url);
GlobalWorkerOptions.workerSrc = pathToFileURL(nodeRequire.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs')).href;

export const ROW_FIELD_SEPARATOR = ' | ';

// .xlsx is a zip archive, .xls a compound file
const SPREADSHEET_SIGNATURES = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1])
];

const EXTENSION_TYPES: Record<string, FileType> = {
  '.pdf': 'pdf',
  '.xlsx': 'excel',
  '.xls': 'excel'
};

/**
 * Map a file name to the loader that handles it, or null when unsupported
 */
export function fileTypeFor(fileName: string): FileType | null {
  return EXTENSION_TYPES[path.extname(fileName).toLowerCase()] ?? null;
}

export class DocumentLoader {
  async load(source: SourceDocument, extra?: MetadataExtension): Promise<DocumentRecord[]> {
    switch (source.fileType) {
      case 'pdf':
        return this.loadPdf(source.path, extra);
      case 'excel':
        return this.loadSpreadsheet(source.path, extra);
    }
  }

  /**
   * One record per page, in page order
   */
  async loadPdf(filePath: string, extra?: MetadataExtension): Promise<DocumentRecord[]> {
    const startTime = Date.now();
    const data = this.readSource(filePath);

    // PDF files start with %PDF-
    if (data.toString('ascii', 0, 4) !== '%PDF') {
      throw new ExtractionError(`Invalid PDF file format: ${path.basename(filePath)}`);
    }

    const loadingTask = getDocument({
      data: new Uint8Array(data),
      verbosity: VerbosityLevel.ERRORS
    });

    try {
      const pdf = await loadingTask.promise;
      logger.info(`PDF loaded: ${pdf.numPages} pages`);

      const records: DocumentRecord[] = [];
      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();

        // Line breaks survive so the chunker can split on them
        const pageText = textContent.items
          .map(item => ('str' in item ? item.str + (item.hasEOL ? '\n' : ' ') : ''))
          .join('')
          .split('\n')
          .map(line => line.replace(/\s+/g, ' ').trim())
          .join('\n')
          .replace(/\n{3,}/g, '\n\n')
          .trim();

        records.push({
          text: pageText,
          metadata: { ...this.baseMetadata(filePath, 'pdf', extra), page: pageNum }
        });

        if (pageNum % 10 === 0) {
          logger.debug(`Processed ${pageNum}/${pdf.numPages} pages`);
        }
      }

      logger.performance('PDF extraction', Date.now() - startTime, {
        file: path.basename(filePath),
        pages: pdf.numPages
      });
      return records;
    } catch (error) {
      logger.error(`PDF extraction failed: ${filePath}`, error);
      throw new ExtractionError(`Failed to extract text from PDF: ${errorMessage(error)}`);
    } finally {
      await loadingTask.destroy();
    }
  }

  /**
   * One record per data row of the first worksheet. The first row holds the
   * column names; each record reads "column: value | column: value".
   */
  async loadSpreadsheet(filePath: string, extra?: MetadataExtension): Promise<DocumentRecord[]> {
    const startTime = Date.now();
    const data = this.readSource(filePath);

    // SheetJS falls back to reading unknown bytes as CSV
    if (!SPREADSHEET_SIGNATURES.some(signature => data.subarray(0, signature.length).equals(signature))) {
      throw new ExtractionError(`Invalid spreadsheet file format: ${path.basename(filePath)}`);
    }

    let rows: unknown[][];
    try {
      const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
      const sheetName = workbook.SheetNames[0];
      const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
      if (!sheet) {
        throw new Error('Workbook has no worksheets');
      }
      rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        defval: '',
        blankrows: false,
        raw: true
      });
    } catch (error) {
      logger.error(`Spreadsheet extraction failed: ${filePath}`, error);
      throw new ExtractionError(`Failed to read spreadsheet: ${errorMessage(error)}`);
    }

    const [header = [], ...dataRows] = rows;
    const columns = header.map(cell => this.formatCell(cell));

    const records = dataRows.map((row, rowIndex): DocumentRecord => ({
      text: columns
        .map((column, i) => `${column}: ${this.formatCell(row[i])}`)
        .join(ROW_FIELD_SEPARATOR),
      metadata: { ...this.baseMetadata(filePath, 'excel', extra), rowIndex }
    }));

    logger.performance('Spreadsheet extraction', Date.now() - startTime, {
      file: path.basename(filePath),
      rows: records.length
    });
    return records;
  }

  private readSource(filePath: string): Buffer {
    try {
      return fs.readFileSync(filePath);
    } catch (error) {
      throw new ExtractionError(`Cannot read ${filePath}: ${errorMessage(error)}`);
    }
  }

  private baseMetadata(filePath: string, fileType: FileType, extra?: MetadataExtension): RecordMetadata {
    const metadata: RecordMetadata = {
      sourceFile: filePath,
      fileName: path.basename(filePath),
      fileType
    };
    if (extra && Object.keys(extra).length > 0) {
      metadata.extra = { ...extra };
    }
    return metadata;
  }

  private formatCell(value: unknown): string {
    if (value === null || value === undefined) {
      return '';
    }
    if (value instanceof Date) {
      return formatDate(value);
    }
    return String(value);
  }
}

/**
 * Local "YYYY-MM-DD HH:MM:SS"; SheetJS builds date cells in local time
 */
function formatDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

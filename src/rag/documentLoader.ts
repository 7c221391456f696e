import { readdir, readFile, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, extname } from 'node:path';
import type { SourceDocument } from '../types/rag.types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { TextExtractor } from './pdfExtractor.js';
import { PdfExtractor } from './pdfExtractor.js';
import { isMissingPath } from './fsErrors.js';

export const SUPPORTED_EXTENSIONS = new Set(['.txt', '.md', '.markdown', '.pdf']);

const DEFAULT_MAX_FILE_SIZE = 20 * 1024 * 1024;

const SKIP_DIRS = new Set(['node_modules', '__pycache__', 'vector_dbs', 'invoices']);

export interface DocumentLoaderOptions {
  pdfExtractor?: TextExtractor;
  maxFileSizeBytes?: number;
  logger?: Logger;
}

export function isSupportedDocument(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(extname(filePath).toLowerCase());
}

/**
 * Detects if a buffer is likely binary by sampling bytes.
 * Returns true if >5% of sampled bytes are non-printable non-whitespace.
 */
function isBinary(buf: Buffer): boolean {
  const sampleSize = Math.min(buf.length, 8000);
  let nonPrintable = 0;
  for (let i = 0; i < sampleSize; i++) {
    const b = buf[i];
    if (b === undefined) continue;
    // Null byte is a strong binary indicator
    if (b === 0) return true;
    if (b < 9 || (b > 13 && b < 32 && b !== 27)) nonPrintable++;
  }
  return sampleSize > 0 && nonPrintable / sampleSize > 0.05;
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export class DocumentLoader {
  private readonly pdfExtractor: TextExtractor;
  private readonly maxFileSize: number;
  private readonly logger: Logger;

  constructor(options: DocumentLoaderOptions = {}) {
    this.pdfExtractor = options.pdfExtractor ?? new PdfExtractor();
    this.maxFileSize = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Walk a directory recursively in name order, yielding extracted documents.
   * Skips hidden and tooling directories, unsupported extensions, oversized
   * and binary files. A missing directory yields nothing.
   */
  async *walkDirectory(dirPath: string): AsyncGenerator<SourceDocument> {
    let entries: Dirent[];
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      if (isMissingPath(err)) {
        this.logger.warn(`Documents directory not found: ${dirPath}`);
        return;
      }
      throw err;
    }

    for (const entry of entries.sort(byName)) {
      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name) && !entry.name.startsWith('.')) {
          yield* this.walkDirectory(fullPath);
        }
        continue;
      }

      if (!entry.isFile() || !isSupportedDocument(entry.name)) continue;

      const doc = await this.readDocument(fullPath);
      if (doc) yield doc;
    }
  }

  /**
   * Extract one document's text. Returns null (after logging why) when the
   * file is too large, binary, empty, or cannot be read or parsed.
   */
  async readDocument(filePath: string): Promise<SourceDocument | null> {
    try {
      const info = await stat(filePath);
      if (info.size > this.maxFileSize) {
        this.logger.warn(`Skipping ${filePath}: ${info.size} bytes exceeds ${this.maxFileSize}`);
        return null;
      }

      let text: string;
      if (extname(filePath).toLowerCase() === '.pdf') {
        text = await this.pdfExtractor.extract(filePath);
      } else {
        const raw = await readFile(filePath);
        if (isBinary(raw)) {
          this.logger.warn(`Skipping ${filePath}: looks like a binary file`);
          return null;
        }
        text = raw.toString('utf8').replace(/^\uFEFF/, '');
      }

      if (text.trim() === '') {
        this.logger.debug(`Skipping ${filePath}: no text`);
        return null;
      }
      return { path: filePath, text };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Skipping ${filePath}: ${message}`);
      return null;
    }
  }
}

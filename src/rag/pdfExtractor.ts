import { readFile } from 'node:fs/promises';
import { PDFParse } from 'pdf-parse';

export interface TextExtractor {
  extract(filePath: string): Promise<string>;
}

/** Strip NULs, stray control characters and U+FFFD left behind by PDF text layers. */
export function sanitizeExtractedText(text: string): string {
  return text
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/\uFFFD/g, '')
    .trim();
}

export class PdfExtractor implements TextExtractor {
  async extract(filePath: string): Promise<string> {
    const data = await readFile(filePath);
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return sanitizeExtractedText(result.text);
    } finally {
      await parser.destroy();
    }
  }
}

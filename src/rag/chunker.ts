import type { Chunk } from '../types/rag.types.js';
import { InvalidConfigurationError } from '../errors/config.js';

export function validateChunking(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(
      `chunkSize must be a positive integer, got ${String(chunkSize)}.`,
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError(
      `chunkOverlap must be a non-negative integer, got ${String(overlap)}.`,
    );
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigurationError(
      `chunkOverlap (${overlap}) must be smaller than chunkSize (${chunkSize}).`,
    );
  }
}

/**
 * Split `text` into windows of `chunkSize` characters, each starting
 * `chunkSize - overlap` characters after the previous one. Characters are
 * code points, so a window never splits a surrogate pair.
 *
 * The last window is the first one that reaches the end of the text, so it may
 * be shorter than `chunkSize` but is never empty and never lies wholly inside
 * its predecessor. Empty text produces no chunks.
 */
export function chunkText(
  text: string,
  chunkSize: number,
  overlap: number,
  sourcePath: string,
): Chunk[] {
  validateChunking(chunkSize, overlap);

  const chars = Array.from(text);
  const chunks: Chunk[] = [];
  const step = chunkSize - overlap;
  let offset = 0;
  while (offset < chars.length) {
    const end = Math.min(offset + chunkSize, chars.length);
    chunks.push({
      text: chars.slice(offset, end).join(''),
      sourcePath,
      offset,
      length: end - offset,
    });
    if (end === chars.length) break;
    offset += step;
  }
  return chunks;
}

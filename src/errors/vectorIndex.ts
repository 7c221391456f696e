import { RagbaseError } from './base.js';

/**
 * Raised when a vector's length differs from the index dimension.
 * Means index corruption or embedding-model drift; the index must be rebuilt.
 */
export class DimensionMismatchError extends RagbaseError {
  constructor(
    public readonly expected: number | null,
    public readonly actual: number,
  ) {
    super(
      expected === null
        ? `Vector dimension mismatch: got ${actual}`
        : `Vector dimension mismatch: expected ${expected}, got ${actual}`,
      'DIMENSION_MISMATCH',
    );
  }
}

export class IndexNotFoundError extends RagbaseError {
  constructor(public readonly indexPath: string, cause?: unknown) {
    super(`No vector index found at ${indexPath}`, 'INDEX_NOT_FOUND', cause);
  }
}

export class IndexCorruptedError extends RagbaseError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INDEX_CORRUPTED', cause);
  }
}

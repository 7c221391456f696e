import type { VectorIndex } from '../rag/vectorIndex.js';

export interface SourceDocument {
  path: string;
  text: string;
}

/** A window of a document's text. `offset` and `length` count code points, not UTF-16 units. */
export interface Chunk {
  readonly text: string;
  readonly sourcePath: string;
  readonly offset: number;
  readonly length: number;
}

export interface IndexEntry {
  embedding: Float32Array;
  chunk: Chunk;
}

export interface QueryResult {
  chunk: Chunk;
  score: number;
}

/** The shape handed to the tool layer. */
export interface RetrievedPassage {
  text: string;
  source: string;
  score: number;
}

export interface QueryOptions {
  k?: number;
  minScore?: number;
}

export interface QueryOutcome {
  results: QueryResult[];
  /** False when no index has ever been built (nothing in memory, nothing on disk). */
  indexAvailable: boolean;
}

export interface BuildOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  signal?: AbortSignal;
}

export interface BuildResult {
  index: VectorIndex;
  documents: number;
  chunks: number;
  indexPath: string;
}

export interface IndexMetadata {
  model: string | null;
  builtAt: string | null;
}

export interface IndexStatus extends IndexMetadata {
  available: boolean;
  entries: number;
  dimension: number | null;
  indexPath: string;
}

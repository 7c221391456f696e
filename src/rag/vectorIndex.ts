import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { IndexEntry, IndexMetadata, QueryResult } from '../types/rag.types.js';
import { DimensionMismatchError, IndexNotFoundError } from '../errors/vectorIndex.js';
import { parseIndex, serializeIndex } from './indexCodec.js';
import { isMissingPath } from './fsErrors.js';

function norm(v: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) {
    const x = v[i] ?? 0;
    sum += x * x;
  }
  return Math.sqrt(sum);
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Append-only collection of embedded chunks with brute-force cosine search.
 *
 * The first insert fixes the dimension; every later vector must match it.
 * Search scores every entry, so ordering and tie-breaking are exact: highest
 * score first, and among equal scores the earlier-inserted entry first.
 */
export class VectorIndex {
  private readonly entries: IndexEntry[] = [];
  private readonly norms: number[] = [];
  private _dimension: number | null = null;

  constructor(readonly metadata: IndexMetadata = { model: null, builtAt: null }) {}

  get dimension(): number | null {
    return this._dimension;
  }

  get size(): number {
    return this.entries.length;
  }

  /** All-or-nothing: a batch with one bad vector leaves the index unchanged. */
  insert(entries: readonly IndexEntry[]): void {
    const expected = this._dimension ?? entries[0]?.embedding.length ?? 0;
    for (const { embedding } of entries) {
      if (embedding.length === 0 || embedding.length !== expected) {
        throw new DimensionMismatchError(expected > 0 ? expected : null, embedding.length);
      }
    }
    for (const entry of entries) {
      this.entries.push(entry);
      this.norms.push(norm(entry.embedding));
    }
    if (entries.length > 0) this._dimension = expected;
  }

  search(query: Float32Array, k: number): QueryResult[] {
    if (this.entries.length === 0 || k <= 0) return [];
    if (query.length !== this._dimension) {
      throw new DimensionMismatchError(this._dimension, query.length);
    }

    const queryNorm = norm(query);
    const scored = this.entries.map((entry, position) => {
      const denom = queryNorm * (this.norms[position] ?? 0);
      const score = denom === 0 ? 0 : dot(query, entry.embedding) / denom;
      return { chunk: entry.chunk, position, score };
    });

    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored.slice(0, Math.floor(k)).map(({ chunk, score }) => ({ chunk, score }));
  }

  /** Write to a sibling temp file, then rename over `path`, so readers never see a partial file. */
  async save(path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(
        tmpPath,
        serializeIndex({ dimension: this._dimension, metadata: this.metadata, entries: this.entries }),
        'utf8',
      );
      await rename(tmpPath, path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  static async load(path: string): Promise<VectorIndex> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (err) {
      if (isMissingPath(err)) throw new IndexNotFoundError(path, err);
      throw err;
    }

    const snapshot = parseIndex(raw, path);
    const index = new VectorIndex(snapshot.metadata);
    index.insert(snapshot.entries);
    if (snapshot.dimension !== null && index.dimension !== null && index.dimension !== snapshot.dimension) {
      throw new DimensionMismatchError(snapshot.dimension, index.dimension);
    }
    return index;
  }
}

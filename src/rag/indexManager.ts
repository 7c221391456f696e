import { stat, unlink } from 'node:fs/promises';
import type {
  BuildOptions,
  BuildResult,
  Chunk,
  IndexEntry,
  IndexStatus,
  QueryOptions,
  QueryOutcome,
} from '../types/rag.types.js';
import type { RetryConfig } from '../types/config.types.js';
import type { KnowledgeBase } from './knowledgeBase.js';
import type { EmbeddingProvider } from './embedders/embeddingProvider.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { chunkText, validateChunking } from './chunker.js';
import { DocumentLoader } from './documentLoader.js';
import { VectorIndex } from './vectorIndex.js';
import { DEFAULT_RETRY, withRetry } from './embedders/retry.js';
import { toBatches } from './embedders/embeddingProvider.js';
import { isMissingPath } from './fsErrors.js';
import { InvalidConfigurationError } from '../errors/config.js';
import { EmbeddingUnavailableError } from '../errors/embedding.js';
import { IndexNotFoundError } from '../errors/vectorIndex.js';
import { BuildCancelledError } from '../errors/build.js';

export interface IndexManagerOptions {
  embedder: EmbeddingProvider;
  indexPath: string;
  documentDir: string;
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  minScore: number;
  retry?: RetryConfig;
  /** Chunks per embed call during a build; cancellation is checked between calls. */
  embedBatchSize?: number;
  documentLoader?: DocumentLoader;
  logger?: Logger;
}

const DEFAULT_EMBED_BATCH_SIZE = 64;

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new BuildCancelledError(signal.reason);
}

/**
 * Owns the active {@link VectorIndex} of this process.
 *
 * Builds assemble a complete new index, persist it, and only then swap the
 * active reference. Queries work on the reference they saw when they started,
 * so a rebuild never exposes a half-filled index and a failed or cancelled
 * build leaves the previous one serving.
 */
export class IndexManager implements KnowledgeBase {
  private active: VectorIndex | null = null;
  /** mtime of the index file the active index was built or loaded from. */
  private activeMtimeMs = 0;
  private startupCheckDone = false;
  private pendingLoad: Promise<VectorIndex | null> | null = null;
  private buildQueue: Promise<unknown> = Promise.resolve();
  /** Bumped by clear() so a load that started before it cannot reinstate the old index. */
  private generation = 0;

  private readonly embedder: EmbeddingProvider;
  private readonly loader: DocumentLoader;
  private readonly retry: RetryConfig;
  private readonly embedBatchSize: number;
  private readonly logger: Logger;

  constructor(private readonly options: IndexManagerOptions) {
    this.embedder = options.embedder;
    this.logger = options.logger ?? silentLogger;
    this.loader = options.documentLoader ?? new DocumentLoader({ logger: this.logger });
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.embedBatchSize = options.embedBatchSize ?? DEFAULT_EMBED_BATCH_SIZE;
  }

  get indexPath(): string {
    return this.options.indexPath;
  }

  /** The index queries currently run against, or null before any build or load. */
  get activeIndex(): VectorIndex | null {
    return this.active;
  }

  build(documentDir: string = this.options.documentDir, options: BuildOptions = {}): Promise<BuildResult> {
    // Builds run one at a time; each caller sees its own build's outcome
    const run = this.buildQueue.then(() => this.runBuild(documentDir, options));
    this.buildQueue = run.catch(() => undefined);
    return run;
  }

  clear(): Promise<boolean> {
    const run = this.buildQueue.then(() => this.runClear());
    this.buildQueue = run.catch(() => undefined);
    return run;
  }

  async query(text: string, options: QueryOptions = {}): Promise<QueryOutcome> {
    const k = options.k ?? this.options.retrievalK;
    const minScore = options.minScore ?? this.options.minScore;
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidConfigurationError(`k must be a positive integer, got ${String(k)}.`);
    }
    if (!Number.isFinite(minScore)) {
      throw new InvalidConfigurationError(`minScore must be a finite number, got ${String(minScore)}.`);
    }

    const index = await this.ensureLoaded();
    if (!index) return { results: [], indexAvailable: false };
    if (index.size === 0) return { results: [], indexAvailable: true };

    const [vector] = await withRetry(() => this.embedder.embed([text]), {
      ...this.retry,
      onRetry: (err, attempt, delayMs) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Query embedding failed (${message}); retry ${attempt} in ${delayMs}ms`);
      },
    });
    if (!vector) {
      throw new EmbeddingUnavailableError('Embedder returned no vector for the query');
    }

    const results = index.search(vector, k).filter((r) => r.score >= minScore);
    this.logger.debug(`Query matched ${results.length} chunk(s) (k=${k}, minScore=${minScore})`);
    return { results, indexAvailable: true };
  }

  /**
   * Load the persisted index and make it active, unless the active one is
   * already at least as new. Returns null when no index file exists.
   */
  async reload(): Promise<VectorIndex | null> {
    const path = this.options.indexPath;
    const generation = this.generation;
    let mtimeMs: number;
    let index: VectorIndex;
    try {
      ({ mtimeMs } = await stat(path));
      index = await VectorIndex.load(path);
    } catch (err) {
      if (isMissingPath(err) || err instanceof IndexNotFoundError) return null;
      throw err;
    }

    if (generation !== this.generation) return this.active;
    // A build that finished while this load was reading wins
    if (this.active && this.activeMtimeMs >= mtimeMs) return this.active;

    const { model } = index.metadata;
    if (model !== null && model !== this.embedder.model) {
      this.logger.warn(
        `Index at ${path} was built with model "${model}" but the embedder uses "${this.embedder.model}"; rebuild it if results look wrong`,
      );
    }
    this.swap(index, mtimeMs);
    this.logger.info(`Loaded index from ${path} (${index.size} entries)`);
    return index;
  }

  async status(): Promise<IndexStatus> {
    const index = this.active ?? (await this.reload());
    return {
      available: index !== null,
      entries: index?.size ?? 0,
      dimension: index?.dimension ?? null,
      model: index?.metadata.model ?? null,
      builtAt: index?.metadata.builtAt ?? null,
      indexPath: this.options.indexPath,
    };
  }

  // ── private ──────────────────────────────────────────────────────────────

  private async runBuild(documentDir: string, options: BuildOptions): Promise<BuildResult> {
    const chunkSize = options.chunkSize ?? this.options.chunkSize;
    const chunkOverlap = options.chunkOverlap ?? this.options.chunkOverlap;
    validateChunking(chunkSize, chunkOverlap);
    const { signal } = options;
    throwIfCancelled(signal);

    this.logger.info(`Indexing documents in ${documentDir}`);
    const chunks: Chunk[] = [];
    let documents = 0;
    for await (const doc of this.loader.walkDirectory(documentDir)) {
      throwIfCancelled(signal);
      documents++;
      for (const chunk of chunkText(doc.text, chunkSize, chunkOverlap, doc.path)) {
        chunks.push(chunk);
      }
    }
    this.logger.info(`Split ${documents} document(s) into ${chunks.length} chunk(s)`);

    const index = new VectorIndex({
      model: this.embedder.model,
      builtAt: new Date().toISOString(),
    });

    if (chunks.length > 0) {
      const vectors = await this.embedChunks(chunks, signal);
      const entries: IndexEntry[] = chunks.map((chunk, i) => ({ chunk, embedding: vectors[i] }));
      index.insert(entries);
    }

    throwIfCancelled(signal);
    const indexPath = this.options.indexPath;
    await index.save(indexPath);
    const { mtimeMs } = await stat(indexPath);
    this.swap(index, mtimeMs);
    this.logger.info(`Saved index with ${index.size} entries to ${indexPath}`);

    return { index, documents, chunks: chunks.length, indexPath };
  }

  private async runClear(): Promise<boolean> {
    const indexPath = this.options.indexPath;
    let removed = true;
    try {
      await unlink(indexPath);
    } catch (err) {
      if (!isMissingPath(err)) throw err;
      removed = false;
    }
    this.generation++;
    this.active = null;
    this.activeMtimeMs = 0;
    this.startupCheckDone = false;
    this.logger.info(removed ? `Deleted index at ${indexPath}` : `No index to delete at ${indexPath}`);
    return removed;
  }

  private async embedChunks(chunks: Chunk[], signal: AbortSignal | undefined): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];
    for (const batch of toBatches(chunks, this.embedBatchSize)) {
      throwIfCancelled(signal);
      let batchVectors: Float32Array[];
      try {
        batchVectors = await this.embedder.embed(
          batch.map((c) => c.text),
          signal,
        );
      } catch (err) {
        // An abort surfaces from the embedder as its own error type
        throwIfCancelled(signal);
        throw err;
      }
      if (batchVectors.length !== batch.length) {
        throw new EmbeddingUnavailableError(
          `Embedder returned ${batchVectors.length} vectors for ${batch.length} chunks`,
        );
      }
      vectors.push(...batchVectors);
      this.logger.debug(`Embedded ${vectors.length}/${chunks.length} chunk(s)`);
    }
    return vectors;
  }

  /**
   * Before the first query, pick up an on-disk index that is newer than the
   * in-memory one. Afterwards the in-memory index is reused until a rebuild
   * or an explicit {@link reload}; while nothing is active, every query looks
   * for a file again.
   */
  private async ensureLoaded(): Promise<VectorIndex | null> {
    if (this.active && this.startupCheckDone) return this.active;

    this.pendingLoad ??= this.loadIfNewer().finally(() => {
      this.pendingLoad = null;
    });
    const index = await this.pendingLoad;
    this.startupCheckDone = true;
    return index;
  }

  private async loadIfNewer(): Promise<VectorIndex | null> {
    let mtimeMs: number;
    try {
      ({ mtimeMs } = await stat(this.options.indexPath));
    } catch (err) {
      if (isMissingPath(err)) return this.active;
      throw err;
    }
    if (this.active && mtimeMs <= this.activeMtimeMs) return this.active;
    return (await this.reload()) ?? this.active;
  }

  private swap(index: VectorIndex, mtimeMs: number): void {
    this.active = index;
    this.activeMtimeMs = mtimeMs;
  }
}

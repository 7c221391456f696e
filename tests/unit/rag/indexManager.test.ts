import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, stat, unlink, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { IndexManager } from '../../../src/rag/indexManager.js';
import type { IndexManagerOptions } from '../../../src/rag/indexManager.js';
import { VectorIndex } from '../../../src/rag/vectorIndex.js';
import { chunkText } from '../../../src/rag/chunker.js';
import { createLogger } from '../../../src/logging/logger.js';
import { InvalidConfigurationError } from '../../../src/errors/config.js';
import { EmbeddingUnavailableError } from '../../../src/errors/embedding.js';
import { DimensionMismatchError } from '../../../src/errors/vectorIndex.js';
import { BuildCancelledError } from '../../../src/errors/build.js';
import { KeywordEmbedder } from '../../fixtures/keywordEmbedder.js';

const RETURNS = 'Returns accepted within 30 days of purchase.';
const OFFICE = 'Office hours are 9am to 5pm Monday through Friday.';
const SHIPPING = 'Free shipping on orders over $50.';

describe('IndexManager', () => {
  let dir: string;
  let documentDir: string;
  let indexPath: string;
  let lines: string[];

  function makeManager(
    embedder: KeywordEmbedder,
    overrides: Partial<IndexManagerOptions> = {},
  ): IndexManager {
    return new IndexManager({
      embedder,
      indexPath,
      documentDir,
      chunkSize: 700,
      chunkOverlap: 0,
      retrievalK: 5,
      minScore: 0.2,
      retry: { maxRetries: 2, initialDelayMs: 0, backoffMultiplier: 2, maxDelayMs: 0 },
      logger: createLogger('info', (line) => lines.push(line)),
      ...overrides,
    });
  }

  async function writeDocs(files: Record<string, string>): Promise<void> {
    await mkdir(documentDir, { recursive: true });
    for (const [name, text] of Object.entries(files)) {
      await writeFile(join(documentDir, name), text, 'utf8');
    }
  }

  /** Push the index file's mtime into the future so it reads as newer than anything in memory. */
  async function touchIndex(secondsAhead: number): Promise<void> {
    const when = new Date(Date.now() + secondsAhead * 1000);
    await utimes(indexPath, when, when);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ragbase-manager-'));
    documentDir = join(dir, 'documents');
    indexPath = join(dir, 'vector_dbs', 'index.json');
    lines = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('build', () => {
    it('indexes each short document as one chunk and persists the index', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const manager = makeManager(new KeywordEmbedder());

      const result = await manager.build();

      expect(result.documents).toBe(2);
      expect(result.chunks).toBe(2);
      expect(result.indexPath).toBe(indexPath);
      expect(result.index.size).toBe(2);
      expect(result.index.dimension).toBe(8);
      expect(manager.activeIndex).toBe(result.index);
      expect((await VectorIndex.load(indexPath)).size).toBe(2);
    });

    it('chunks with per-build window settings', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const manager = makeManager(new KeywordEmbedder());

      const result = await manager.build(documentDir, { chunkSize: 20, chunkOverlap: 5 });

      const expected =
        chunkText(RETURNS, 20, 5, 'returns.txt').length + chunkText(OFFICE, 20, 5, 'office.txt').length;
      expect(result.chunks).toBe(expected);
      expect(result.index.size).toBe(expected);
    });

    it('builds an empty, dimension-less index from an empty directory', async () => {
      await writeDocs({});
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);

      const result = await manager.build();
      expect(result.index.size).toBe(0);
      expect(result.index.dimension).toBeNull();

      const outcome = await manager.query('anything', { k: 5, minScore: 0 });
      expect(outcome).toEqual({ results: [], indexAvailable: true });
      expect(embedder.calls).toBe(0);
    });

    it('treats a missing documents directory as empty', async () => {
      const manager = makeManager(new KeywordEmbedder());

      const result = await manager.build(join(dir, 'absent'));
      expect(result.documents).toBe(0);
      expect(lines).toContain(`[ragbase] Warning: Documents directory not found: ${join(dir, 'absent')}\n`);
    });

    it('rejects invalid chunking before touching the documents', async () => {
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);

      await expect(manager.build(documentDir, { chunkSize: 100, chunkOverlap: 100 })).rejects.toThrow(
        InvalidConfigurationError,
      );
      await expect(stat(indexPath)).rejects.toThrow();
      expect(embedder.calls).toBe(0);
    });

    it('keeps the previous index when a rebuild fails', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);
      const first = await manager.build();

      await writeDocs({ 'shipping.txt': SHIPPING });
      embedder.failNext = 1;
      await expect(manager.build()).rejects.toThrow(EmbeddingUnavailableError);

      expect(manager.activeIndex).toBe(first.index);
      expect((await VectorIndex.load(indexPath)).size).toBe(2);
      const outcome = await manager.query('What is the return window?');
      expect(outcome.results[0].chunk.text).toBe(RETURNS);
    });

    it('does not retry embedding during a build', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const embedder = new KeywordEmbedder();
      embedder.failNext = 1;

      await expect(makeManager(embedder).build()).rejects.toThrow(EmbeddingUnavailableError);
      expect(embedder.calls).toBe(1);
    });

    it('stops a cancelled build without writing an index', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);
      const controller = new AbortController();
      controller.abort();

      await expect(manager.build(documentDir, { signal: controller.signal })).rejects.toThrow(
        BuildCancelledError,
      );
      expect(manager.activeIndex).toBeNull();
      expect(embedder.calls).toBe(0);
      expect(await manager.query('return')).toEqual({ results: [], indexAvailable: false });
    });

    it('stops between embedding batches once cancelled', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE, 'shipping.txt': SHIPPING });
      const embedder = new KeywordEmbedder();
      const controller = new AbortController();
      embedder.onEmbed = () => controller.abort();
      const manager = makeManager(embedder, { embedBatchSize: 1 });

      await expect(manager.build(documentDir, { signal: controller.signal })).rejects.toThrow(
        BuildCancelledError,
      );
      expect(embedder.calls).toBe(1);
      expect(manager.activeIndex).toBeNull();
      await expect(stat(indexPath)).rejects.toThrow();
    });

    it('reports an embedder failure caused by the abort as a cancellation', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);
      const first = await manager.build();

      const controller = new AbortController();
      embedder.onEmbed = () => controller.abort();
      embedder.failNext = 1;

      await expect(manager.build(documentDir, { signal: controller.signal })).rejects.toThrow(
        BuildCancelledError,
      );
      expect(manager.activeIndex).toBe(first.index);
    });

    it('embeds in batches of embedBatchSize', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE, 'shipping.txt': SHIPPING });
      const embedder = new KeywordEmbedder();

      const result = await makeManager(embedder, { embedBatchSize: 2 }).build();
      expect(result.index.size).toBe(3);
      expect(embedder.calls).toBe(2);
    });

    it('runs concurrent builds one after another', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const manager = makeManager(new KeywordEmbedder());

      const [first, second] = await Promise.all([manager.build(), manager.build()]);
      expect(first.index).not.toBe(second.index);
      expect(manager.activeIndex).toBe(second.index);
    });

    it('serves the rebuilt index to later queries', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const manager = makeManager(new KeywordEmbedder());
      await manager.build();
      expect((await manager.query('shipping cost')).results).toEqual([]);

      await writeDocs({ 'shipping.txt': SHIPPING });
      await manager.build();

      const { results } = await manager.query('shipping cost');
      expect(results).toHaveLength(1);
      expect(results[0].chunk.sourcePath).toBe(join(documentDir, 'shipping.txt'));
      expect(results[0].score).toBeCloseTo(1, 6);
    });
  });

  describe('query', () => {
    it('ranks the returns policy above office hours', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const manager = makeManager(new KeywordEmbedder());
      await manager.build();

      const all = await manager.query('What is the return window?', { k: 2, minScore: 0 });
      expect(all.indexAvailable).toBe(true);
      expect(all.results.map((r) => r.chunk.text)).toEqual([RETURNS, OFFICE]);
      expect(all.results[0].score).toBeCloseTo(Math.SQRT1_2, 6);
      expect(all.results[0].score).toBeGreaterThan(all.results[1].score);

      const filtered = await manager.query('What is the return window?', { k: 2, minScore: 0.2 });
      expect(filtered.results.map((r) => r.chunk.text)).toEqual([RETURNS]);
    });

    it('never returns a result below minScore', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE, 'shipping.txt': SHIPPING });
      const manager = makeManager(new KeywordEmbedder());
      await manager.build();

      for (const minScore of [0, 0.5, 0.8]) {
        const { results } = await manager.query('refund for a return purchase', { k: 3, minScore });
        expect(results.every((r) => r.score >= minScore)).toBe(true);
      }
      expect((await manager.query('return purchase', { k: 3, minScore: 1.01 })).results).toEqual([]);
    });

    it('uses the configured k and minScore by default', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE, 'shipping.txt': SHIPPING });
      const manager = makeManager(new KeywordEmbedder(), { retrievalK: 1, minScore: 0 });
      await manager.build();

      const { results } = await manager.query('office hours');
      expect(results.map((r) => r.chunk.text)).toEqual([OFFICE]);
    });

    it('reports an unavailable index when nothing has been built', async () => {
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);

      expect(await manager.query('return')).toEqual({ results: [], indexAvailable: false });
      expect(embedder.calls).toBe(0);
    });

    it('rejects invalid k and minScore', async () => {
      const manager = makeManager(new KeywordEmbedder());

      await expect(manager.query('x', { k: 0 })).rejects.toThrow('k must be a positive integer, got 0.');
      await expect(manager.query('x', { k: 2.5 })).rejects.toThrow(InvalidConfigurationError);
      await expect(manager.query('x', { minScore: Number.NaN })).rejects.toThrow(
        'minScore must be a finite number, got NaN.',
      );
    });

    it('retries a transiently unavailable embedder', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);
      await manager.build();
      lines = [];

      embedder.failNext = 2;
      const { results } = await manager.query('return');
      expect(results).toHaveLength(1);
      expect(lines).toEqual([
        '[ragbase] Warning: Query embedding failed (keyword embedder offline); retry 1 in 0ms\n',
        '[ragbase] Warning: Query embedding failed (keyword embedder offline); retry 2 in 0ms\n',
      ]);
    });

    it('gives up after maxRetries', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const embedder = new KeywordEmbedder();
      const manager = makeManager(embedder);
      await manager.build();
      const before = embedder.calls;

      embedder.failNext = 3;
      await expect(manager.query('return')).rejects.toThrow(EmbeddingUnavailableError);
      expect(embedder.calls - before).toBe(3);
    });
  });

  describe('loading', () => {
    it('loads a persisted index transparently in a new manager', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      await makeManager(new KeywordEmbedder()).build();

      const fresh = makeManager(new KeywordEmbedder());
      expect(fresh.activeIndex).toBeNull();

      const { results, indexAvailable } = await fresh.query('What is the return window?');
      expect(indexAvailable).toBe(true);
      expect(results.map((r) => r.chunk.text)).toEqual([RETURNS]);
      expect(fresh.activeIndex?.size).toBe(2);
    });

    it('shares one load between concurrent first queries', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      await makeManager(new KeywordEmbedder()).build();
      const load = vi.spyOn(VectorIndex, 'load');

      const fresh = makeManager(new KeywordEmbedder());
      await Promise.all([fresh.query('return'), fresh.query('refund'), fresh.query('office')]);
      expect(load).toHaveBeenCalledTimes(1);
    });

    it('picks up a newer index file before the first query, then keeps it until reload', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const serving = makeManager(new KeywordEmbedder());
      await serving.build();

      await writeDocs({ 'shipping.txt': SHIPPING });
      await makeManager(new KeywordEmbedder()).build();
      await touchIndex(10);

      expect((await serving.query('shipping')).results).toHaveLength(1);

      await unlink(join(documentDir, 'shipping.txt'));
      await makeManager(new KeywordEmbedder()).build();
      await touchIndex(20);

      expect((await serving.query('shipping')).results).toHaveLength(1);

      await serving.reload();
      expect(await serving.query('shipping')).toEqual({ results: [], indexAvailable: true });
    });

    it('warns about a model mismatch and fails on dimension drift', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      await makeManager(new KeywordEmbedder()).build();
      lines = [];

      const drifted = makeManager(new KeywordEmbedder(['return', 'office', 'hour'], 'small-model'));
      await expect(drifted.query('return')).rejects.toThrow(DimensionMismatchError);
      expect(lines).toContain(
        `[ragbase] Warning: Index at ${indexPath} was built with model "keyword-test" but the embedder uses "small-model"; rebuild it if results look wrong\n`,
      );
    });

    it('reload keeps the index a build just saved', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const manager = makeManager(new KeywordEmbedder());
      const { index } = await manager.build();
      const load = vi.spyOn(VectorIndex, 'load');

      expect(await manager.reload()).toBe(index);
      expect(manager.activeIndex).toBe(index);
      expect(load).toHaveBeenCalledTimes(1);
    });

    it('reload returns null when no index file exists', async () => {
      expect(await makeManager(new KeywordEmbedder()).reload()).toBeNull();
    });
  });

  describe('clear', () => {
    it('deletes the index file and reports the index as unavailable', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const manager = makeManager(new KeywordEmbedder());
      await manager.build();

      expect(await manager.clear()).toBe(true);
      expect(manager.activeIndex).toBeNull();
      await expect(stat(indexPath)).rejects.toMatchObject({ code: 'ENOENT' });
      expect(await manager.query('return')).toEqual({ results: [], indexAvailable: false });
      expect((await manager.status()).available).toBe(false);
      expect(lines).toContain(`[ragbase] Deleted index at ${indexPath}\n`);
    });

    it('resolves false when there is nothing to delete', async () => {
      expect(await makeManager(new KeywordEmbedder()).clear()).toBe(false);
    });

    it('waits for a running build before deleting', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const manager = makeManager(new KeywordEmbedder());

      const build = manager.build();
      const cleared = manager.clear();
      await build;
      expect(await cleared).toBe(true);
      expect(manager.activeIndex).toBeNull();
    });

    it('serves again after the next build', async () => {
      await writeDocs({ 'returns.txt': RETURNS });
      const manager = makeManager(new KeywordEmbedder());
      await manager.build();
      await manager.clear();
      await manager.build();

      const { results, indexAvailable } = await manager.query('What is the return window?');
      expect(indexAvailable).toBe(true);
      expect(results.map((r) => r.chunk.text)).toEqual([RETURNS]);
    });
  });

  describe('status', () => {
    it('describes a missing index', async () => {
      expect(await makeManager(new KeywordEmbedder()).status()).toEqual({
        available: false,
        entries: 0,
        dimension: null,
        model: null,
        builtAt: null,
        indexPath,
      });
    });

    it('describes the active index', async () => {
      await writeDocs({ 'returns.txt': RETURNS, 'office.txt': OFFICE });
      const manager = makeManager(new KeywordEmbedder());
      const { index } = await manager.build();

      expect(await manager.status()).toEqual({
        available: true,
        entries: 2,
        dimension: 8,
        model: 'keyword-test',
        builtAt: index.metadata.builtAt,
        indexPath,
      });
    });
  });
});

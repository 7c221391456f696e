import type { AppConfig, EmbeddingConfig } from '../types/config.types.js';
import type { EmbeddingProvider } from './embedders/embeddingProvider.js';
import type { Logger } from '../logging/logger.js';
import type { KnowledgeBase } from './knowledgeBase.js';
import { OllamaEmbedder } from './embedders/ollamaEmbedder.js';
import { OpenAIEmbedder } from './embedders/openaiEmbedder.js';
import { DocumentLoader } from './documentLoader.js';
import { IndexManager } from './indexManager.js';

export type { KnowledgeBase } from './knowledgeBase.js';
export { IndexManager } from './indexManager.js';

export function createEmbedder(config: EmbeddingConfig): EmbeddingProvider {
  if (config.provider === 'openai') {
    return new OpenAIEmbedder({
      apiKey: config.apiKey,
      model: config.model,
      batchSize: config.batchSize,
      ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
    });
  }
  return new OllamaEmbedder(config.baseUrl, config.model, config.batchSize);
}

/**
 * Wires an {@link IndexManager} from application config. No I/O happens
 * here: the persisted index is loaded lazily before the first query.
 */
export function createIndexManager(config: AppConfig, logger: Logger): IndexManager {
  const { rag } = config;
  return new IndexManager({
    embedder: createEmbedder(config.embedding),
    indexPath: rag.indexPath,
    documentDir: rag.documentDir,
    chunkSize: rag.chunkSize,
    chunkOverlap: rag.chunkOverlap,
    retrievalK: rag.retrievalK,
    minScore: rag.minScore,
    retry: config.retry,
    embedBatchSize: config.embedding.batchSize,
    documentLoader: new DocumentLoader({ maxFileSizeBytes: rag.maxFileSizeBytes, logger }),
    logger,
  });
}

/**
 * Build the index when none is available yet, so a freshly started server
 * answers from the documents directory. A failed build is logged and the
 * server keeps running; queries then report an unavailable index.
 * Resolves true when an index is available afterwards.
 */
export async function ensureIndex(knowledgeBase: KnowledgeBase, logger: Logger): Promise<boolean> {
  const status = await knowledgeBase.status();
  if (status.available) {
    logger.info(`Using existing index at ${status.indexPath} (${status.entries} entries)`);
    return true;
  }
  logger.info(`No index at ${status.indexPath}; building one now`);
  try {
    const result = await knowledgeBase.build();
    logger.info(`Startup build indexed ${result.documents} documents (${result.chunks} chunks)`);
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Startup build failed (${message}); serving without an index`);
    return false;
  }
}

// Public API: explicit named exports only (no re-export *)

export type { KnowledgeBase } from './rag/knowledgeBase.js';
export type { EmbeddingProvider } from './rag/embedders/embeddingProvider.js';
export type { TextExtractor } from './rag/pdfExtractor.js';
export type { Logger } from './logging/logger.js';
export type {
  Chunk,
  IndexEntry,
  QueryResult,
  QueryOptions,
  QueryOutcome,
  RetrievedPassage,
  BuildOptions,
  BuildResult,
  IndexStatus,
  SourceDocument,
} from './types/rag.types.js';
export type { AppConfig, EmbeddingConfig, RagConfig, RetryConfig } from './types/config.types.js';

export { chunkText, validateChunking } from './rag/chunker.js';
export { VectorIndex } from './rag/vectorIndex.js';
export { IndexManager } from './rag/indexManager.js';
export { DocumentLoader } from './rag/documentLoader.js';
export { PdfExtractor } from './rag/pdfExtractor.js';
export { OllamaEmbedder } from './rag/embedders/ollamaEmbedder.js';
export { OpenAIEmbedder } from './rag/embedders/openaiEmbedder.js';
export { withRetry } from './rag/embedders/retry.js';
export { createIndexManager, createEmbedder } from './rag/index.js';
export { formatContext, toPassages, describeNoResults } from './enhancers/contextFormatter.js';
export { loadConfig } from './config/loader.js';
export { validateConfig } from './config/validator.js';
export { createLogger } from './logging/logger.js';
export { createMcpServer, startMcpServer } from './mcp/server.js';
export { createApiServer } from './api/server.js';
export { RagbaseError } from './errors/base.js';
export { InvalidConfigurationError } from './errors/config.js';
export { EmbeddingUnavailableError } from './errors/embedding.js';
export { DimensionMismatchError, IndexNotFoundError, IndexCorruptedError } from './errors/vectorIndex.js';
export { BuildCancelledError } from './errors/build.js';

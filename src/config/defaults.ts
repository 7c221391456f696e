import type {
  AppConfig,
  OllamaEmbeddingConfig,
  OpenAIEmbeddingConfig,
} from '../types/config.types.js';
import { join } from 'node:path';

export const DEFAULT_OLLAMA_EMBEDDING: OllamaEmbeddingConfig = {
  provider: 'ollama',
  // Ollama's build of sentence-transformers/all-MiniLM-L6-v2 (384 dimensions)
  model: 'all-minilm',
  baseUrl: 'http://localhost:11434',
  batchSize: 32,
};

export const DEFAULT_OPENAI_EMBEDDING: OpenAIEmbeddingConfig = {
  provider: 'openai',
  model: 'text-embedding-3-small',
  apiKey: '',
  batchSize: 64,
};

export const DEFAULT_CONFIG: AppConfig = {
  rag: {
    documentDir: join('data', 'documents'),
    indexPath: join('data', 'vector_dbs', 'company_index.json'),
    chunkSize: 700,
    chunkOverlap: 300,
    retrievalK: 5,
    minScore: 0.2,
    maxFileSizeBytes: 20 * 1024 * 1024,
  },
  embedding: DEFAULT_OLLAMA_EMBEDDING,
  retry: {
    maxRetries: 3,
    initialDelayMs: 250,
    backoffMultiplier: 2,
    maxDelayMs: 4000,
  },
  api: {
    port: 8000,
    host: '127.0.0.1',
  },
  logLevel: 'info',
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface OllamaEmbeddingConfig {
  provider: 'ollama';
  model: string;
  baseUrl: string;
  batchSize: number;
}

export interface OpenAIEmbeddingConfig {
  provider: 'openai';
  model: string;
  apiKey: string;
  baseUrl?: string;
  batchSize: number;
}

export type EmbeddingConfig = OllamaEmbeddingConfig | OpenAIEmbeddingConfig;

export interface RagConfig {
  documentDir: string;
  indexPath: string;
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  minScore: number;
  maxFileSizeBytes: number;
}

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
}

export interface ApiConfig {
  port: number;
  host: string;
}

export interface AppConfig {
  rag: RagConfig;
  embedding: EmbeddingConfig;
  retry: RetryConfig;
  api: ApiConfig;
  logLevel: LogLevel;
}

import type { AppConfig, EmbeddingConfig, RetryConfig } from '../types/config.types.js';
import { InvalidConfigurationError } from '../errors/config.js';
import { validateChunking } from '../rag/chunker.js';

const LOG_LEVELS = new Set(['debug', 'info', 'warn', 'error']);

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function validateEmbedding(embedding: EmbeddingConfig): void {
  if (!isNonEmptyString(embedding.model)) {
    throw new InvalidConfigurationError('embedding.model is required.');
  }
  if (!isPositiveInteger(embedding.batchSize)) {
    throw new InvalidConfigurationError(
      `embedding.batchSize must be a positive integer, got ${String(embedding.batchSize)}.`,
    );
  }
  if (embedding.provider === 'ollama' && !isNonEmptyString(embedding.baseUrl)) {
    throw new InvalidConfigurationError('Embedding provider "ollama" requires baseUrl.');
  }
  if (embedding.provider === 'openai' && !isNonEmptyString(embedding.apiKey)) {
    throw new InvalidConfigurationError(
      'Embedding provider "openai" requires apiKey. Set OPENAI_API_KEY env var or provide in config.',
    );
  }
}

function validateRetry(retry: RetryConfig): void {
  if (!Number.isInteger(retry.maxRetries) || retry.maxRetries < 0) {
    throw new InvalidConfigurationError('retry.maxRetries must be a non-negative integer.');
  }
  if (!Number.isFinite(retry.initialDelayMs) || retry.initialDelayMs < 0) {
    throw new InvalidConfigurationError('retry.initialDelayMs must be >= 0.');
  }
  if (!Number.isFinite(retry.backoffMultiplier) || retry.backoffMultiplier < 1) {
    throw new InvalidConfigurationError('retry.backoffMultiplier must be >= 1.');
  }
  if (!Number.isFinite(retry.maxDelayMs) || retry.maxDelayMs < retry.initialDelayMs) {
    throw new InvalidConfigurationError('retry.maxDelayMs must be >= retry.initialDelayMs.');
  }
}

export function validateConfig(config: AppConfig): void {
  const { rag } = config;

  validateChunking(rag.chunkSize, rag.chunkOverlap);

  if (!isPositiveInteger(rag.retrievalK)) {
    throw new InvalidConfigurationError(
      `rag.retrievalK must be a positive integer, got ${String(rag.retrievalK)}.`,
    );
  }
  if (typeof rag.minScore !== 'number' || !Number.isFinite(rag.minScore)) {
    throw new InvalidConfigurationError(
      `rag.minScore must be a finite number, got ${String(rag.minScore)}.`,
    );
  }
  if (!isPositiveInteger(rag.maxFileSizeBytes)) {
    throw new InvalidConfigurationError('rag.maxFileSizeBytes must be a positive integer.');
  }
  if (!isNonEmptyString(rag.documentDir)) {
    throw new InvalidConfigurationError('rag.documentDir is required.');
  }
  if (!isNonEmptyString(rag.indexPath)) {
    throw new InvalidConfigurationError('rag.indexPath is required.');
  }

  validateEmbedding(config.embedding);
  validateRetry(config.retry);

  if (!Number.isInteger(config.api.port) || config.api.port < 1 || config.api.port > 65535) {
    throw new InvalidConfigurationError(
      `API port must be between 1 and 65535, got ${config.api.port}.`,
    );
  }

  if (!LOG_LEVELS.has(config.logLevel)) {
    throw new InvalidConfigurationError(
      `logLevel must be one of debug, info, warn, error; got "${config.logLevel}".`,
    );
  }
}

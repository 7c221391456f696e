import type { AppConfig, EmbeddingConfig, LogLevel } from '../types/config.types.js';
import { DEFAULT_CONFIG, DEFAULT_OLLAMA_EMBEDDING, DEFAULT_OPENAI_EMBEDDING } from './defaults.js';
import { InvalidConfigurationError } from '../errors/config.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export type ConfigOverrides = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

export const CONFIG_FILE_NAMES = ['.ragbase.json', 'ragbase.config.json'] as const;

function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  if (!override) return base;
  const result = { ...base };
  for (const key of Object.keys(override) as Array<keyof T>) {
    const val = override[key];
    if (val !== undefined && val !== null) {
      result[key] = val as T[keyof T];
    }
  }
  return result;
}

function embeddingDefaults(provider: string): EmbeddingConfig {
  switch (provider) {
    case 'ollama':
      return DEFAULT_OLLAMA_EMBEDDING;
    case 'openai':
      return DEFAULT_OPENAI_EMBEDDING;
    default:
      throw new InvalidConfigurationError(
        `Unknown embedding provider "${provider}". Expected "ollama" or "openai".`,
      );
  }
}

// Switching provider starts from that provider's defaults so that, say, the
// Ollama base URL never leaks into an OpenAI client.
function mergeEmbedding(
  base: EmbeddingConfig,
  override: Partial<EmbeddingConfig> | undefined,
): EmbeddingConfig {
  if (!override) return base;
  const provider = override.provider ?? base.provider;
  const start = provider === base.provider ? base : embeddingDefaults(provider);
  return mergeSection<EmbeddingConfig>(start, override);
}

function mergeConfig(base: AppConfig, override: ConfigOverrides): AppConfig {
  return {
    rag: mergeSection(base.rag, override.rag),
    embedding: mergeEmbedding(base.embedding, override.embedding),
    retry: mergeSection(base.retry, override.retry),
    api: mergeSection(base.api, override.api),
    logLevel: override.logLevel ?? base.logLevel,
  };
}

function loadFileConfig(cwd: string): ConfigOverrides {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (!existsSync(candidate)) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err) {
      throw new InvalidConfigurationError(`Could not parse config file ${candidate}`, err);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new InvalidConfigurationError(`Config file ${candidate} must contain a JSON object`);
    }
    return parsed as ConfigOverrides;
  }
  return {};
}

function readNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

function loadEnvOverrides(currentProvider: EmbeddingConfig['provider']): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const port = readNumber('RAGBASE_PORT');
  const host = process.env['RAGBASE_HOST'];
  if (port !== undefined || host) {
    overrides.api = {
      ...(port !== undefined ? { port } : {}),
      ...(host ? { host } : {}),
    };
  }

  const logLevel = process.env['RAGBASE_LOG_LEVEL'];
  if (logLevel) {
    overrides.logLevel = logLevel as LogLevel;
  }

  const rag: Partial<AppConfig['rag']> = {};
  const documentDir = process.env['RAGBASE_DOCUMENT_DIR'];
  const indexPath = process.env['RAGBASE_INDEX_PATH'];
  if (documentDir) rag.documentDir = documentDir;
  if (indexPath) rag.indexPath = indexPath;
  const chunkSize = readNumber('RAGBASE_CHUNK_SIZE');
  const chunkOverlap = readNumber('RAGBASE_CHUNK_OVERLAP');
  const retrievalK = readNumber('RAGBASE_RETRIEVAL_K');
  const minScore = readNumber('RAGBASE_MIN_SCORE');
  if (chunkSize !== undefined) rag.chunkSize = chunkSize;
  if (chunkOverlap !== undefined) rag.chunkOverlap = chunkOverlap;
  if (retrievalK !== undefined) rag.retrievalK = retrievalK;
  if (minScore !== undefined) rag.minScore = minScore;
  if (Object.keys(rag).length > 0) overrides.rag = rag;

  // Only RAGBASE_EMBEDDER or an OpenAI key switch provider; otherwise the
  // model and base URL apply to whichever provider is already configured
  const embedder = process.env['RAGBASE_EMBEDDER'];
  const model = process.env['RAGBASE_EMBEDDING_MODEL'];
  const openaiKey = process.env['OPENAI_API_KEY'];
  const openaiBaseUrl = process.env['OPENAI_BASE_URL'];
  const ollamaBaseUrl = process.env['OLLAMA_BASE_URL'];

  if (embedder === 'openai' || (embedder === undefined && openaiKey)) {
    overrides.embedding = {
      provider: 'openai',
      ...(openaiKey ? { apiKey: openaiKey } : {}),
      ...(openaiBaseUrl ? { baseUrl: openaiBaseUrl } : {}),
      ...(model ? { model } : {}),
    };
  } else if (embedder === 'ollama') {
    overrides.embedding = {
      provider: 'ollama',
      ...(ollamaBaseUrl ? { baseUrl: ollamaBaseUrl } : {}),
      ...(model ? { model } : {}),
    };
  } else if (embedder !== undefined) {
    throw new InvalidConfigurationError(
      `RAGBASE_EMBEDDER must be "ollama" or "openai", got "${embedder}".`,
    );
  } else {
    const baseUrl = currentProvider === 'openai' ? openaiBaseUrl : ollamaBaseUrl;
    if (baseUrl || model) {
      overrides.embedding = {
        ...(baseUrl ? { baseUrl } : {}),
        ...(model ? { model } : {}),
      };
    }
  }

  return overrides;
}

/** Defaults, then the first config file found in `cwd`, then environment variables. */
export function loadConfig(cwd: string = process.cwd()): AppConfig {
  const fileConfig = mergeConfig(DEFAULT_CONFIG, loadFileConfig(cwd));
  return mergeConfig(fileConfig, loadEnvOverrides(fileConfig.embedding.provider));
}

import OpenAI from 'openai';
import type { EmbeddingProvider } from './embeddingProvider.js';
import { toBatches } from './embeddingProvider.js';
import { EmbeddingUnavailableError } from '../../errors/embedding.js';

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model?: string;
  /** Any OpenAI-compatible endpoint, e.g. a local vLLM or LM Studio server. */
  baseUrl?: string;
  batchSize?: number;
}

export class OpenAIEmbedder implements EmbeddingProvider {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly batchSize: number;
  private _dimensions = 0;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model ?? 'text-embedding-3-small';
    this.batchSize = options.batchSize ?? 64;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    });
  }

  get dimensions(): number {
    return this._dimensions;
  }

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];
    for (const batch of toBatches(texts, this.batchSize)) {
      signal?.throwIfAborted();
      vectors.push(...(await this.embedBatch(batch, signal)));
    }
    return vectors;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch {
      return false;
    }
  }

  private async embedBatch(input: string[], signal: AbortSignal | undefined): Promise<Float32Array[]> {
    let data: Array<{ index: number; embedding: number[] }>;
    try {
      const body = { model: this.model, input };
      const response = signal
        ? await this.client.embeddings.create(body, { signal })
        : await this.client.embeddings.create(body);
      data = response.data;
    } catch (err) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      const message = err instanceof Error ? err.message : String(err);
      throw new EmbeddingUnavailableError(`OpenAI embed request failed: ${message}`, status, err);
    }

    if (data.length !== input.length) {
      throw new EmbeddingUnavailableError(
        `OpenAI returned ${data.length} embeddings for ${input.length} inputs`,
      );
    }

    // The API does not promise response order; `index` refers back to the input
    const vectors = [...data]
      .sort((a, b) => a.index - b.index)
      .map((item) => new Float32Array(item.embedding));
    this._dimensions = vectors[0]?.length ?? this._dimensions;
    return vectors;
  }
}

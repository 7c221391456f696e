import type { EmbeddingProvider } from './embeddingProvider.js';
import { toBatches } from './embeddingProvider.js';
import { EmbeddingUnavailableError } from '../../errors/embedding.js';

interface OllamaEmbedResponse {
  embeddings?: number[][];
}

export class OllamaEmbedder implements EmbeddingProvider {
  private _dimensions = 0;

  constructor(
    private readonly baseUrl: string,
    readonly model = 'all-minilm',
    private readonly batchSize = 32,
  ) {}

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
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }

  private async embedBatch(input: string[], signal: AbortSignal | undefined): Promise<Float32Array[]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input }),
        ...(signal ? { signal } : {}),
      });
    } catch (err) {
      throw new EmbeddingUnavailableError('Failed to connect to Ollama for embeddings', undefined, err);
    }

    if (!response.ok) {
      throw new EmbeddingUnavailableError(
        `Ollama embed request failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    let data: OllamaEmbedResponse;
    try {
      data = (await response.json()) as OllamaEmbedResponse;
    } catch (err) {
      throw new EmbeddingUnavailableError('Ollama returned an unreadable embed response', undefined, err);
    }

    const embeddings = data.embeddings ?? [];
    if (embeddings.length !== input.length) {
      throw new EmbeddingUnavailableError(
        `Ollama returned ${embeddings.length} embeddings for ${input.length} inputs`,
      );
    }

    const vectors = embeddings.map((embedding) => new Float32Array(embedding));
    this._dimensions = vectors[0]?.length ?? this._dimensions;
    return vectors;
  }
}

/**
 * Maps text to fixed-length vectors. Implementations may batch internally but
 * must return exactly one vector per input, in input order.
 */
export interface EmbeddingProvider {
  /** Model identifier, recorded in the persisted index to detect model drift. */
  readonly model: string;
  /** Vector length, or 0 until the first successful call reveals it. */
  readonly dimensions: number;
  /** An aborted `signal` stops the remaining batches and cancels the request in flight. */
  embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]>;
  isAvailable(): Promise<boolean>;
}

export function toBatches<T>(items: readonly T[], batchSize: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

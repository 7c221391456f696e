import { RagbaseError } from './base.js';

export class EmbeddingUnavailableError extends RagbaseError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'EMBEDDING_UNAVAILABLE', cause);
  }
}

import { RagbaseError } from './base.js';

/** Bad chunking, retrieval or service settings. Not retryable: the caller must fix the config. */
export class InvalidConfigurationError extends RagbaseError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_CONFIGURATION', cause);
  }
}

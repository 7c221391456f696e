import { RagbaseError } from './base.js';

export class BuildCancelledError extends RagbaseError {
  constructor(cause?: unknown) {
    super('Index build was cancelled', 'BUILD_CANCELLED', cause);
  }
}

import type {
  BuildOptions,
  BuildResult,
  IndexStatus,
  QueryOptions,
  QueryOutcome,
} from '../types/rag.types.js';

/**
 * What the tool layer (REST, MCP, CLI) consumes from the retrieval core.
 * Tests substitute a mock; production uses {@link IndexManager}.
 */
export interface KnowledgeBase {
  /**
   * Rebuild the index from a documents directory and make it the active one.
   * Defaults to the configured directory.
   */
  build(documentDir?: string, options?: BuildOptions): Promise<BuildResult>;

  /**
   * Ranked passages scoring at least `minScore`, most relevant first.
   * An empty result is a valid "nothing relevant" answer.
   */
  query(text: string, options?: QueryOptions): Promise<QueryOutcome>;

  status(): Promise<IndexStatus>;

  /**
   * Delete the persisted index and drop the active one, so queries report an
   * unavailable index until the next build. Resolves false when no file existed.
   */
  clear(): Promise<boolean>;
}

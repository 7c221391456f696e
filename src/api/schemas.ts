import { z } from 'zod';
import type { IndexStatus, RetrievedPassage } from '../types/rag.types.js';

// ── Request schemas ──────────────────────────────────────────────────────────

export const queryBodySchema = z.object({
  query: z.string().min(1),
  k: z.number().int().positive().optional(),
  minScore: z.number().finite().optional(),
});

export type QueryBody = z.infer<typeof queryBodySchema>;

export const indexBodySchema = z.object({
  directory: z.string().min(1).optional(),
  chunkSize: z.number().int().positive().optional(),
  chunkOverlap: z.number().int().nonnegative().optional(),
});

export type IndexBody = z.infer<typeof indexBodySchema>;

// ── Response schemas ─────────────────────────────────────────────────────────

export interface QueryResponse {
  results: RetrievedPassage[];
  indexAvailable: boolean;
  /** <retrieved_context> block, or the "no grounded answer" notice when empty. */
  formatted: string;
}

export interface IndexResponse {
  documents: number;
  chunks: number;
  dimension: number | null;
  indexPath: string;
}

export interface ClearResponse {
  removed: boolean;
  indexPath: string;
}

export type StatusResponse = IndexStatus;

export interface ErrorResponse {
  error: string;
  code?: string;
}

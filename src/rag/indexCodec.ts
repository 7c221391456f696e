import { z } from 'zod';
import type { IndexEntry, IndexMetadata } from '../types/rag.types.js';
import { IndexCorruptedError } from '../errors/vectorIndex.js';

export const INDEX_FORMAT_VERSION = 1;

/**
 * On-disk layout. Embeddings are little-endian float32 bytes, base64 encoded,
 * so a save/load round trip reproduces every vector bit for bit.
 */
const persistedIndexSchema = z.object({
  version: z.literal(INDEX_FORMAT_VERSION),
  dimension: z.number().int().positive().nullable(),
  model: z.string().nullable(),
  builtAt: z.string().nullable(),
  entries: z.array(
    z.object({
      text: z.string(),
      sourcePath: z.string(),
      offset: z.number().int().nonnegative(),
      length: z.number().int().nonnegative(),
      embedding: z.string(),
    }),
  ),
});

export type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export interface IndexSnapshot {
  dimension: number | null;
  metadata: IndexMetadata;
  entries: IndexEntry[];
}

export function encodeVector(vector: Float32Array): string {
  const buf = Buffer.alloc(vector.length * 4);
  vector.forEach((value, i) => buf.writeFloatLE(value, i * 4));
  return buf.toString('base64');
}

export function decodeVector(encoded: string): Float32Array {
  const buf = Buffer.from(encoded, 'base64');
  if (buf.length % 4 !== 0) {
    throw new IndexCorruptedError(`Embedding payload of ${buf.length} bytes is not float32 aligned`);
  }
  const vector = new Float32Array(buf.length / 4);
  for (let i = 0; i < vector.length; i++) {
    vector[i] = buf.readFloatLE(i * 4);
  }
  return vector;
}

export function serializeIndex(snapshot: IndexSnapshot): string {
  const persisted: PersistedIndex = {
    version: INDEX_FORMAT_VERSION,
    dimension: snapshot.dimension,
    model: snapshot.metadata.model,
    builtAt: snapshot.metadata.builtAt,
    entries: snapshot.entries.map(({ chunk, embedding }) => ({
      text: chunk.text,
      sourcePath: chunk.sourcePath,
      offset: chunk.offset,
      length: chunk.length,
      embedding: encodeVector(embedding),
    })),
  };
  return JSON.stringify(persisted);
}

export function parseIndex(raw: string, origin: string): IndexSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new IndexCorruptedError(`Index file ${origin} is not valid JSON`, err);
  }

  const parsed = persistedIndexSchema.safeParse(json);
  if (!parsed.success) {
    throw new IndexCorruptedError(
      `Index file ${origin} has an unexpected layout: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      parsed.error,
    );
  }

  const { dimension, model, builtAt, entries } = parsed.data;
  return {
    dimension,
    metadata: { model, builtAt },
    entries: entries.map(({ embedding, ...chunk }) => ({
      chunk,
      embedding: decodeVector(embedding),
    })),
  };
}

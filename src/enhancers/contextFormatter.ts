import type { QueryOutcome, QueryResult, RetrievedPassage } from '../types/rag.types.js';

export interface FormatOptions {
  maxCharsPerChunk?: number;
}

export function toPassages(results: QueryResult[]): RetrievedPassage[] {
  return results.map(({ chunk, score }) => ({ text: chunk.text, source: chunk.sourcePath, score }));
}

/** What the tool layer says instead of answering when retrieval comes back empty. */
export function describeNoResults(outcome: QueryOutcome, query: string): string {
  return outcome.indexAvailable
    ? `No grounded answer available: no relevant documents found for: ${query}`
    : 'No grounded answer available: the document index has not been built yet.';
}

function escapeAttr(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

/**
 * Formats query results into a <retrieved_context> XML block for grounding a
 * prompt. Returns an empty string for no results, so the caller can skip injection.
 *
 * Results whose first 200 characters repeat an earlier result are dropped, and
 * long chunks are cut at the last line break before `maxCharsPerChunk`.
 */
export function formatContext(
  results: QueryResult[],
  query: string,
  options: FormatOptions = {},
): string {
  if (results.length === 0) return '';

  const maxChars = options.maxCharsPerChunk ?? 2000;

  const seen = new Set<string>();
  const deduped = results.filter((r) => {
    const key = r.chunk.text.slice(0, 200);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const blocks = deduped
    .map((r, i) => {
      const { chunk, score } = r;

      let content: string;
      if (chunk.text.length > maxChars) {
        const lastNewline = chunk.text.lastIndexOf('\n', maxChars);
        content =
          (lastNewline > 0 ? chunk.text.slice(0, lastNewline) : chunk.text.slice(0, maxChars)) +
          '\n... [truncated]';
      } else {
        content = chunk.text;
      }

      return (
        `<passage rank="${i + 1}" source="${escapeAttr(chunk.sourcePath)}" offset="${chunk.offset}" score="${score.toFixed(2)}">\n` +
        `${content}\n` +
        `</passage>`
      );
    })
    .join('\n');

  return (
    `<retrieved_context query="${escapeAttr(query)}" results="${deduped.length}">\n` +
    blocks +
    '\n</retrieved_context>'
  );
}

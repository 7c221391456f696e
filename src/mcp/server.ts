import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import type { KnowledgeBase } from '../rag/knowledgeBase.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { describeNoResults, formatContext } from '../enhancers/contextFormatter.js';

export interface McpServerDeps {
  knowledgeBase: KnowledgeBase;
  logger?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Creates and wires up a McpServer with the retrieval tools and the index
 * status resource. Caller must then call server.connect(transport).
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const { knowledgeBase } = deps;

  const server = new McpServer({
    name: 'ragbase',
    version: '0.1.0',
  });

  // ── Resources ───────────────────────────────────────────────────────────

  server.resource(
    'index-status',
    'ragbase://index/status',
    { description: 'Current index health: entry count, dimension, embedding model, build time.' },
    async () => ({
      contents: [
        {
          uri: 'ragbase://index/status',
          mimeType: 'application/json',
          text: JSON.stringify(await knowledgeBase.status()),
        },
      ],
    }),
  );

  // ── Tools ────────────────────────────────────────────────────────────────

  server.tool(
    'search_documents',
    'Retrieve company policy passages relevant to a question, ranked by similarity.',
    {
      query: z.string().min(1).describe('Natural-language question'),
      k: z.number().int().min(1).max(50).optional().describe('Max passages (default from config)'),
      minScore: z.number().optional().describe('Drop passages scoring below this (default from config)'),
    },
    async ({ query, k, minScore }) => {
      try {
        const outcome = await knowledgeBase.query(query, {
          ...(k !== undefined ? { k } : {}),
          ...(minScore !== undefined ? { minScore } : {}),
        });
        return {
          content: [
            {
              type: 'text' as const,
              text: formatContext(outcome.results, query) || describeNoResults(outcome, query),
            },
          ],
        };
      } catch (err) {
        return {
          isError: true,
          content: [{ type: 'text' as const, text: `Search failed: ${errorMessage(err)}` }],
        };
      }
    },
  );

  server.tool(
    'rebuild_index',
    'Re-index the documents directory and swap in the new index.',
    {
      directory: z.string().optional().describe('Documents directory (default from config)'),
    },
    async ({ directory }) => {
      try {
        const result = await knowledgeBase.build(directory);
        return {
          content: [
            {
              type: 'text' as const,
              text: `Indexed ${result.documents} documents (${result.chunks} chunks) into ${result.indexPath}`,
            },
          ],
        };
      } catch (err) {
        return {
          isError: true,
          content: [{ type: 'text' as const, text: `Index failed: ${errorMessage(err)}` }],
        };
      }
    },
  );

  server.tool(
    'clear_index',
    'Delete the persisted index. Searches report no index until the next rebuild.',
    {},
    async () => {
      try {
        const removed = await knowledgeBase.clear();
        return {
          content: [
            {
              type: 'text' as const,
              text: removed ? 'Index deleted' : 'No index to delete',
            },
          ],
        };
      } catch (err) {
        return {
          isError: true,
          content: [{ type: 'text' as const, text: `Clear failed: ${errorMessage(err)}` }],
        };
      }
    },
  );

  return server;
}

/**
 * Starts the MCP server over stdio. Logs only to stderr.
 */
export async function startMcpServer(deps: McpServerDeps): Promise<void> {
  const logger = deps.logger ?? silentLogger;
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  logger.info('MCP server starting on stdio');
  await server.connect(transport);
  logger.info('MCP server connected');
}

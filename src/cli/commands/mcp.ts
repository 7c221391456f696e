import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { createIndexManager, ensureIndex } from '../../rag/index.js';
import { startMcpServer } from '../../mcp/server.js';

export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Serve the retrieval tools over MCP (stdio)')
    .option('--no-build', 'Do not build the index at startup when none exists')
    .action(async (opts: { build: boolean }) => {
      const config = loadConfig();
      validateConfig(config);
      const logger = createLogger(config.logLevel);
      const knowledgeBase = createIndexManager(config, logger);
      if (opts.build) await ensureIndex(knowledgeBase, logger);
      await startMcpServer({ knowledgeBase, logger });
    });
}

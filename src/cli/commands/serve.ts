import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { createIndexManager, ensureIndex } from '../../rag/index.js';
import { createApiServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the REST API server')
    .option('--port <n>', 'Port to listen on (default: api.port)')
    .option('--host <h>', 'Host to bind to (default: api.host)')
    .option('--no-build', 'Do not build the index at startup when none exists')
    .action(async (opts: { port?: string; host?: string; build: boolean }) => {
      const config = loadConfig();
      validateConfig(config);
      const logger = createLogger(config.logLevel);
      const knowledgeBase = createIndexManager(config, logger);
      if (opts.build) await ensureIndex(knowledgeBase, logger);
      const app = createApiServer({ knowledgeBase });

      const port = opts.port !== undefined ? parseInt(opts.port, 10) : config.api.port;
      const host = opts.host ?? config.api.host;
      await app.listen({ port, host });
      logger.info(`REST API listening on http://${host}:${port}`);
    });
}

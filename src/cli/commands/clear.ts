import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { createIndexManager } from '../../rag/index.js';

export function registerClearCommand(program: Command): void {
  program
    .command('clear')
    .description('Delete the persisted index (rag.indexPath)')
    .action(async () => {
      const config = loadConfig();
      validateConfig(config);
      const manager = createIndexManager(config, createLogger(config.logLevel));
      const removed = await manager.clear();
      process.stdout.write(
        removed ? `Deleted ${manager.indexPath}\n` : `No index at ${manager.indexPath}\n`,
      );
    });
}

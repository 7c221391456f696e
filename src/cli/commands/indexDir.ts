import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { createIndexManager } from '../../rag/index.js';

export function registerIndexDirCommand(program: Command): void {
  program
    .command('index [directory]')
    .description('Chunk, embed and index a documents directory (default: rag.documentDir)')
    .option('--chunk-size <n>', 'Characters per chunk')
    .option('--chunk-overlap <n>', 'Characters shared by consecutive chunks')
    .action(async (directory: string | undefined, opts: { chunkSize?: string; chunkOverlap?: string }) => {
      const config = loadConfig();
      validateConfig(config);
      const logger = createLogger(config.logLevel);
      const manager = createIndexManager(config, logger);

      // Ctrl-C abandons the build; the previously saved index stays as it was
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);
      try {
        const result = await manager.build(directory, {
          ...(opts.chunkSize !== undefined ? { chunkSize: Number(opts.chunkSize) } : {}),
          ...(opts.chunkOverlap !== undefined ? { chunkOverlap: Number(opts.chunkOverlap) } : {}),
          signal: controller.signal,
        });
        process.stdout.write(
          `Indexed ${result.documents} documents (${result.chunks} chunks) into ${result.indexPath}\n`,
        );
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}

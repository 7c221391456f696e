import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { createIndexManager } from '../../rag/index.js';
import { describeNoResults, formatContext, toPassages } from '../../enhancers/contextFormatter.js';

export function registerQueryCommand(program: Command): void {
  program
    .command('query <text>')
    .description('Retrieve the passages most relevant to a question')
    .option('-k, --top <n>', 'Max results (default: rag.retrievalK)')
    .option('--min-score <x>', 'Minimum similarity score (default: rag.minScore)')
    .option('--json', 'Print {text, source, score} passages as JSON')
    .action(async (text: string, opts: { top?: string; minScore?: string; json?: boolean }) => {
      const config = loadConfig();
      validateConfig(config);
      const manager = createIndexManager(config, createLogger(config.logLevel));

      const outcome = await manager.query(text, {
        ...(opts.top !== undefined ? { k: parseInt(opts.top, 10) } : {}),
        ...(opts.minScore !== undefined ? { minScore: Number(opts.minScore) } : {}),
      });

      if (opts.json) {
        process.stdout.write(`${JSON.stringify(toPassages(outcome.results), null, 2)}\n`);
        return;
      }
      process.stdout.write(formatContext(outcome.results, text) || describeNoResults(outcome, text));
      process.stdout.write('\n');
    });
}

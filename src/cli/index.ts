#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerIndexDirCommand } from './commands/indexDir.js';
import { registerQueryCommand } from './commands/query.js';
import { registerServeCommand } from './commands/serve.js';
import { registerMcpCommand } from './commands/mcp.js';
import { registerClearCommand } from './commands/clear.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('ragbase')
    .description(pkg.description)
    .version(pkg.version);

  registerIndexDirCommand(program);
  registerQueryCommand(program);
  registerServeCommand(program);
  registerMcpCommand(program);
  registerClearCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[ragbase] Error: ${message}\n`);
  process.exit(1);
});

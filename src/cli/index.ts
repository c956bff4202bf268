#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { SERVER_INFO } from '../constants/recall-constants.js';
import { createServeCommand } from './commands/serve.js';
import { createIngestCommand } from './commands/ingest.js';
import { createSearchCommand } from './commands/search.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatsCommand } from './commands/stats.js';
import { createMcpConfigCommand } from './commands/mcp-config.js';

const program = new Command();

program
  .name(SERVER_INFO.NAME)
  .description('Semantic document recall over a Pinecone index, served to MCP clients')
  .version(SERVER_INFO.VERSION)
  .option('--env <path>', 'Path to a .env file')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Only log errors')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();

    if (opts.verbose) {
      process.env.RECALL_LOG_LEVEL = 'debug';
    }
    if (opts.quiet) {
      process.env.RECALL_LOG_LEVEL = 'error';
    }
  });

// Register commands
program.addCommand(createServeCommand());
program.addCommand(createIngestCommand());
program.addCommand(createSearchCommand());
program.addCommand(createDeleteCommand());
program.addCommand(createStatsCommand());
program.addCommand(createMcpConfigCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(chalk.red(`${error instanceof Error ? error.message : String(error)}\n`));
  process.exit(1);
});

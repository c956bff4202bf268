/**
 * Semantic search from the command line
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatResults } from '../../services/result-formatter.js';
import { CommandError, createCliContext, exitWithError, type GlobalOptions } from '../utils/context.js';

interface SearchCommandOptions {
  topK?: string;
  namespace?: string;
  filter?: string;
  json?: boolean;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Search stored documents by meaning')
    .argument('<query>', 'Natural-language query')
    .option('-k, --top-k <n>', 'Maximum number of results')
    .option('-n, --namespace <name>', 'Namespace to search')
    .option('-f, --filter <json>', 'Metadata filter as JSON')
    .option('--json', 'Output results as JSON')
    .action(async (query: string, options: SearchCommandOptions, cmd: Command) => {
      const { env } = cmd.optsWithGlobals<GlobalOptions>();

      try {
        await executeSearch(query, options, env);
      } catch (error) {
        exitWithError('Search error', error);
      }
    });
}

async function executeSearch(
  query: string,
  options: SearchCommandOptions,
  envPath: string | undefined
): Promise<void> {
  const { services } = createCliContext(envPath);

  // The dispatcher validates and builds filters exactly as for MCP clients
  const args: Record<string, unknown> = { query };
  if (options.topK !== undefined) {
    args.top_k = Number(options.topK);
  }
  if (options.namespace !== undefined) {
    args.namespace = options.namespace;
  }
  if (options.filter !== undefined) {
    try {
      args.filter = JSON.parse(options.filter);
    } catch {
      throw new CommandError('INVALID_ARGUMENT', '--filter must be valid JSON');
    }
  }

  const startTime = Date.now();
  const outcome = await services.dispatcher.dispatch('search', args);
  if (outcome.isErr()) {
    throw new CommandError(outcome.error.code, outcome.error.message);
  }

  const [formatted, json] = outcome.value.content;
  if (options.json) {
    console.log(json?.text ?? '{"results": []}');
    return;
  }

  console.log(formatted?.text ?? formatResults([]));
  console.log(chalk.gray(`Search took ${Date.now() - startTime}ms`));
}

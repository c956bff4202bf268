import { Command } from 'commander';
import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import chalk from 'chalk';
import { MetadataSchema, type Metadata } from '../../models/document.js';
import { CommandError, createCliContext, exitWithError, type GlobalOptions } from '../utils/context.js';

interface IngestCommandOptions {
  id?: string;
  namespace?: string;
  metadata?: string;
  json?: boolean;
}

/**
 * Parse the --metadata option
 */
export function parseMetadataOption(raw: string | undefined): Metadata {
  if (raw === undefined) return {};

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new CommandError('INVALID_ARGUMENT', '--metadata must be a JSON object');
  }

  const parsed = MetadataSchema.safeParse(value);
  if (!parsed.success) {
    throw new CommandError('INVALID_ARGUMENT', '--metadata values must be strings, numbers, booleans or string lists');
  }
  return parsed.data;
}

export function createIngestCommand(): Command {
  return new Command('ingest')
    .description('Chunk, embed and store a text file')
    .argument('<file>', 'Path to a UTF-8 text file')
    .option('--id <id>', 'Document id (defaults to the file name without extension)')
    .option('-n, --namespace <name>', 'Namespace to store into')
    .option('-m, --metadata <json>', 'Metadata JSON object stored with every chunk')
    .option('--json', 'Output the summary as JSON')
    .action(async (file: string, options: IngestCommandOptions, cmd: Command) => {
      const { env } = cmd.optsWithGlobals<GlobalOptions>();

      try {
        const text = readFileSync(file, 'utf8');
        const metadata = parseMetadataOption(options.metadata);
        const { services } = createCliContext(env);

        const result = await services.ingestion.ingest({
          id: options.id ?? basename(file, extname(file)),
          text,
          metadata: { source: basename(file), ...metadata },
          namespace: options.namespace
        });

        if (result.isErr()) {
          throw new CommandError(result.error.code, result.error.message);
        }

        const summary = result.value;
        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        console.log(chalk.green(`✓ Stored ${summary.documentId}`));
        console.log(chalk.gray(`  Chunks: ${summary.chunksCreated}`));
        console.log(chalk.gray(`  Records written: ${summary.recordsWritten}`));
        if (summary.recordsDeleted > 0) {
          console.log(chalk.gray(`  Stale records removed: ${summary.recordsDeleted}`));
        }
      } catch (error) {
        exitWithError('Ingest error', error);
      }
    });
}

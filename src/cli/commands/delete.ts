import { Command } from 'commander';
import chalk from 'chalk';
import { CommandError, createCliContext, exitWithError, type GlobalOptions } from '../utils/context.js';

interface DeleteCommandOptions {
  namespace?: string;
}

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete every stored chunk of a document')
    .argument('<id>', 'Document id')
    .option('-n, --namespace <name>', 'Namespace the document lives in')
    .action(async (id: string, options: DeleteCommandOptions, cmd: Command) => {
      const { env } = cmd.optsWithGlobals<GlobalOptions>();

      try {
        const { services } = createCliContext(env);
        const result = await services.ingestion.deleteDocument(id, options.namespace);
        if (result.isErr()) {
          throw new CommandError(result.error.code, result.error.message);
        }

        if (result.value.recordsDeleted === 0) {
          console.log(chalk.yellow(`⚠ No records found for ${id}`));
        } else {
          console.log(chalk.green(`✓ Deleted ${result.value.recordsDeleted} records of ${id}`));
        }
      } catch (error) {
        exitWithError('Delete error', error);
      }
    });
}

import { Command } from 'commander';
import chalk from 'chalk';
import { MCPServer } from '../../services/mcp-server.js';
import { maskApiKey } from '../../lib/env-config.js';
import { createCliContext, exitWithError, type GlobalOptions } from '../utils/context.js';

/**
 * Create the serve command
 *
 * Starts the MCP (Model Context Protocol) server on stdio. stdout is reserved
 * for JSON-RPC traffic, so everything printed here goes to stderr.
 */
export function createServeCommand(): Command {
  const command = new Command('serve');

  command
    .description('Start the MCP server (stdio transport)')
    .action(async (_options: object, cmd: Command) => {
      const { env } = cmd.optsWithGlobals<GlobalOptions>();

      try {
        const { config, logger, services } = createCliContext(env);

        const server = new MCPServer({
          dispatcher: services.dispatcher,
          retrieval: services.retrieval,
          logger,
          authToken: config.authToken
        });

        process.stderr.write(chalk.green('✓ MCP server starting...\n'));
        process.stderr.write(chalk.gray(`  Index: ${config.pinecone.indexHost ?? config.pinecone.indexName ?? ''}\n`));
        process.stderr.write(chalk.gray(`  API key: ${maskApiKey(config.pinecone.apiKey)}\n`));
        process.stderr.write(chalk.gray(`  Embedding model: ${config.embedding.model}\n`));
        process.stderr.write(chalk.gray(`  Default namespace: ${config.defaultNamespace === '' ? '(default)' : config.defaultNamespace}\n`));

        if (config.authToken) {
          process.stderr.write(chalk.yellow('  Auth: Enabled\n'));
        } else {
          process.stderr.write(chalk.gray('  Auth: Disabled\n'));
        }

        process.stderr.write(chalk.gray('\nAvailable tools:\n'));
        for (const tool of services.dispatcher.listTools()) {
          process.stderr.write(chalk.gray(`  • ${tool.name.padEnd(16)}- ${tool.description}\n`));
        }
        process.stderr.write(chalk.gray('\nListening on stdio for JSON-RPC 2.0 requests...\n\n'));

        await server.start();
      } catch (error) {
        exitWithError('Failed to start MCP server', error);
      }
    });

  return command;
}

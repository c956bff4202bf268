import { Command } from 'commander';
import { generateMCPConfig, mcpConfigToString } from '../../lib/mcp-config.js';

interface McpConfigCommandOptions {
  command?: string;
  index?: string;
  namespace?: string;
  auth?: boolean;
}

export function createMcpConfigCommand(): Command {
  return new Command('mcp-config')
    .description('Print an MCP client configuration block for this server')
    .option('--command <path>', 'Executable the client should launch')
    .option('--index <name>', 'Index name to put in the environment block')
    .option('-n, --namespace <name>', 'Default namespace to put in the environment block')
    .option('--auth', 'Include an auth token placeholder')
    .action((options: McpConfigCommandOptions) => {
      const config = generateMCPConfig({
        command: options.command,
        indexName: options.index,
        namespace: options.namespace,
        includeAuthToken: options.auth
      });
      console.log(mcpConfigToString(config));
    });
}

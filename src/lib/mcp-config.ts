/**
 * MCP (Model Context Protocol) client configuration generator
 */

import { SERVER_INFO } from '../constants/recall-constants.js';

/**
 * MCP server launch entry
 */
export interface MCPServerConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

/**
 * MCP configuration structure, as read by MCP clients
 */
export interface MCPConfig {
  mcpServers: Record<string, MCPServerConfig>;
}

export interface MCPConfigOptions {
  /** Executable that launches the server (default: the installed bin) */
  command?: string;
  indexName?: string;
  namespace?: string;
  includeAuthToken?: boolean;
}

/**
 * Generates a client configuration block with placeholder credentials
 */
export function generateMCPConfig(options: MCPConfigOptions = {}): MCPConfig {
  const env: Record<string, string> = {
    PINECONE_API_KEY: '<your-pinecone-api-key>',
    PINECONE_INDEX_NAME: options.indexName ?? '<your-index-name>'
  };

  if (options.namespace !== undefined) {
    env.RECALL_DEFAULT_NAMESPACE = options.namespace;
  }
  if (options.includeAuthToken) {
    env.RECALL_AUTH_TOKEN = '<shared-token>';
  }

  return {
    mcpServers: {
      [SERVER_INFO.NAME]: {
        command: options.command ?? SERVER_INFO.NAME,
        args: ['serve'],
        env
      }
    }
  };
}

/**
 * Converts MCP config to JSON string
 */
export function mcpConfigToString(config: MCPConfig): string {
  return JSON.stringify(config, null, 2);
}

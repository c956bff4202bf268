/**
 * MCP (Model Context Protocol) Server Implementation
 *
 * Exposes the recall tools and the semantic-search prompt via JSON-RPC 2.0.
 * stdout belongs to the protocol stream; all logging goes to stderr or file.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError
} from '@modelcontextprotocol/sdk/types.js';
import { checkAuth, isAuthEnabled, AuthenticationError, type AuthRequest } from '../lib/mcp-auth.js';
import type { Logger } from '../lib/logger.js';
import { RECALL_DEFAULTS, SERVER_INFO } from '../constants/recall-constants.js';
import { SemanticSearchPromptArgsSchema, type ToolResponse } from '../models/mcp-types.js';
import type { RetrievalOrchestrator } from './retrieval-orchestrator.js';
import { toToolResponse, type ToolDispatcher } from './tool-dispatcher.js';
import { formatResults } from './result-formatter.js';

export const SEMANTIC_SEARCH_PROMPT = 'semantic-search';

export interface MCPServerOptions {
  dispatcher: ToolDispatcher;
  retrieval: RetrievalOrchestrator;
  logger: Logger;
  /** Required `_meta.authToken` on every request; null disables auth */
  authToken: string | null;
  shutdownGraceMs?: number;
}

type PromptMessage = {
  role: 'user';
  content: { type: 'text'; text: string };
};

/**
 * MCP Server for semantic recall
 */
export class MCPServer {
  private server: Server;
  private activeRequests = new Map<number, Promise<unknown>>();
  private nextRequestId = 0;
  private closing = false;
  private stopping: Promise<void> | undefined;

  constructor(private readonly options: MCPServerOptions) {
    this.server = new Server(
      {
        name: SERVER_INFO.NAME,
        version: SERVER_INFO.VERSION
      },
      {
        capabilities: {
          tools: {},
          prompts: {}
        }
      }
    );

    this.server.onerror = (error) => {
      this.options.logger.error('MCP transport error', error);
    };

    this.setupHandlers();
  }

  get inFlightCount(): number {
    return this.activeRequests.size;
  }

  /**
   * Setup tool and prompt handlers
   */
  private setupHandlers(): void {
    const { dispatcher, logger } = this.options;

    this.server.setRequestHandler(ListToolsRequestSchema, async (request) => {
      this.authenticate(request);
      return { tools: dispatcher.listTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      this.authenticate(request);

      const { name, arguments: args } = request.params;
      if (!dispatcher.hasTool(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      const response = await this.track(async (): Promise<ToolResponse> => {
        const outcome = await dispatcher.dispatch(name, args ?? {}, { signal: extra.signal });
        return toToolResponse(outcome);
      });

      if (response.isError) {
        logger.debug(`Tool ${name} returned an error result`);
      }
      return response;
    });

    this.server.setRequestHandler(ListPromptsRequestSchema, async (request) => {
      this.authenticate(request);
      return {
        prompts: [
          {
            name: SEMANTIC_SEARCH_PROMPT,
            description: 'Retrieve the stored chunks most similar to a query as context messages',
            arguments: [
              { name: 'query', description: 'Natural-language query', required: true },
              { name: 'namespace', description: 'Namespace to search', required: false }
            ]
          }
        ]
      };
    });

    this.server.setRequestHandler(GetPromptRequestSchema, async (request, extra) => {
      this.authenticate(request);

      if (request.params.name !== SEMANTIC_SEARCH_PROMPT) {
        throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${request.params.name}`);
      }

      const parsed = SemanticSearchPromptArgsSchema.safeParse(request.params.arguments ?? {});
      if (!parsed.success) {
        throw new McpError(ErrorCode.InvalidParams, parsed.error.issues.map((issue) => issue.message).join('; '));
      }

      const messages = await this.track(() => this.promptMessages(parsed.data.query, parsed.data.namespace, extra.signal));
      return {
        description: `Context retrieved for: ${parsed.data.query}`,
        messages
      };
    });
  }

  private async promptMessages(
    query: string,
    namespace: string | undefined,
    signal: AbortSignal
  ): Promise<PromptMessage[]> {
    const results = await this.options.retrieval.search({ query, namespace }, { signal });
    if (results.isErr()) {
      const code = results.error.code === 'INVALID_ARGUMENT' ? ErrorCode.InvalidParams : ErrorCode.InternalError;
      throw new McpError(code, `${results.error.code}: ${results.error.message}`);
    }

    if (results.value.length === 0) {
      return [userMessage(formatResults([]))];
    }

    return results.value.map((result) => userMessage(
      `Context (document ${result.documentId ?? result.recordId}, similarity ${result.score.toFixed(3)}):\n${result.text.trim()}`
    ));
  }

  private authenticate(request: AuthRequest): void {
    if (this.closing) {
      throw new McpError(ErrorCode.InternalError, 'Server is shutting down');
    }

    try {
      checkAuth(request, this.options.authToken);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        this.options.logger.warn('Rejected unauthenticated request');
        throw new McpError(error.code, error.message);
      }
      throw error;
    }
  }

  /**
   * Track a request so shutdown can wait for it
   */
  private async track<T>(work: () => Promise<T>): Promise<T> {
    const requestId = this.nextRequestId++;
    const promise = work();
    this.activeRequests.set(requestId, promise);

    try {
      return await promise;
    } finally {
      this.activeRequests.delete(requestId);
    }
  }

  /**
   * Stop accepting requests and wait for in-flight ones (bounded by the grace period)
   */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.closing = true;
      this.stopping = this.drainAndClose();
    }
    return this.stopping;
  }

  private async drainAndClose(): Promise<void> {
    const { logger } = this.options;
    logger.info('Shutting down MCP server...', { in_flight: this.activeRequests.size });

    const graceMs = this.options.shutdownGraceMs ?? RECALL_DEFAULTS.SHUTDOWN_GRACE_MS;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });
    const allRequests = Promise.allSettled(Array.from(this.activeRequests.values())).then(() => 'drained' as const);

    const outcome = await Promise.race([allRequests, timeout]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      logger.warn('Shutdown grace period elapsed with requests still running', {
        in_flight: this.activeRequests.size
      });
    }

    await this.server.close();
    logger.info('MCP server stopped');
  }

  /**
   * Connect to an arbitrary transport
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  /**
   * Start the MCP server on stdio
   */
  async start(): Promise<void> {
    const { logger } = this.options;
    logger.info('Starting MCP server', { auth: isAuthEnabled(this.options.authToken) ? 'enabled' : 'disabled' });

    this.setupShutdownHandlers();
    await this.connect(new StdioServerTransport());

    logger.info('MCP server started and listening on stdio');
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(): void {
    const exit = () => {
      this.shutdown()
        .catch((error: unknown) => this.options.logger.error('Shutdown failed', error))
        .finally(() => process.exit(0));
    };

    process.stdin.on('end', exit);
    process.stdin.on('close', exit);
    process.on('SIGTERM', exit);
    process.on('SIGINT', exit);
  }
}

function userMessage(text: string): PromptMessage {
  return { role: 'user', content: { type: 'text', text } };
}

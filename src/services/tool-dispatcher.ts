/**
 * Protocol Dispatcher
 *
 * Maps tool names to validated handlers over the ingestion pipeline, the
 * retrieval orchestrator and the index adapter. Transport concerns (auth,
 * request tracking) live in the MCP server.
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { withRetry, type RetryConfig } from '../lib/retry-utils.js';
import { isProviderError, type ProviderError } from '../lib/errors/ProviderErrors.js';
import type { Logger } from '../lib/logger.js';
import type { MetadataFilter, SearchResult } from '../models/document.js';
import {
  DeleteDocumentInputSchema,
  IndexStatsInputSchema,
  ListDocumentsInputSchema,
  ReadDocumentInputSchema,
  SearchInputSchema,
  StoreDocumentInputSchema,
  type DeleteDocumentInput,
  type ListDocumentsInput,
  type ReadDocumentInput,
  type SearchInput,
  type StoreDocumentInput,
  type ToolDefinition,
  type ToolError,
  type ToolResponse
} from '../models/mcp-types.js';
import type { IngestionPipeline } from './ingestion-pipeline.js';
import type { RetrievalOrchestrator } from './retrieval-orchestrator.js';
import type { IVectorIndex } from './vector-index/index-interface.js';
import { formatResults } from './result-formatter.js';

export interface ToolDispatcherDeps {
  ingestion: IngestionPipeline;
  retrieval: RetrievalOrchestrator;
  index: IVectorIndex;
  retry: RetryConfig;
  logger?: Logger;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

type ToolHandler<S extends z.ZodTypeAny> = (
  args: z.infer<S>,
  options: DispatchOptions
) => Promise<Result<ToolResponse, ProviderError | ToolError>>;

interface RegisteredTool {
  definition: ToolDefinition;
  run(args: unknown, options: DispatchOptions): Promise<Result<ToolResponse, ProviderError | ToolError>>;
}

const NAMESPACE_PROPERTY = {
  type: 'string',
  description: "Namespace to operate in (defaults to the server's default namespace)"
};

/**
 * Bind a schema to a handler so arguments never reach it unvalidated
 */
function defineTool<S extends z.ZodTypeAny>(
  definition: ToolDefinition,
  schema: S,
  handler: ToolHandler<S>
): RegisteredTool {
  return {
    definition,
    async run(args, options) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        return err({ code: 'INVALID_ARGUMENT', message: formatZodError(parsed.error) });
      }

      return handler(parsed.data, options);
    }
  };
}

/**
 * Protocol dispatcher
 */
export class ToolDispatcher {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(private readonly deps: ToolDispatcherDeps) {
    for (const tool of this.buildTools()) {
      this.tools.set(tool.definition.name, tool);
    }
  }

  listTools(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => tool.definition);
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Validate arguments and run a tool
   */
  async dispatch(
    name: string,
    args: unknown,
    options: DispatchOptions = {}
  ): Promise<Result<ToolResponse, ToolError>> {
    const startTime = Date.now();
    const tool = this.tools.get(name);

    let outcome: Result<ToolResponse, ToolError>;
    if (!tool) {
      outcome = err({ code: 'UNKNOWN_TOOL', message: `Unknown tool: ${name}` });
    } else {
      try {
        const result = await tool.run(args, options);
        if (result.isErr() && isProviderError(result.error)) {
          this.deps.logger?.logProviderError(`Tool ${name}`, result.error);
        }
        outcome = result.mapErr(toToolError);
      } catch (error) {
        this.deps.logger?.error(`Tool ${name} failed unexpectedly`, error);
        outcome = err({
          code: 'INTERNAL_ERROR',
          message: error instanceof Error ? error.message : String(error)
        });
      }
    }

    this.deps.logger?.logToolCall(name, Date.now() - startTime, outcome.isOk() ? 'ok' : outcome.error.code);
    return outcome;
  }

  private buildTools(): RegisteredTool[] {
    const { ingestion, retrieval, index, retry, logger } = this.deps;

    return [
      defineTool(
        {
          name: 'store-document',
          description: 'Chunk, embed and store a document. Storing the same id again replaces the previous version.',
          inputSchema: {
            type: 'object',
            properties: {
              id: { type: 'string', description: 'Document id (generated when omitted)' },
              text: { type: 'string', description: 'Full document text' },
              metadata: {
                type: 'object',
                description: 'Metadata stored with every chunk (string, number, boolean or string list values)'
              },
              namespace: NAMESPACE_PROPERTY
            },
            required: ['text']
          }
        },
        StoreDocumentInputSchema,
        async (args: StoreDocumentInput, { signal }) => {
          const summary = await ingestion.ingest(
            { id: args.id, text: args.text, metadata: args.metadata, namespace: args.namespace },
            { signal }
          );
          return summary.map((value) => jsonResponse({
            document_id: value.documentId,
            namespace: value.namespace,
            chunks_created: value.chunksCreated,
            records_written: value.recordsWritten,
            records_deleted: value.recordsDeleted
          }));
        }
      ),

      defineTool(
        {
          name: 'search',
          description: 'Semantic search over stored documents. Returns the most similar chunks, best first.',
          inputSchema: {
            type: 'object',
            properties: {
              query: { type: 'string', description: 'Natural-language query' },
              top_k: { type: 'integer', minimum: 1, default: 10, description: 'Maximum number of results' },
              filter: { type: 'object', description: 'Metadata filter, e.g. {"year": {"$gte": 2020}}' },
              namespace: NAMESPACE_PROPERTY,
              category: { type: 'string', description: 'Only chunks whose "category" metadata equals this value' },
              tags: {
                type: 'array',
                items: { type: 'string' },
                description: 'Only chunks whose "tags" metadata contains one of these values'
              },
              date_range: {
                type: 'object',
                description: 'Only chunks whose numeric "date" metadata (Unix seconds) falls in this range',
                properties: {
                  start: { type: 'string', description: 'YYYY-MM-DD, inclusive' },
                  end: { type: 'string', description: 'YYYY-MM-DD, inclusive' }
                }
              }
            },
            required: ['query']
          }
        },
        SearchInputSchema,
        async (args: SearchInput, { signal }) => {
          const results = await retrieval.search(
            {
              query: args.query,
              topK: args.top_k,
              filter: buildSearchFilter(args),
              namespace: args.namespace
            },
            { signal }
          );
          return results.map((value): ToolResponse => ({
            content: [
              { type: 'text', text: formatResults(value) },
              { type: 'text', text: JSON.stringify({ results: value.map(serializeResult) }, null, 2) }
            ]
          }));
        }
      ),

      defineTool(
        {
          name: 'delete-document',
          description: 'Delete every stored chunk of a document',
          inputSchema: {
            type: 'object',
            properties: {
              id: { type: 'string', description: 'Document id' },
              namespace: NAMESPACE_PROPERTY
            },
            required: ['id']
          }
        },
        DeleteDocumentInputSchema,
        async (args: DeleteDocumentInput, { signal }) => {
          const summary = await ingestion.deleteDocument(args.id, args.namespace, { signal });
          return summary.map((value) => jsonResponse({
            document_id: value.documentId,
            namespace: value.namespace,
            records_deleted: value.recordsDeleted
          }));
        }
      ),

      defineTool(
        {
          name: 'read-document',
          description: 'Reassemble a stored document from its chunks',
          inputSchema: {
            type: 'object',
            properties: {
              id: { type: 'string', description: 'Document id' },
              namespace: NAMESPACE_PROPERTY
            },
            required: ['id']
          }
        },
        ReadDocumentInputSchema,
        async (args: ReadDocumentInput, { signal }) => {
          const document = await ingestion.readDocument(args.id, args.namespace, { signal });
          if (document.isErr()) {
            return err(document.error);
          }
          if (document.value === null) {
            return err({ code: 'DOCUMENT_NOT_FOUND', message: `Document not found: ${args.id}` });
          }

          const { id, namespace, text, metadata, chunkCount } = document.value;
          return ok(jsonResponse({ document_id: id, namespace, chunk_count: chunkCount, metadata, text }));
        }
      ),

      defineTool(
        {
          name: 'list-documents',
          description: 'List stored documents with their chunk counts',
          inputSchema: {
            type: 'object',
            properties: {
              namespace: NAMESPACE_PROPERTY
            }
          }
        },
        ListDocumentsInputSchema,
        async (args: ListDocumentsInput, { signal }) => {
          const listings = await ingestion.listDocuments(args.namespace, { signal });
          return listings.map((value) => jsonResponse({
            documents: value.map((listing) => ({
              document_id: listing.documentId,
              chunk_count: listing.chunkCount
            }))
          }));
        }
      ),

      defineTool(
        {
          name: 'index-stats',
          description: 'Record counts per namespace and vector dimension of the index',
          inputSchema: {
            type: 'object',
            properties: {}
          }
        },
        IndexStatsInputSchema,
        async (_args, { signal }) => {
          const stats = await withRetry(() => index.describeStats({ signal }), retry, {
            signal,
            onRetry: (error, attempt, delayMs) => logger?.logRetry('describe index stats', error, attempt, delayMs)
          });
          return stats.map((value) => jsonResponse({
            dimension: value.dimension,
            total_record_count: value.totalRecordCount,
            namespaces: value.namespaces
          }));
        }
      )
    ];
  }
}

/**
 * Combine the convenience search arguments with the caller's filter
 *
 * @returns undefined when no filtering was requested
 */
export function buildSearchFilter(
  args: Pick<SearchInput, 'filter' | 'category' | 'tags' | 'date_range'>
): MetadataFilter | undefined {
  const clauses: MetadataFilter[] = [];

  if (args.filter && Object.keys(args.filter).length > 0) {
    clauses.push(args.filter);
  }
  if (args.category !== undefined) {
    clauses.push({ category: { $eq: args.category } });
  }
  if (args.tags !== undefined) {
    clauses.push({ tags: { $in: args.tags } });
  }
  if (args.date_range) {
    const range: Record<string, number> = {};
    if (args.date_range.start) {
      range.$gte = Date.parse(`${args.date_range.start}T00:00:00Z`) / 1000;
    }
    if (args.date_range.end) {
      range.$lte = Date.parse(`${args.date_range.end}T23:59:59Z`) / 1000;
    }
    if (Object.keys(range).length > 0) {
      clauses.push({ date: range });
    }
  }

  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}

/**
 * Render a dispatch outcome as an MCP tool result
 */
export function toToolResponse(outcome: Result<ToolResponse, ToolError>): ToolResponse {
  if (outcome.isOk()) {
    return outcome.value;
  }
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: outcome.error }, null, 2) }],
    isError: true
  };
}

function toToolError(error: ProviderError | ToolError): ToolError {
  return { code: error.code, message: error.message };
}

function jsonResponse(payload: unknown): ToolResponse {
  return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
}

function serializeResult(result: SearchResult) {
  return {
    record_id: result.recordId,
    score: result.score,
    document_id: result.documentId ?? null,
    sequence_index: result.sequenceIndex ?? null,
    text: result.text,
    metadata: result.metadata
  };
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
    .join('; ');
}

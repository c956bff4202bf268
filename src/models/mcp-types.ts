import { z } from 'zod';
import { MetadataFilterSchema, MetadataSchema } from './document.js';

// ============================================================================
// Tool Input Schemas
// ============================================================================

const NamespaceSchema = z.string().optional().describe("Namespace to operate in (defaults to the server's default namespace)");

const DocumentIdSchema = z
  .string()
  .refine((value) => value.trim().length > 0, 'Document id must not be blank')
  .describe('Document id');

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => !isNaN(Date.parse(`${value}T00:00:00Z`)), 'Invalid calendar date');

// Store Document Tool
export const StoreDocumentInputSchema = z.object({
  id: DocumentIdSchema.optional(),
  text: z.string().refine((value) => value.trim().length > 0, 'Document text must not be empty'),
  metadata: MetadataSchema.optional().describe("Scalar or string-list metadata stored with every chunk"),
  namespace: NamespaceSchema
});

export type StoreDocumentInput = z.infer<typeof StoreDocumentInputSchema>;

// Search Tool
export const SearchInputSchema = z.object({
  query: z.string().refine((value) => value.trim().length > 0, 'Query must not be empty'),
  top_k: z.number().int().positive().optional().describe("Maximum results (clamped to the server limit)"),
  filter: MetadataFilterSchema.optional().describe("Metadata filter passed to the index as-is"),
  namespace: NamespaceSchema,
  category: z.string().min(1).optional(),
  tags: z.array(z.string()).min(1).optional(),
  date_range: z.object({
    start: IsoDateSchema.optional(),
    end: IsoDateSchema.optional()
  }).optional()
});

export type SearchInput = z.infer<typeof SearchInputSchema>;

// Delete Document Tool
export const DeleteDocumentInputSchema = z.object({
  id: DocumentIdSchema,
  namespace: NamespaceSchema
});

export type DeleteDocumentInput = z.infer<typeof DeleteDocumentInputSchema>;

// Read Document Tool
export const ReadDocumentInputSchema = z.object({
  id: DocumentIdSchema,
  namespace: NamespaceSchema
});

export type ReadDocumentInput = z.infer<typeof ReadDocumentInputSchema>;

// List Documents Tool
export const ListDocumentsInputSchema = z.object({
  namespace: NamespaceSchema
});

export type ListDocumentsInput = z.infer<typeof ListDocumentsInputSchema>;

// Index Stats Tool
export const IndexStatsInputSchema = z.object({});

// Semantic Search Prompt
export const SemanticSearchPromptArgsSchema = z.object({
  query: z.string().refine((value) => value.trim().length > 0, 'Query must not be empty'),
  namespace: z.string().optional()
});

// ============================================================================
// MCP Protocol Types
// ============================================================================

/**
 * Tool response content (text only)
 */
export type TextContent = {
  type: 'text';
  text: string;
};

/**
 * Standard MCP tool response format
 */
export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};

/**
 * JSON schema subset used to advertise tool arguments
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
};

/**
 * MCP tool metadata for tool listing
 */
export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

/**
 * Structured error returned to protocol clients
 */
export interface ToolError {
  /** Stable machine-readable code */
  code: string;
  message: string;
}

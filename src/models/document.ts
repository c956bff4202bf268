import { z } from 'zod';

// ============================================================================
// Metadata
// ============================================================================

/**
 * Scalar or string-list value stored alongside a record
 */
export type MetadataValue = string | number | boolean | string[];

export type Metadata = Record<string, MetadataValue>;

export const MetadataValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string())
]);

export const MetadataSchema = z.record(MetadataValueSchema);

/**
 * Keys the ingestion pipeline writes into every record's metadata.
 * Caller metadata using these names is overwritten.
 */
export const RESERVED_METADATA_KEYS = [
  'document_id',
  'sequence_index',
  'text',
  'char_start',
  'char_end',
  'chunk_count'
] as const;

// ============================================================================
// Core Entities
// ============================================================================

/**
 * Caller-supplied unit of knowledge
 */
export interface Document {
  id: string;
  text: string;
  metadata: Metadata;
  /** Logical partition of the index ('' is the provider's default namespace) */
  namespace: string;
}

/**
 * Contiguous slice of a document's text
 */
export interface Chunk {
  documentId: string;
  /** 0-based position within the document */
  sequenceIndex: number;
  text: string;
  /** Inclusive start offset into the document text */
  charStart: number;
  /** Exclusive end offset into the document text */
  charEnd: number;
}

export type EmbeddingVector = number[];

/**
 * Persisted unit in the vector index
 */
export interface IndexRecord {
  /** `${documentId}:${sequenceIndex}` */
  id: string;
  values: EmbeddingVector;
  metadata: Metadata;
}

/**
 * Raw match as returned by the vector index
 */
export interface SearchMatch {
  id: string;
  score: number;
  metadata: Metadata;
}

/**
 * Caller-facing search result
 */
export interface SearchResult {
  recordId: string;
  /** Similarity, higher is more relevant */
  score: number;
  metadata: Metadata;
  text: string;
  documentId?: string;
  sequenceIndex?: number;
}

/**
 * Metadata filter passed through to the index verbatim.
 * Supports exact-match values and operator objects such as
 * `{ year: { $gte: 2020 } }` or `{ $and: [...] }`.
 */
export type MetadataFilter = Record<string, unknown>;

export const MetadataFilterSchema = z.record(z.unknown());

// ============================================================================
// Operation Results
// ============================================================================

export interface IngestSummary {
  documentId: string;
  namespace: string;
  chunksCreated: number;
  recordsWritten: number;
  /** Records left over from a longer previous version and removed */
  recordsDeleted: number;
}

export interface DeleteSummary {
  documentId: string;
  namespace: string;
  recordsDeleted: number;
}

/**
 * Document reassembled from its stored chunk records
 */
export interface StoredDocument {
  id: string;
  namespace: string;
  text: string;
  metadata: Metadata;
  chunkCount: number;
}

export interface DocumentListing {
  documentId: string;
  chunkCount: number;
}

export interface IndexStats {
  dimension: number;
  totalRecordCount: number;
  namespaces: Record<string, { recordCount: number }>;
}

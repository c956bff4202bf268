/**
 * Ingestion Pipeline
 *
 * chunk → embed → upsert, with deterministic record ids so that storing a
 * document again overwrites its previous records and removes any that the
 * new version no longer has.
 *
 * Upsert and orphan deletion are two separate provider calls and are not
 * atomic. If the second one fails, the superseded records linger until the
 * next ingest of the same document, which converges to the current chunk set.
 * Concurrent ingests of the same document id must be serialized by the caller.
 */

import { randomUUID } from 'crypto';
import { Result, ok, err } from 'neverthrow';
import { withRetry, type RetryConfig } from '../lib/retry-utils.js';
import {
  InternalInconsistencyError,
  InvalidArgumentError,
  type ProviderError
} from '../lib/errors/ProviderErrors.js';
import {
  belongsToDocument,
  buildRecordId,
  parseRecordId,
  recordIdPrefix
} from '../lib/record-id.js';
import type { Logger } from '../lib/logger.js';
import {
  RESERVED_METADATA_KEYS,
  type Chunk,
  type DeleteSummary,
  type Document,
  type DocumentListing,
  type IndexRecord,
  type IngestSummary,
  type Metadata,
  type StoredDocument
} from '../models/document.js';
import { TextChunker, reassembleChunks, type ChunkingOptions } from './chunker/index.js';
import type { EmbeddingService } from './embedding/embedding-service.js';
import type { IVectorIndex } from './vector-index/index-interface.js';

/**
 * Document as received from a caller; id and namespace are optional
 */
export interface DocumentInput {
  id?: string;
  text: string;
  metadata?: Metadata;
  namespace?: string;
}

export interface IngestionPipelineConfig {
  chunking: ChunkingOptions;
  retry: RetryConfig;
  defaultNamespace: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

/**
 * Ingestion pipeline
 */
export class IngestionPipeline {
  private readonly chunker: TextChunker;

  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly index: IVectorIndex,
    private readonly config: IngestionPipelineConfig,
    private readonly logger?: Logger
  ) {
    this.chunker = new TextChunker(config.chunking);
  }

  /**
   * Store a document, replacing any previous version with the same id
   */
  async ingest(
    input: DocumentInput,
    options: OperationOptions = {}
  ): Promise<Result<IngestSummary, ProviderError>> {
    const startTime = Date.now();

    const normalized = this.normalize(input);
    if (normalized.isErr()) {
      return err(normalized.error);
    }
    const document = normalized.value;
    const { signal } = options;

    const chunked = this.chunker.chunk(document.id, document.text);
    if (chunked.isErr()) {
      return err(chunked.error);
    }
    const chunks = chunked.value;

    const embedded = await this.embeddings.embed(
      chunks.map((chunk) => chunk.text),
      { inputType: 'passage', signal }
    );
    if (embedded.isErr()) {
      return err(embedded.error);
    }
    if (embedded.value.length !== chunks.length) {
      return err(
        new InternalInconsistencyError(
          `Got ${embedded.value.length} embeddings for ${chunks.length} chunks of document ${document.id}`
        )
      );
    }

    const records = buildRecords(document, chunks, embedded.value);

    // Records from a longer previous version that this version will not overwrite
    const existing = await this.retrying(
      'list document records',
      () => this.index.listIds(document.namespace, recordIdPrefix(document.id), { signal }),
      signal
    );
    if (existing.isErr()) {
      return err(existing.error);
    }
    const orphans = existing.value.filter((id) => {
      const parsed = parseRecordId(id);
      return parsed !== null
        && parsed.documentId === document.id
        && parsed.sequenceIndex >= chunks.length;
    });

    const written = await this.retrying(
      'upsert records',
      () => this.index.upsert(document.namespace, records, { signal }),
      signal
    );
    if (written.isErr()) {
      return err(written.error);
    }

    let recordsDeleted = 0;
    if (orphans.length > 0) {
      const deleted = await this.retrying(
        'delete orphaned records',
        () => this.index.delete(document.namespace, orphans, { signal }),
        signal
      );
      if (deleted.isErr()) {
        return err(deleted.error);
      }
      recordsDeleted = deleted.value;
    }

    const summary: IngestSummary = {
      documentId: document.id,
      namespace: document.namespace,
      chunksCreated: chunks.length,
      recordsWritten: written.value,
      recordsDeleted
    };

    this.logger?.logIngest(summary, Date.now() - startTime);
    return ok(summary);
  }

  /**
   * Remove every record of a document
   */
  async deleteDocument(
    documentId: string,
    namespace: string = this.config.defaultNamespace,
    options: OperationOptions = {}
  ): Promise<Result<DeleteSummary, ProviderError>> {
    const { signal } = options;

    const ids = await this.documentRecordIds(documentId, namespace, signal);
    if (ids.isErr()) {
      return err(ids.error);
    }

    let recordsDeleted = 0;
    if (ids.value.length > 0) {
      const deleted = await this.retrying(
        'delete document records',
        () => this.index.delete(namespace, ids.value, { signal }),
        signal
      );
      if (deleted.isErr()) {
        return err(deleted.error);
      }
      recordsDeleted = deleted.value;
    }

    this.logger?.info('Document deleted', {
      document_id: documentId,
      namespace,
      records_deleted: recordsDeleted
    });

    return ok({ documentId, namespace, recordsDeleted });
  }

  /**
   * Reassemble a stored document from its chunk records
   *
   * @returns null when the document has no records
   */
  async readDocument(
    documentId: string,
    namespace: string = this.config.defaultNamespace,
    options: OperationOptions = {}
  ): Promise<Result<StoredDocument | null, ProviderError>> {
    const { signal } = options;

    const ids = await this.documentRecordIds(documentId, namespace, signal);
    if (ids.isErr()) {
      return err(ids.error);
    }
    if (ids.value.length === 0) {
      return ok(null);
    }

    const fetched = await this.retrying(
      'fetch document records',
      () => this.index.fetch(namespace, ids.value, { signal }),
      signal
    );
    if (fetched.isErr()) {
      return err(fetched.error);
    }

    const chunks = Array.from(fetched.value.values())
      .map(recordToChunk)
      .filter((chunk): chunk is Chunk => chunk !== null)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);

    if (chunks.length === 0) {
      return ok(null);
    }

    const first = fetched.value.get(buildRecordId(documentId, chunks[0]?.sequenceIndex ?? 0));

    return ok({
      id: documentId,
      namespace,
      text: reassembleChunks(chunks),
      metadata: stripReservedKeys(first?.metadata ?? {}),
      chunkCount: chunks.length
    });
  }

  /**
   * List the documents stored in a namespace with their chunk counts
   */
  async listDocuments(
    namespace: string = this.config.defaultNamespace,
    options: OperationOptions = {}
  ): Promise<Result<DocumentListing[], ProviderError>> {
    const { signal } = options;

    const ids = await this.retrying(
      'list records',
      () => this.index.listIds(namespace, '', { signal }),
      signal
    );
    if (ids.isErr()) {
      return err(ids.error);
    }

    const counts = new Map<string, number>();
    for (const id of ids.value) {
      const parsed = parseRecordId(id);
      if (!parsed) continue;
      counts.set(parsed.documentId, (counts.get(parsed.documentId) ?? 0) + 1);
    }

    const listings = Array.from(counts.entries())
      .map(([documentId, chunkCount]) => ({ documentId, chunkCount }))
      .sort((a, b) => (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0));

    return ok(listings);
  }

  private normalize(input: DocumentInput): Result<Document, InvalidArgumentError> {
    if (input.text.trim().length === 0) {
      return err(new InvalidArgumentError('Document text must not be empty'));
    }
    if (input.id !== undefined && input.id.trim().length === 0) {
      return err(new InvalidArgumentError('Document id must not be blank'));
    }

    return ok({
      id: input.id ?? randomUUID(),
      text: input.text,
      metadata: input.metadata ?? {},
      namespace: input.namespace ?? this.config.defaultNamespace
    });
  }

  private async documentRecordIds(
    documentId: string,
    namespace: string,
    signal?: AbortSignal
  ): Promise<Result<string[], ProviderError>> {
    const ids = await this.retrying(
      'list document records',
      () => this.index.listIds(namespace, recordIdPrefix(documentId), { signal }),
      signal
    );
    if (ids.isErr()) {
      return err(ids.error);
    }
    return ok(ids.value.filter((id) => belongsToDocument(id, documentId)));
  }

  private retrying<T>(
    operation: string,
    fn: () => Promise<Result<T, ProviderError>>,
    signal?: AbortSignal
  ): Promise<Result<T, ProviderError>> {
    return withRetry(fn, this.config.retry, {
      signal,
      onRetry: (error, attempt, delayMs) => this.logger?.logRetry(operation, error, attempt, delayMs)
    });
  }
}

/**
 * Build index records for a document's chunks
 */
export function buildRecords(
  document: Document,
  chunks: Chunk[],
  vectors: number[][]
): IndexRecord[] {
  return chunks.map((chunk, i) => ({
    id: buildRecordId(document.id, chunk.sequenceIndex),
    values: vectors[i] ?? [],
    metadata: {
      ...document.metadata,
      document_id: document.id,
      sequence_index: chunk.sequenceIndex,
      text: chunk.text,
      char_start: chunk.charStart,
      char_end: chunk.charEnd,
      chunk_count: chunks.length
    }
  }));
}

/**
 * Recover a chunk from a stored record's metadata
 */
function recordToChunk(record: IndexRecord): Chunk | null {
  const parsed = parseRecordId(record.id);
  const { text, char_start, char_end } = record.metadata;

  if (!parsed || typeof text !== 'string') {
    return null;
  }

  const charStart = typeof char_start === 'number' ? char_start : 0;
  return {
    documentId: parsed.documentId,
    sequenceIndex: parsed.sequenceIndex,
    text,
    charStart,
    charEnd: typeof char_end === 'number' ? char_end : charStart + text.length
  };
}

/**
 * Drop the keys the pipeline adds, leaving the caller's metadata
 */
export function stripReservedKeys(metadata: Metadata): Metadata {
  const reserved: readonly string[] = RESERVED_METADATA_KEYS;
  const result: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (!reserved.includes(key)) {
      result[key] = value;
    }
  }
  return result;
}

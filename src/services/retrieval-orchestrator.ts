/**
 * Retrieval Orchestrator
 *
 * query text → embedding → index query → caller-facing results.
 */

import { Result, ok, err } from 'neverthrow';
import { withRetry, type RetryConfig } from '../lib/retry-utils.js';
import { InvalidArgumentError, type ProviderError } from '../lib/errors/ProviderErrors.js';
import type { Logger } from '../lib/logger.js';
import type { RetrievalConfig } from '../lib/env-config.js';
import type { MetadataFilter, SearchMatch, SearchResult } from '../models/document.js';
import type { EmbeddingService } from './embedding/embedding-service.js';
import { compareMatches, type IVectorIndex } from './vector-index/index-interface.js';

/**
 * Search request
 */
export interface SearchRequest {
  query: string;
  /** Defaults to the configured default; clamped to the configured maximum */
  topK?: number;
  /** Passed to the index verbatim */
  filter?: MetadataFilter;
  namespace?: string;
}

export interface RetrievalOrchestratorConfig {
  retrieval: RetrievalConfig;
  retry: RetryConfig;
  defaultNamespace: string;
}

/**
 * Retrieval orchestrator
 */
export class RetrievalOrchestrator {
  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly index: IVectorIndex,
    private readonly config: RetrievalOrchestratorConfig,
    private readonly logger?: Logger
  ) {}

  /**
   * Resolve the effective top_k for a request
   */
  resolveTopK(requested: number | undefined): Result<number, InvalidArgumentError> {
    const topK = requested ?? this.config.retrieval.topKDefault;

    if (!Number.isInteger(topK) || topK <= 0) {
      return err(new InvalidArgumentError(`top_k must be a positive integer (got ${topK})`));
    }

    return ok(Math.min(topK, this.config.retrieval.topKMax));
  }

  /**
   * Semantic search within a namespace
   *
   * @returns Results ordered by descending score, ties by ascending record id
   */
  async search(
    request: SearchRequest,
    options: { signal?: AbortSignal } = {}
  ): Promise<Result<SearchResult[], ProviderError>> {
    const startTime = Date.now();
    const { signal } = options;

    if (request.query.trim().length === 0) {
      return err(new InvalidArgumentError('Query must not be empty'));
    }

    const topK = this.resolveTopK(request.topK);
    if (topK.isErr()) {
      return err(topK.error);
    }

    const namespace = request.namespace ?? this.config.defaultNamespace;

    const vector = await this.embeddings.embedQuery(request.query, signal);
    if (vector.isErr()) {
      return err(vector.error);
    }

    const matches = await withRetry(
      () => this.index.query(namespace, vector.value, topK.value, request.filter, { signal }),
      this.config.retry,
      {
        signal,
        onRetry: (error, attempt, delayMs) => this.logger?.logRetry('query index', error, attempt, delayMs)
      }
    );
    if (matches.isErr()) {
      return err(matches.error);
    }

    const { minScore } = this.config.retrieval;
    const results = [...matches.value]
      .sort(compareMatches)
      .filter((match) => minScore === null || match.score >= minScore)
      .slice(0, topK.value)
      .map(toSearchResult);

    this.logger?.logSearch(namespace, topK.value, results.length, Date.now() - startTime);
    return ok(results);
  }
}

/**
 * Map an index match into the caller-facing shape
 */
export function toSearchResult(match: SearchMatch): SearchResult {
  const { text, document_id, sequence_index } = match.metadata;

  return {
    recordId: match.id,
    score: match.score,
    metadata: match.metadata,
    text: typeof text === 'string' ? text : '',
    documentId: typeof document_id === 'string' ? document_id : undefined,
    sequenceIndex: typeof sequence_index === 'number' ? sequence_index : undefined
  };
}

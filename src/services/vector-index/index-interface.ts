/**
 * Vector Index Interface
 *
 * Namespace-scoped operations against an external vector index. All
 * operations resolve to Result values; a namespace that has never been
 * written to behaves as an empty one.
 */

import { Result } from 'neverthrow';
import type {
	EmbeddingVector,
	IndexRecord,
	IndexStats,
	MetadataFilter,
	SearchMatch,
} from '../../models/document.js';
import type { ProviderError } from '../../lib/errors/ProviderErrors.js';

/**
 * Per-call options
 */
export interface IndexCallOptions {
	/** Cancels the outstanding network calls */
	signal?: AbortSignal;
}

export interface IVectorIndex {
	/**
	 * Insert or overwrite records by id
	 *
	 * @returns Number of records written
	 */
	upsert(
		namespace: string,
		records: IndexRecord[],
		options?: IndexCallOptions
	): Promise<Result<number, ProviderError>>;

	/**
	 * Nearest-neighbour query
	 *
	 * @returns Matches sorted by descending score, ties broken by ascending id
	 */
	query(
		namespace: string,
		vector: EmbeddingVector,
		topK: number,
		filter?: MetadataFilter,
		options?: IndexCallOptions
	): Promise<Result<SearchMatch[], ProviderError>>;

	/**
	 * Delete records by id; unknown ids are ignored
	 *
	 * @returns Number of ids submitted for deletion
	 */
	delete(
		namespace: string,
		ids: string[],
		options?: IndexCallOptions
	): Promise<Result<number, ProviderError>>;

	/**
	 * Fetch records by id; missing ids are omitted from the map
	 */
	fetch(
		namespace: string,
		ids: string[],
		options?: IndexCallOptions
	): Promise<Result<Map<string, IndexRecord>, ProviderError>>;

	/**
	 * List every record id starting with `prefix`
	 */
	listIds(
		namespace: string,
		prefix: string,
		options?: IndexCallOptions
	): Promise<Result<string[], ProviderError>>;

	/**
	 * Index-wide statistics
	 */
	describeStats(options?: IndexCallOptions): Promise<Result<IndexStats, ProviderError>>;
}

/**
 * Deterministic result order: score descending, then id ascending
 */
export function compareMatches(a: SearchMatch, b: SearchMatch): number {
	if (b.score !== a.score) {
		return b.score - a.score;
	}
	return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

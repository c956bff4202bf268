/**
 * Pinecone Vector Index Adapter
 *
 * Talks to the Pinecone data plane over its REST API. Large requests are
 * split to stay under the service's per-request limits, and query results are
 * re-sorted so ties come back in a stable order.
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { requestJson, trimTrailingSlash, type FetchLike } from '../../lib/http-client.js';
import {
	InvalidArgumentError,
	NamespaceNotFoundError,
	type ProviderError,
} from '../../lib/errors/ProviderErrors.js';
import { PINECONE_LIMITS } from '../../constants/recall-constants.js';
import {
	MetadataValueSchema,
	type EmbeddingVector,
	type IndexRecord,
	type IndexStats,
	type Metadata,
	type MetadataFilter,
	type SearchMatch,
} from '../../models/document.js';
import { compareMatches, type IndexCallOptions, type IVectorIndex } from './index-interface.js';

// ============================================================================
// Response Schemas
// ============================================================================

const RawMetadataSchema = z.record(z.unknown()).optional();

const DescribeIndexResponseSchema = z.object({
	host: z.string().min(1),
});

const UpsertResponseSchema = z.object({
	upsertedCount: z.number().int().nonnegative().optional(),
});

const QueryResponseSchema = z.object({
	matches: z
		.array(
			z.object({
				id: z.string(),
				score: z.number().optional(),
				metadata: RawMetadataSchema,
			})
		)
		.optional(),
});

const FetchResponseSchema = z.object({
	vectors: z
		.record(
			z.object({
				id: z.string(),
				values: z.array(z.number()).optional(),
				metadata: RawMetadataSchema,
			})
		)
		.optional(),
});

const ListResponseSchema = z.object({
	vectors: z.array(z.object({ id: z.string() })).optional(),
	pagination: z.object({ next: z.string().optional() }).optional(),
});

const StatsResponseSchema = z.object({
	dimension: z.number().optional(),
	totalVectorCount: z.number().optional(),
	namespaces: z.record(z.object({ vectorCount: z.number().optional() })).optional(),
});

const EmptyResponseSchema = z.object({}).passthrough();

// ============================================================================
// Adapter
// ============================================================================

/**
 * Adapter settings
 */
export interface PineconeIndexOptions {
	apiKey: string;
	/** Data-plane host; resolved from `indexName` when absent */
	indexHost?: string;
	indexName?: string;
	controlPlaneUrl: string;
	apiVersion: string;
	timeoutMs: number;
	fetch?: FetchLike;
}

/**
 * Split an array into fixed-size slices
 */
export function chunkArray<T>(items: T[], size: number): T[][] {
	const slices: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		slices.push(items.slice(i, i + size));
	}
	return slices;
}

/**
 * Keep only metadata values the index can store
 */
export function sanitizeMetadata(raw: Record<string, unknown> | undefined): Metadata {
	const metadata: Metadata = {};
	if (!raw) return metadata;

	for (const [key, value] of Object.entries(raw)) {
		const parsed = MetadataValueSchema.safeParse(value);
		if (parsed.success) {
			metadata[key] = parsed.data;
		}
	}
	return metadata;
}

/**
 * Pinecone REST adapter
 */
export class PineconeIndex implements IVectorIndex {
	private readonly fetchFn: FetchLike;
	private host: string | null;

	constructor(private readonly options: PineconeIndexOptions) {
		this.fetchFn = options.fetch ?? fetch;
		this.host = options.indexHost ? normalizeHost(options.indexHost) : null;
	}

	async upsert(
		namespace: string,
		records: IndexRecord[],
		options: IndexCallOptions = {}
	): Promise<Result<number, ProviderError>> {
		let written = 0;

		for (const batch of chunkArray(records, PINECONE_LIMITS.UPSERT_BATCH_SIZE)) {
			const response = await this.dataPlane('POST', '/vectors/upsert', UpsertResponseSchema, options, {
				vectors: batch.map((record) => ({
					id: record.id,
					values: record.values,
					metadata: record.metadata,
				})),
				namespace,
			});

			if (response.isErr()) {
				return err(response.error);
			}
			written += response.value.upsertedCount ?? batch.length;
		}

		return ok(written);
	}

	async query(
		namespace: string,
		vector: EmbeddingVector,
		topK: number,
		filter?: MetadataFilter,
		options: IndexCallOptions = {}
	): Promise<Result<SearchMatch[], ProviderError>> {
		const response = await this.dataPlane('POST', '/query', QueryResponseSchema, options, {
			namespace,
			vector,
			topK,
			...(filter && Object.keys(filter).length > 0 ? { filter } : {}),
			includeMetadata: true,
			includeValues: false,
		});

		if (response.isErr()) {
			return response.error instanceof NamespaceNotFoundError ? ok([]) : err(response.error);
		}

		const matches: SearchMatch[] = (response.value.matches ?? []).map((match) => ({
			id: match.id,
			score: match.score ?? 0,
			metadata: sanitizeMetadata(match.metadata),
		}));

		return ok(matches.sort(compareMatches));
	}

	async delete(
		namespace: string,
		ids: string[],
		options: IndexCallOptions = {}
	): Promise<Result<number, ProviderError>> {
		let deleted = 0;

		for (const batch of chunkArray(ids, PINECONE_LIMITS.DELETE_BATCH_SIZE)) {
			const response = await this.dataPlane('POST', '/vectors/delete', EmptyResponseSchema, options, {
				ids: batch,
				namespace,
			});

			if (response.isErr()) {
				if (response.error instanceof NamespaceNotFoundError) {
					return ok(deleted);
				}
				return err(response.error);
			}
			deleted += batch.length;
		}

		return ok(deleted);
	}

	async fetch(
		namespace: string,
		ids: string[],
		options: IndexCallOptions = {}
	): Promise<Result<Map<string, IndexRecord>, ProviderError>> {
		const records = new Map<string, IndexRecord>();

		for (const batch of chunkArray(ids, PINECONE_LIMITS.FETCH_BATCH_SIZE)) {
			const params = new URLSearchParams();
			for (const id of batch) params.append('ids', id);
			params.set('namespace', namespace);

			const response = await this.dataPlane('GET', `/vectors/fetch?${params.toString()}`, FetchResponseSchema, options);

			if (response.isErr()) {
				if (response.error instanceof NamespaceNotFoundError) {
					return ok(records);
				}
				return err(response.error);
			}

			for (const vector of Object.values(response.value.vectors ?? {})) {
				records.set(vector.id, {
					id: vector.id,
					values: vector.values ?? [],
					metadata: sanitizeMetadata(vector.metadata),
				});
			}
		}

		return ok(records);
	}

	async listIds(
		namespace: string,
		prefix: string,
		options: IndexCallOptions = {}
	): Promise<Result<string[], ProviderError>> {
		const ids: string[] = [];
		let token: string | undefined;

		do {
			const params = new URLSearchParams({
				namespace,
				limit: String(PINECONE_LIMITS.LIST_PAGE_SIZE),
			});
			if (prefix) params.set('prefix', prefix);
			if (token) params.set('paginationToken', token);

			const response = await this.dataPlane('GET', `/vectors/list?${params.toString()}`, ListResponseSchema, options);

			if (response.isErr()) {
				if (response.error instanceof NamespaceNotFoundError) {
					return ok(ids);
				}
				return err(response.error);
			}

			for (const vector of response.value.vectors ?? []) {
				ids.push(vector.id);
			}
			token = response.value.pagination?.next;
		} while (token);

		return ok(ids);
	}

	async describeStats(options: IndexCallOptions = {}): Promise<Result<IndexStats, ProviderError>> {
		const response = await this.dataPlane('POST', '/describe_index_stats', StatsResponseSchema, options, {});
		if (response.isErr()) {
			return err(response.error);
		}

		const namespaces: IndexStats['namespaces'] = {};
		for (const [name, summary] of Object.entries(response.value.namespaces ?? {})) {
			namespaces[name] = { recordCount: summary.vectorCount ?? 0 };
		}

		return ok({
			dimension: response.value.dimension ?? 0,
			totalRecordCount: response.value.totalVectorCount ?? 0,
			namespaces,
		});
	}

	/**
	 * Resolve the data-plane host once, through the control plane if needed
	 */
	private async resolveHost(options: IndexCallOptions): Promise<Result<string, ProviderError>> {
		if (this.host) {
			return ok(this.host);
		}

		const name = this.options.indexName ?? '';
		const response = await requestJson(this.fetchFn, {
			service: 'Pinecone control plane',
			method: 'GET',
			url: `${trimTrailingSlash(this.options.controlPlaneUrl)}/indexes/${encodeURIComponent(name)}`,
			headers: this.headers(),
			schema: DescribeIndexResponseSchema,
			timeoutMs: this.options.timeoutMs,
			signal: options.signal,
		});

		if (response.isErr()) {
			// A 404 here means the index itself is missing, not an empty namespace
			if (response.error instanceof NamespaceNotFoundError) {
				return err(new InvalidArgumentError(`Pinecone index ${name} not found`, response.error));
			}
			return err(response.error);
		}

		this.host = normalizeHost(response.value.host);
		return ok(this.host);
	}

	private async dataPlane<S extends z.ZodTypeAny>(
		method: 'GET' | 'POST',
		path: string,
		schema: S,
		options: IndexCallOptions,
		body?: unknown
	): Promise<Result<z.infer<S>, ProviderError>> {
		const host = await this.resolveHost(options);
		if (host.isErr()) {
			return err(host.error);
		}

		return requestJson(this.fetchFn, {
			service: 'Pinecone index',
			method,
			url: `${host.value}${path}`,
			headers: this.headers(),
			body,
			schema,
			timeoutMs: this.options.timeoutMs,
			signal: options.signal,
		});
	}

	private headers(): Record<string, string> {
		return {
			'Api-Key': this.options.apiKey,
			'X-Pinecone-API-Version': this.options.apiVersion,
		};
	}
}

/**
 * Ensure the host carries a scheme and no trailing slash
 */
export function normalizeHost(host: string): string {
	const withScheme = /^https?:\/\//.test(host) ? host : `https://${host}`;
	return trimTrailingSlash(withScheme);
}

/**
 * Embedding Service
 *
 * Order-preserving batched embedding on top of an IEmbeddingProvider. Each
 * batch goes through the retry wrapper independently, so a transient failure
 * late in a large input does not repeat the batches that already succeeded.
 */

import { Result, ok, err } from 'neverthrow';
import { withRetry, DEFAULT_RETRY_CONFIG, type RetryConfig } from '../../lib/retry-utils.js';
import {
	InternalInconsistencyError,
	InvalidInputError,
	type ProviderError,
} from '../../lib/errors/ProviderErrors.js';
import type { Logger } from '../../lib/logger.js';
import type { EmbeddingVector } from '../../models/document.js';
import type { EmbeddingInputType, IEmbeddingProvider } from './adapter-interface.js';

/**
 * Embedding service options
 */
export interface EmbeddingServiceOptions {
	/** Upper bound on inputs per provider call; the provider's own limit still applies */
	batchSize?: number;

	retry?: RetryConfig;

	logger?: Logger;
}

/**
 * Per-call options
 */
export interface EmbedTextsOptions {
	inputType?: EmbeddingInputType;
	signal?: AbortSignal;
}

/**
 * Embedding service
 */
export class EmbeddingService {
	private readonly batchSize: number;
	private readonly retry: RetryConfig;
	private readonly logger?: Logger;

	constructor(
		private readonly provider: IEmbeddingProvider,
		options: EmbeddingServiceOptions = {}
	) {
		this.batchSize = Math.max(
			1,
			Math.min(options.batchSize ?? provider.maxBatchSize, provider.maxBatchSize)
		);
		this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
		this.logger = options.logger;
	}

	/** Model identifier of the underlying provider */
	get model(): string {
		return this.provider.model;
	}

	/**
	 * Embed texts, preserving order
	 *
	 * @param texts - Non-empty strings
	 * @returns Exactly one vector per input
	 */
	async embed(
		texts: string[],
		options: EmbedTextsOptions = {}
	): Promise<Result<EmbeddingVector[], ProviderError>> {
		if (texts.length === 0) {
			return ok([]);
		}

		const blank = texts.findIndex((text) => text.trim().length === 0);
		if (blank >= 0) {
			return err(new InvalidInputError(`Cannot embed empty text (input ${blank})`));
		}

		const inputType = options.inputType ?? 'passage';
		const vectors: EmbeddingVector[] = [];

		for (let offset = 0; offset < texts.length; offset += this.batchSize) {
			const batch = texts.slice(offset, offset + this.batchSize);

			const result = await withRetry(
				() => this.provider.embed(batch, { inputType, signal: options.signal }),
				this.retry,
				{
					signal: options.signal,
					onRetry: (error, attempt, delayMs) =>
						this.logger?.logRetry(`embed (${this.provider.id})`, error, attempt, delayMs),
				}
			);

			if (result.isErr()) {
				return err(result.error);
			}
			if (result.value.length !== batch.length) {
				return err(
					new InternalInconsistencyError(
						`Embedding provider returned ${result.value.length} vectors for a batch of ${batch.length}`
					)
				);
			}

			vectors.push(...result.value);
		}

		const dimension = vectors[0]?.length ?? 0;
		if (dimension === 0 || vectors.some((vector) => vector.length !== dimension)) {
			return err(
				new InternalInconsistencyError('Embedding provider returned vectors of inconsistent dimension')
			);
		}

		return ok(vectors);
	}

	/**
	 * Embed a single search query
	 */
	async embedQuery(
		query: string,
		signal?: AbortSignal
	): Promise<Result<EmbeddingVector, ProviderError>> {
		const result = await this.embed([query], { inputType: 'query', signal });
		if (result.isErr()) {
			return err(result.error);
		}

		const [vector] = result.value;
		if (!vector) {
			return err(new InternalInconsistencyError('Embedding provider returned no vector for the query'));
		}

		return ok(vector);
	}
}

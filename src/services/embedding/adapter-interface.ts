/**
 * Embedding Adapter Interface
 *
 * Boundary to the external embedding provider. Implementations make exactly
 * one provider call per `embed` invocation; batching and retries live in
 * EmbeddingService.
 */

import { Result } from 'neverthrow';
import type { EmbeddingVector } from '../../models/document.js';
import type { ProviderError } from '../../lib/errors/ProviderErrors.js';

/**
 * Whether the text is stored content or a search query.
 * Asymmetric models embed the two differently.
 */
export type EmbeddingInputType = 'passage' | 'query';

/**
 * Per-call options
 */
export interface EmbedCallOptions {
	inputType: EmbeddingInputType;

	/** Cancels the outstanding network call */
	signal?: AbortSignal;
}

/**
 * Core provider interface for embedding generation
 */
export interface IEmbeddingProvider {
	/** Unique identifier (e.g., "pinecone:multilingual-e5-large") */
	readonly id: string;

	/** Model identifier sent to the provider */
	readonly model: string;

	/** Largest number of inputs accepted in one call */
	readonly maxBatchSize: number;

	/**
	 * Embed one batch of texts
	 *
	 * @param texts - At most `maxBatchSize` non-empty strings
	 * @returns One vector per input, in input order
	 */
	embed(
		texts: string[],
		options: EmbedCallOptions
	): Promise<Result<EmbeddingVector[], ProviderError>>;
}

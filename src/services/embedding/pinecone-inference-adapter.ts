/**
 * Pinecone Inference Embedding Provider
 *
 * Calls the hosted `/embed` endpoint of the Pinecone inference API.
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { requestJson, trimTrailingSlash, type FetchLike } from '../../lib/http-client.js';
import { InternalInconsistencyError, type ProviderError } from '../../lib/errors/ProviderErrors.js';
import { PINECONE_LIMITS } from '../../constants/recall-constants.js';
import type { EmbeddingVector } from '../../models/document.js';
import type { EmbedCallOptions, IEmbeddingProvider } from './adapter-interface.js';

const EmbedResponseSchema = z.object({
	model: z.string().optional(),
	data: z.array(
		z.object({
			values: z.array(z.number()),
		})
	),
});

/**
 * Provider settings
 */
export interface PineconeInferenceOptions {
	apiKey: string;
	model: string;
	controlPlaneUrl: string;
	apiVersion: string;
	timeoutMs: number;
	/** Provider-side batch limit (default 96) */
	maxBatchSize?: number;
	fetch?: FetchLike;
}

/**
 * Embedding provider backed by Pinecone inference
 */
export class PineconeInferenceProvider implements IEmbeddingProvider {
	readonly id: string;
	readonly model: string;
	readonly maxBatchSize: number;

	private readonly fetchFn: FetchLike;

	constructor(private readonly options: PineconeInferenceOptions) {
		this.model = options.model;
		this.id = `pinecone:${options.model}`;
		this.maxBatchSize = options.maxBatchSize ?? PINECONE_LIMITS.EMBED_BATCH_SIZE;
		this.fetchFn = options.fetch ?? fetch;
	}

	async embed(
		texts: string[],
		callOptions: EmbedCallOptions
	): Promise<Result<EmbeddingVector[], ProviderError>> {
		const response = await requestJson(this.fetchFn, {
			service: 'Pinecone inference',
			method: 'POST',
			url: `${trimTrailingSlash(this.options.controlPlaneUrl)}/embed`,
			headers: {
				'Api-Key': this.options.apiKey,
				'X-Pinecone-API-Version': this.options.apiVersion,
			},
			body: {
				model: this.model,
				parameters: {
					input_type: callOptions.inputType,
					truncate: 'NONE',
				},
				inputs: texts.map((text) => ({ text })),
			},
			schema: EmbedResponseSchema,
			timeoutMs: this.options.timeoutMs,
			signal: callOptions.signal,
		});

		if (response.isErr()) {
			return err(response.error);
		}

		const vectors = response.value.data.map((item) => item.values);
		if (vectors.length !== texts.length) {
			return err(
				new InternalInconsistencyError(
					`Pinecone inference returned ${vectors.length} embeddings for ${texts.length} inputs`
				)
			);
		}

		return ok(vectors);
	}
}

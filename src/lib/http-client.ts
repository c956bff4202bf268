/**
 * Minimal JSON-over-HTTP helper for hosted providers
 *
 * Wraps global fetch with a per-call deadline, maps failures onto the
 * provider error taxonomy and validates response bodies with zod.
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { ProviderError, ProviderUnavailableError } from './errors/ProviderErrors.js';
import { deadlineSignal, errorFromException, errorFromStatus } from './http-errors.js';

/**
 * fetch-compatible function, injectable for tests
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * A single JSON request
 */
export interface JsonRequest<S extends z.ZodTypeAny> {
	/** Service name used in error messages (e.g. "Pinecone index") */
	service: string;
	method: 'GET' | 'POST' | 'DELETE';
	url: string;
	headers: Record<string, string>;
	body?: unknown;
	/** Schema the response body must satisfy */
	schema: S;
	timeoutMs: number;
	signal?: AbortSignal;
}

/**
 * Perform a JSON request and validate the response
 *
 * Empty 2xx bodies are parsed as `{}` so that endpoints answering with no
 * content can still be described by an object schema.
 */
export async function requestJson<S extends z.ZodTypeAny>(
	fetchFn: FetchLike,
	request: JsonRequest<S>
): Promise<Result<z.infer<S>, ProviderError>> {
	let response: Response;

	try {
		response = await fetchFn(request.url, {
			method: request.method,
			headers: {
				Accept: 'application/json',
				...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
				...request.headers,
			},
			body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
			signal: deadlineSignal(request.timeoutMs, request.signal),
		});
	} catch (error) {
		return err(errorFromException(request.service, error, request.signal));
	}

	let text: string;
	try {
		text = await response.text();
	} catch (error) {
		return err(errorFromException(request.service, error, request.signal));
	}

	if (!response.ok) {
		return err(
			errorFromStatus(
				request.service,
				response.status,
				text,
				response.headers.get('retry-after')
			)
		);
	}

	let json: unknown;
	try {
		json = text.trim() === '' ? {} : JSON.parse(text);
	} catch {
		return err(
			new ProviderUnavailableError(`${request.service} returned a body that is not JSON`)
		);
	}

	const parsed = request.schema.safeParse(json);
	if (!parsed.success) {
		return err(
			new ProviderUnavailableError(
				`${request.service} returned an unexpected response: ${parsed.error.issues
					.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
					.join('; ')}`
			)
		);
	}

	return ok(parsed.data);
}

/**
 * Strip trailing slashes so paths can be appended safely
 */
export function trimTrailingSlash(url: string): string {
	return url.replace(/\/+$/, '');
}

/**
 * HTTP → provider error mapping
 *
 * Shared by the Pinecone inference and index adapters so that both surface the
 * same taxonomy for the same status codes.
 */

import {
	AuthenticationFailedError,
	InvalidInputError,
	NamespaceNotFoundError,
	OperationCancelledError,
	ProviderError,
	ProviderUnavailableError,
	QuotaExceededError,
	RateLimitedError,
	describeError,
} from './errors/ProviderErrors.js';

const QUOTA_PATTERN = /quota|limit exceeded|exceeded your/i;

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
	if (!header) return undefined;

	const seconds = Number(header);
	if (Number.isFinite(seconds) && seconds >= 0) {
		return Math.round(seconds * 1000);
	}

	const date = Date.parse(header);
	if (!isNaN(date)) {
		return Math.max(0, date - now);
	}

	return undefined;
}

/**
 * Map a non-2xx HTTP status to a provider error
 *
 * @param service - Human-readable service name used in messages
 * @param status - HTTP status code
 * @param body - Response body text (may be empty)
 * @param retryAfter - Raw Retry-After header value
 */
export function errorFromStatus(
	service: string,
	status: number,
	body: string,
	retryAfter: string | null = null
): ProviderError {
	const detail = body.trim().slice(0, 500);
	const message = `${service} responded with HTTP ${status}${detail ? `: ${detail}` : ''}`;

	if (status === 402 || (status === 429 && QUOTA_PATTERN.test(detail))) {
		return new QuotaExceededError(message);
	}

	switch (status) {
		case 400:
		case 413:
		case 422:
			return new InvalidInputError(message);
		case 401:
		case 403:
			return new AuthenticationFailedError(message);
		case 404:
			return new NamespaceNotFoundError(message);
		case 408:
			return new ProviderUnavailableError(message);
		case 429:
			return new RateLimitedError(message, parseRetryAfter(retryAfter));
	}

	if (status >= 500) {
		return new ProviderUnavailableError(message);
	}

	return new InvalidInputError(message);
}

/**
 * Map an exception thrown by fetch to a provider error
 *
 * A caller abort becomes `OperationCancelledError`; an expired deadline or a
 * network failure becomes `ProviderUnavailableError` so the retry layer picks
 * it up.
 */
export function errorFromException(
	service: string,
	error: unknown,
	callerSignal?: AbortSignal
): ProviderError {
	if (callerSignal?.aborted) {
		return new OperationCancelledError(`${service} request was cancelled`);
	}

	const cause = error instanceof Error ? error : undefined;

	if (cause?.name === 'TimeoutError') {
		return new ProviderUnavailableError(`${service} request timed out`, cause);
	}

	return new ProviderUnavailableError(
		`${service} request failed: ${describeError(error)}`,
		cause
	);
}

/**
 * Combine a per-call deadline with an optional caller signal
 */
export function deadlineSignal(timeoutMs: number, callerSignal?: AbortSignal): AbortSignal {
	const timeout = AbortSignal.timeout(timeoutMs);
	return callerSignal ? AbortSignal.any([timeout, callerSignal]) : timeout;
}

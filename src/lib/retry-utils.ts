/**
 * Retry Utilities with Exponential Backoff
 *
 * Composable retry wrapper applied around every embedding and vector index
 * call. Only errors flagged `retryable` are retried; everything else is
 * returned to the caller unchanged on the first failure.
 */

import { Result, err } from 'neverthrow';
import {
	OperationCancelledError,
	ProviderError,
	RateLimitedError,
	RetriesExhaustedError,
} from './errors/ProviderErrors.js';

/**
 * Retry configuration
 */
export interface RetryConfig {
	/** Total attempts including the first one */
	maxAttempts: number;

	/** Delay before the second attempt in milliseconds */
	initialDelayMs: number;

	/** Upper bound for any single delay, including Retry-After hints */
	maxDelayMs: number;

	/** Backoff multiplier (typically 2 for exponential) */
	backoffMultiplier: number;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 3,
	initialDelayMs: 500,
	maxDelayMs: 8000,
	backoffMultiplier: 2,
};

/**
 * Per-call retry hooks
 */
export interface RetryOptions {
	/** Aborts pending sleeps and stops further attempts */
	signal?: AbortSignal;

	/** Invoked before sleeping ahead of the next attempt */
	onRetry?: (error: ProviderError, attempt: number, delayMs: number) => void;
}

/**
 * Sleep for specified milliseconds, waking early when the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/**
 * Compute the delay that precedes attempt `attempt + 1`
 *
 * @param attempt - 1-based number of the attempt that just failed
 */
export function computeBackoffDelay(
	error: ProviderError,
	attempt: number,
	config: RetryConfig
): number {
	const exponential =
		config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);

	// Rate limit responses may tell us exactly how long to wait
	const hinted =
		error instanceof RateLimitedError && typeof error.retryAfterMs === 'number'
			? error.retryAfterMs
			: exponential;

	return Math.max(0, Math.min(hinted, config.maxDelayMs));
}

/**
 * Execute function with exponential backoff retry
 *
 * Retryable failures are retried until `maxAttempts` is reached and then
 * surface as a single `RetriesExhaustedError`. Non-retryable failures are
 * returned immediately without retry.
 *
 * @param fn - Function to execute (should return Result)
 * @param config - Retry configuration
 * @returns Result from successful execution or final error
 */
export async function withRetry<T>(
	fn: () => Promise<Result<T, ProviderError>>,
	config: RetryConfig = DEFAULT_RETRY_CONFIG,
	options: RetryOptions = {}
): Promise<Result<T, ProviderError>> {
	const { signal, onRetry } = options;
	const maxAttempts = Math.max(1, config.maxAttempts);

	for (let attempt = 1; ; attempt++) {
		if (signal?.aborted) {
			return err(new OperationCancelledError('Request was cancelled'));
		}

		const result = await fn();

		if (result.isOk() || !result.error.retryable) {
			return result;
		}

		const error = result.error;

		if (attempt >= maxAttempts) {
			return err(new RetriesExhaustedError(attempt, error));
		}

		const delay = computeBackoffDelay(error, attempt, config);
		onRetry?.(error, attempt, delay);

		await sleep(delay, signal);
	}
}

/**
 * Create a retry configuration with custom settings
 *
 * @param overrides - Partial configuration to override defaults
 * @returns Complete retry configuration
 */
export function createRetryConfig(overrides: Partial<RetryConfig>): RetryConfig {
	return {
		...DEFAULT_RETRY_CONFIG,
		...overrides,
	};
}

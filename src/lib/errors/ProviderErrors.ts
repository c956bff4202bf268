/**
 * Provider Error Hierarchy
 *
 * Typed failures raised by the embedding and vector index adapters and by the
 * orchestrators built on top of them. Every error carries a stable
 * machine-readable code and a retryable flag consumed by the retry wrapper.
 */

/**
 * Stable error codes surfaced to protocol clients
 */
export type ProviderErrorCode =
	| 'INVALID_ARGUMENT'
	| 'INVALID_INPUT'
	| 'RATE_LIMITED'
	| 'PROVIDER_UNAVAILABLE'
	| 'QUOTA_EXCEEDED'
	| 'NAMESPACE_NOT_FOUND'
	| 'AUTHENTICATION_FAILED'
	| 'INTERNAL_INCONSISTENCY'
	| 'CANCELLED'
	| 'RETRIES_EXHAUSTED';

/**
 * Base error class for all provider-related errors
 */
export abstract class ProviderError extends Error {
	abstract readonly code: ProviderErrorCode;
	abstract readonly retryable: boolean;
	readonly timestamp: Date = new Date();

	constructor(message: string, public override cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		// Ensure prototype chain is correct for instanceof checks
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/**
 * Malformed or out-of-range caller input (non-retryable)
 */
export class InvalidArgumentError extends ProviderError {
	readonly code = 'INVALID_ARGUMENT';
	readonly retryable = false;
}

/**
 * Content rejected by an external provider, e.g. empty or oversized text (non-retryable)
 */
export class InvalidInputError extends ProviderError {
	readonly code = 'INVALID_INPUT';
	readonly retryable = false;
}

/**
 * Provider asked us to slow down (retryable with backoff)
 */
export class RateLimitedError extends ProviderError {
	readonly code = 'RATE_LIMITED';
	readonly retryable = true;

	constructor(message: string, public retryAfterMs?: number) {
		super(message);
	}
}

/**
 * Transient provider failure: 5xx, network error or deadline exceeded (retryable)
 */
export class ProviderUnavailableError extends ProviderError {
	readonly code = 'PROVIDER_UNAVAILABLE';
	readonly retryable = true;
}

/**
 * Account or index quota exhausted (fatal for the current request)
 */
export class QuotaExceededError extends ProviderError {
	readonly code = 'QUOTA_EXCEEDED';
	readonly retryable = false;
}

/**
 * Namespace has never been written to. Adapters translate this into empty results.
 */
export class NamespaceNotFoundError extends ProviderError {
	readonly code = 'NAMESPACE_NOT_FOUND';
	readonly retryable = false;
}

/**
 * Credentials missing or rejected (non-retryable)
 */
export class AuthenticationFailedError extends ProviderError {
	readonly code = 'AUTHENTICATION_FAILED';
	readonly retryable = false;
}

/**
 * Pipeline bug, e.g. mismatched chunk and embedding counts. Always fatal.
 */
export class InternalInconsistencyError extends ProviderError {
	readonly code = 'INTERNAL_INCONSISTENCY';
	readonly retryable = false;
}

/**
 * The caller cancelled the request while a provider call was in flight
 */
export class OperationCancelledError extends ProviderError {
	readonly code = 'CANCELLED';
	readonly retryable = false;
}

/**
 * Aggregated failure after the retry budget ran out
 */
export class RetriesExhaustedError extends ProviderError {
	readonly code = 'RETRIES_EXHAUSTED';
	readonly retryable = false;

	constructor(public readonly attempts: number, public readonly lastError: ProviderError) {
		super(`Gave up after ${attempts} attempts: ${lastError.message}`, lastError);
	}
}

/**
 * Type guard for provider errors
 */
export function isProviderError(error: unknown): error is ProviderError {
	return error instanceof ProviderError;
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Configuration Management
 *
 * Centralized configuration loading from environment variables and an
 * optional .env file.
 */

import { config as loadEnv } from 'dotenv';
import { Result, ok, err } from 'neverthrow';
import { isLogLevel, type LogLevel } from './logger.js';
import type { RetryConfig } from './retry-utils.js';
import type { ChunkingOptions } from '../services/chunker/index.js';
import { PINECONE_API, PINECONE_LIMITS, RECALL_DEFAULTS } from '../constants/recall-constants.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Pinecone connection settings
 */
export interface PineconeConfig {
	apiKey: string;

	/** Index name, resolved to a data-plane host through the control plane */
	indexName?: string;

	/** Data-plane host; skips the control-plane lookup when set */
	indexHost?: string;

	controlPlaneUrl: string;
	apiVersion: string;
}

/**
 * Retrieval bounds
 */
export interface RetrievalConfig {
	topKDefault: number;

	/** Requests above this are clamped */
	topKMax: number;

	/** Results scoring below this are dropped (null keeps everything) */
	minScore: number | null;
}

/**
 * Complete server configuration
 */
export interface RecallConfig {
	pinecone: PineconeConfig;
	embedding: {
		model: string;
		batchSize: number;
	};
	defaultNamespace: string;
	chunking: ChunkingOptions;
	retrieval: RetrievalConfig;
	retry: RetryConfig;
	requestTimeoutMs: number;
	logging: {
		logDir: string | null;
		level: LogLevel;
	};
	/** Shared secret for tool calls (null disables auth) */
	authToken: string | null;
}

// ============================================================================
// Configuration Error
// ============================================================================

/**
 * Configuration error
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

// ============================================================================
// Configuration Manager
// ============================================================================

type EnvSource = Record<string, string | undefined>;

/**
 * Configuration Manager
 *
 * Reads PINECONE_* and RECALL_* variables and validates them into a
 * RecallConfig.
 */
export class ConfigurationManager {
	constructor(
		private readonly env: EnvSource = process.env,
		private readonly envPath?: string
	) {}

	/**
	 * Load environment variables from .env file into process.env
	 *
	 * A missing .env file is not an error.
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigError(
					`Failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
				)
			);
		}
	}

	/**
	 * Build and validate the full configuration
	 */
	getConfig(): Result<RecallConfig, ConfigError> {
		try {
			return ok(this.buildConfig());
		} catch (error) {
			if (error instanceof ConfigError) {
				return err(error);
			}
			throw error;
		}
	}

	private buildConfig(): RecallConfig {
		const apiKey = this.getEnvVar('PINECONE_API_KEY');
		if (!apiKey) {
			throw new ConfigError(
				'Missing required config: PINECONE_API_KEY. ' +
					'Set this environment variable or add it to your .env file.'
			);
		}

		const indexName = this.getEnvVar('PINECONE_INDEX_NAME');
		const indexHost = this.getEnvVar('PINECONE_INDEX_HOST');
		if (!indexName && !indexHost) {
			throw new ConfigError(
				'Missing required config: set PINECONE_INDEX_NAME or PINECONE_INDEX_HOST'
			);
		}

		const chunking: ChunkingOptions = {
			maxChars: this.getEnvInt('RECALL_CHUNK_MAX_CHARS', RECALL_DEFAULTS.CHUNK_MAX_CHARS, 1),
			overlapChars: this.getEnvInt('RECALL_CHUNK_OVERLAP_CHARS', RECALL_DEFAULTS.CHUNK_OVERLAP_CHARS, 0),
		};
		if (chunking.overlapChars >= chunking.maxChars) {
			throw new ConfigError(
				`RECALL_CHUNK_OVERLAP_CHARS (${chunking.overlapChars}) must be smaller than ` +
					`RECALL_CHUNK_MAX_CHARS (${chunking.maxChars})`
			);
		}

		const retrieval: RetrievalConfig = {
			topKDefault: this.getEnvInt('RECALL_TOP_K_DEFAULT', RECALL_DEFAULTS.TOP_K_DEFAULT, 1),
			topKMax: this.getEnvInt('RECALL_TOP_K_MAX', RECALL_DEFAULTS.TOP_K_MAX, 1),
			minScore: this.getEnvFloat('RECALL_MIN_SCORE'),
		};
		if (retrieval.topKDefault > retrieval.topKMax) {
			throw new ConfigError(
				`RECALL_TOP_K_DEFAULT (${retrieval.topKDefault}) exceeds RECALL_TOP_K_MAX (${retrieval.topKMax})`
			);
		}

		const level = this.getEnvVar('RECALL_LOG_LEVEL') ?? 'info';
		if (!isLogLevel(level)) {
			throw new ConfigError(
				`Invalid RECALL_LOG_LEVEL "${level}". Valid levels: debug, info, warn, error`
			);
		}

		return {
			pinecone: {
				apiKey,
				indexName,
				indexHost,
				controlPlaneUrl: this.getEnvVar('PINECONE_CONTROL_PLANE_URL') ?? PINECONE_API.CONTROL_PLANE_URL,
				apiVersion: this.getEnvVar('PINECONE_API_VERSION') ?? PINECONE_API.API_VERSION,
			},
			embedding: {
				model: this.getEnvVar('RECALL_EMBEDDING_MODEL') ?? PINECONE_API.DEFAULT_EMBEDDING_MODEL,
				batchSize: this.getEnvInt('RECALL_EMBEDDING_BATCH_SIZE', PINECONE_LIMITS.EMBED_BATCH_SIZE, 1),
			},
			defaultNamespace: this.env['RECALL_DEFAULT_NAMESPACE'] ?? RECALL_DEFAULTS.NAMESPACE,
			chunking,
			retrieval,
			retry: {
				maxAttempts: this.getEnvInt('RECALL_RETRY_MAX_ATTEMPTS', RECALL_DEFAULTS.RETRY_MAX_ATTEMPTS, 1),
				initialDelayMs: this.getEnvInt('RECALL_RETRY_INITIAL_DELAY_MS', RECALL_DEFAULTS.RETRY_INITIAL_DELAY_MS, 0),
				maxDelayMs: this.getEnvInt('RECALL_RETRY_MAX_DELAY_MS', RECALL_DEFAULTS.RETRY_MAX_DELAY_MS, 0),
				backoffMultiplier: RECALL_DEFAULTS.RETRY_BACKOFF_MULTIPLIER,
			},
			requestTimeoutMs: this.getEnvInt('RECALL_REQUEST_TIMEOUT_MS', RECALL_DEFAULTS.REQUEST_TIMEOUT_MS, 1),
			logging: {
				logDir: this.getEnvVar('RECALL_LOG_DIR') ?? null,
				level,
			},
			authToken: this.getEnvVar('RECALL_AUTH_TOKEN') ?? null,
		};
	}

	/**
	 * Get environment variable (empty strings count as unset)
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value === undefined || value.trim() === '' ? undefined : value.trim();
	}

	/**
	 * Get environment variable as integer, failing on malformed values
	 */
	private getEnvInt(key: string, fallback: number, min: number): number {
		const value = this.getEnvVar(key);
		if (value === undefined) return fallback;

		if (!/^-?\d+$/.test(value)) {
			throw new ConfigError(`Invalid ${key}: "${value}" is not an integer`);
		}
		const num = parseInt(value, 10);
		if (num < min) {
			throw new ConfigError(`Invalid ${key}: ${num} is below the minimum of ${min}`);
		}
		return num;
	}

	/**
	 * Get environment variable as float, or null when unset
	 */
	private getEnvFloat(key: string): number | null {
		const value = this.getEnvVar(key);
		if (value === undefined) return null;

		const num = Number(value);
		if (!Number.isFinite(num)) {
			throw new ConfigError(`Invalid ${key}: "${value}" is not a number`);
		}
		return num;
	}
}

/**
 * Mask API key for safe logging (show only last 4 characters)
 *
 * @param apiKey - API key to mask
 * @returns Masked key string
 */
export function maskApiKey(apiKey: string): string {
	if (apiKey.length <= 4) {
		return '****';
	}
	return '****' + apiKey.slice(-4);
}

/**
 * Load .env and build the configuration in one step
 *
 * @param envPath - Optional path to .env file
 */
export function loadConfig(envPath?: string): Result<RecallConfig, ConfigError> {
	const manager = new ConfigurationManager(process.env, envPath);
	const loaded = manager.loadEnv();
	if (loaded.isErr()) {
		return err(loaded.error);
	}
	return manager.getConfig();
}

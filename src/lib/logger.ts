/**
 * Structured Logging Module
 *
 * JSON Lines logger for tool calls, ingestion, retrieval and provider
 * failures. The console sink writes to stderr because stdout carries the
 * protocol stream when the server runs over stdio.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ProviderError } from './errors/ProviderErrors.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Log entry structure
 */
export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	message: string;
	context?: Record<string, unknown>;
	error?: {
		name: string;
		code?: string;
		message: string;
	};
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for JSON Lines files (null/undefined disables the file sink) */
	logDir?: string | null;
	/** Enable stderr output (default: true) */
	console?: boolean;
	/** Minimum level for both sinks (default: info) */
	level?: LogLevel;
}

/**
 * Anything the logger can write to on the console side
 */
export interface LogWriter {
	write(line: string): unknown;
}

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
	const levels: readonly string[] = LOG_LEVELS;
	return levels.includes(value);
}

/**
 * Structured logger
 */
export class Logger {
	private readonly logDir: string | null;
	private readonly consoleEnabled: boolean;
	private readonly level: LogLevel;

	constructor(config: LoggerConfig = {}, private readonly stream: LogWriter = process.stderr) {
		this.logDir = config.logDir ?? null;
		this.consoleEnabled = config.console ?? true;
		this.level = config.level ?? 'info';

		if (this.logDir && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
	}

	/**
	 * Path of today's log file, or null when file logging is off
	 */
	getLogFile(date: Date = new Date()): string | null {
		if (!this.logDir) return null;
		const day = date.toISOString().split('T')[0];
		return path.join(this.logDir, `recall-${day}.jsonl`);
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	/**
	 * Logs an error message with optional error details
	 */
	error(message: string, error?: unknown, context?: Record<string, unknown>): void {
		const entry = this.createEntry('error', message, context);

		if (error instanceof Error) {
			const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
			entry.error = { name: error.name, code, message: error.message };
		} else if (error !== undefined) {
			entry.error = { name: 'Error', message: String(error) };
		}

		this.write(entry);
	}

	/**
	 * Logs a completed or failed tool call
	 */
	logToolCall(tool: string, durationMs: number, outcome: 'ok' | string): void {
		const context = { tool, duration_ms: Math.round(durationMs), outcome };
		if (outcome === 'ok') {
			this.info(`Tool call completed: ${tool}`, context);
		} else {
			this.warn(`Tool call failed: ${tool}`, context);
		}
	}

	/**
	 * Logs a finished ingestion
	 */
	logIngest(summary: {
		documentId: string;
		namespace: string;
		chunksCreated: number;
		recordsWritten: number;
		recordsDeleted: number;
	}, durationMs: number): void {
		this.info('Document ingested', {
			document_id: summary.documentId,
			namespace: summary.namespace,
			chunks_created: summary.chunksCreated,
			records_written: summary.recordsWritten,
			records_deleted: summary.recordsDeleted,
			duration_ms: Math.round(durationMs),
		});
	}

	/**
	 * Logs search query
	 */
	logSearch(namespace: string, topK: number, resultsCount: number, durationMs: number): void {
		this.info('Search performed', {
			namespace,
			top_k: topK,
			results_count: resultsCount,
			duration_ms: Math.round(durationMs),
		});
	}

	/**
	 * Logs a retry scheduled by the retry wrapper
	 */
	logRetry(operation: string, error: ProviderError, attempt: number, delayMs: number): void {
		this.warn(`Retrying ${operation}`, {
			operation,
			code: error.code,
			attempt,
			delay_ms: delayMs,
			reason: error.message,
		});
	}

	/**
	 * Logs a provider failure that is being returned to the caller
	 */
	logProviderError(operation: string, error: ProviderError): void {
		this.error(`${operation} failed`, error, { operation });
	}

	private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		this.write(this.createEntry(level, message, context));
	}

	private createEntry(level: LogLevel, message: string, context?: Record<string, unknown>): LogEntry {
		return {
			timestamp: new Date().toISOString(),
			level,
			message,
			context,
		};
	}

	private write(entry: LogEntry): void {
		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.level)) {
			return;
		}

		const file = this.getLogFile();
		if (file) {
			try {
				fs.appendFileSync(file, JSON.stringify(entry) + '\n', 'utf8');
			} catch (error) {
				this.stream.write(`[LOGGER ERROR] Failed to write log: ${String(error)}\n`);
			}
		}

		if (this.consoleEnabled) {
			const details = entry.error ?? entry.context;
			this.stream.write(
				`[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}` +
					(details ? ` ${JSON.stringify(details)}` : '') +
					'\n'
			);
		}
	}
}

/**
 * Logger that discards everything, for tests and library use
 */
export function createSilentLogger(): Logger {
	return new Logger({ console: false });
}

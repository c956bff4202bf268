/**
 * Shared setup for CLI commands
 */

import chalk from 'chalk';
import { loadConfig, type RecallConfig } from '../../lib/env-config.js';
import { describeError } from '../../lib/errors/ProviderErrors.js';
import { Logger } from '../../lib/logger.js';
import { createRecallServices, type RecallServices } from '../../services/service-factory.js';

export interface CliContext {
  config: RecallConfig;
  logger: Logger;
  services: RecallServices;
}

/**
 * Load configuration and build the services
 *
 * @throws {ConfigError} When required settings are missing or malformed
 */
export function createCliContext(envPath?: string): CliContext {
  const config = loadConfig(envPath);
  if (config.isErr()) {
    throw config.error;
  }

  const logger = new Logger({
    logDir: config.value.logging.logDir,
    level: config.value.logging.level
  });

  return {
    config: config.value,
    logger,
    services: createRecallServices(config.value, logger)
  };
}

/**
 * Print an error to stderr and exit non-zero
 */
export function exitWithError(prefix: string, error: unknown): never {
  process.stderr.write(chalk.red(`${prefix}: ${describeError(error)}\n`));
  process.exit(1);
}

/**
 * Error raised from a failed operation result, carrying its code
 */
export class CommandError extends Error {
  constructor(public readonly code: string, message: string) {
    super(`${code}: ${message}`);
    this.name = 'CommandError';
  }
}

/**
 * Global options every command reads
 */
export type GlobalOptions = {
  env?: string;
};

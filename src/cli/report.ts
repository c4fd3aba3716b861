/**
 * Error reporting shared by the CLI commands.
 */
import { MultipleValidationError, RoutemarkError } from '../utils/errors.js';
import { logger, type LogLevel } from '../utils/logger.js';

/**
 * Print `error` and exit with status 1. Validation errors are listed one
 * per line.
 */
export function reportFailure(error: unknown): never {
  if (error instanceof MultipleValidationError) {
    for (const e of error.errors) {
      logger.fail(`${e.message} [${e.code}]`);
    }
    logger.error(`${error.errors.length} validation error(s) found`);
  } else if (error instanceof RoutemarkError) {
    logger.error(`${error.message} [${error.code}]`);
  } else {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
  }
  process.exit(1);
}

export function applyVerbosity(verbose: boolean | undefined): void {
  const level: LogLevel = verbose ? 'debug' : 'info';
  logger.setLevel(level);
}

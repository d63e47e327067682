import { Logger } from '@nestjs/common';

/**
 * Logs an error that ends the process and marks the exit code, leaving open
 * handles to drain instead of calling `process.exit`.
 */
export function reportFatalError(
  logger: Logger,
  summary: string,
  error: unknown,
): void {
  const detail = error instanceof Error ? error.message : String(error);
  if (error instanceof Error && error.stack) {
    logger.error(`${summary}: ${detail}`, error.stack);
  } else {
    logger.error(`${summary}: ${detail}`);
  }
  process.exitCode = 1;
}

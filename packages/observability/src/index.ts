/**
 * @repo/observability
 *
 * Structured logging for the billing ledger.
 */

export { createLogger, logger, redactConnectionStrings } from './logger.js';
export type { Logger, LoggerOptions, DestinationStream } from './logger.js';

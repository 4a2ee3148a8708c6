/**
 * @docsage/logger
 *
 * Structured logging with credential redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, SECRET_KEYS, REDACTED } from "./redaction.js";

export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  UnsupportedFormatError,
  DecodeError,
  AuthenticationError,
  ServiceUnavailableError,
  EmptyIndexError,
  ValidationError,
} from "./errors.js";

export { withRetry } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";

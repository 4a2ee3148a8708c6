import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class UnsupportedFormatError extends AppError {
  public readonly path: string;
  public readonly extension: string;

  constructor(path: string, extension: string, options?: ErrorExtras) {
    super({
      message: `Unsupported file type "${extension || "(none)"}": ${path}`,
      statusCode: 415,
      code: "UNSUPPORTED_FORMAT",
      details: { path, extension, ...options?.details },
      cause: options?.cause,
    });
    this.path = path;
    this.extension = extension;
  }
}

export class DecodeError extends AppError {
  public readonly path: string;

  constructor(path: string, message = "File is not valid UTF-8 text", options?: ErrorExtras) {
    super({
      message: `${message}: ${path}`,
      statusCode: 422,
      code: "DECODE_ERROR",
      details: { path, ...options?.details },
      cause: options?.cause,
    });
    this.path = path;
  }
}

/**
 * Missing or rejected credential for a remote service. A configuration
 * problem: retrying cannot succeed.
 */
export class AuthenticationError extends AppError {
  public readonly service: string;

  constructor(message: string, service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 401,
      code: "AUTHENTICATION_ERROR",
      details: { service, ...options?.details },
      cause: options?.cause,
    });
    this.service = service;
  }
}

/**
 * Transient remote failure (network, timeout, throttling, 5xx). Callers may
 * retry with backoff.
 */
export class ServiceUnavailableError extends AppError {
  public readonly service: string;

  constructor(message: string, service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "SERVICE_UNAVAILABLE",
      details: { service, ...options?.details },
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class EmptyIndexError extends AppError {
  constructor(message = "The vector index is empty") {
    super({
      message,
      statusCode: 409,
      code: "EMPTY_INDEX",
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: { fields },
    });
    this.fields = fields;
  }
}

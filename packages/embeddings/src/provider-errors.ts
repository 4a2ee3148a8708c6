import { AppError, AuthenticationError, ServiceUnavailableError } from "@docsage/errors";

function numericProperty(value: unknown, key: "status" | "statusCode"): number | undefined {
  if (typeof value === "object" && value !== null && key in value) {
    const found: unknown = Reflect.get(value, key);
    return typeof found === "number" ? found : undefined;
  }
  return undefined;
}

/**
 * HTTP status carried by an SDK error. openai uses `status`, cohere-ai
 * `statusCode`; connection failures and timeouts carry neither.
 */
export function statusOf(error: unknown): number | undefined {
  return numericProperty(error, "status") ?? numericProperty(error, "statusCode");
}

/**
 * Translate a failed embedding request into the error kinds callers branch
 * on: rejected credentials are not retryable, transport and server faults are.
 */
export function toProviderError(error: unknown, service: string): AppError {
  if (AppError.isAppError(error)) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status === 401 || status === 403) {
    return new AuthenticationError(`${service} rejected the credential: ${message}`, service, {
      cause: error,
      details: { status },
    });
  }

  if (status === undefined || status === 408 || status === 429 || status >= 500) {
    return new ServiceUnavailableError(`${service} embedding request failed: ${message}`, service, {
      cause: error,
      details: status === undefined ? {} : { status },
    });
  }

  return new AppError({
    message: `${service} rejected the embedding request: ${message}`,
    statusCode: status,
    code: "EMBEDDING_REQUEST_REJECTED",
    details: { service },
    cause: error,
  });
}

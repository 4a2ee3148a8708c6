/**
 * Property names whose values never reach a log line. Credentials end up in
 * config objects and SDK errors, so each key is covered at the top level and
 * one level down (e.g. `embedding.openai.apiKey` is logged as `openai.apiKey`).
 */
export const SECRET_KEYS: readonly string[] = [
  "apiKey",
  "api_key",
  "openaiApiKey",
  "cohereApiKey",
  "token",
  "authorization",
  "password",
  "secret",
];

export const REDACT_PATHS: string[] = [
  ...SECRET_KEYS,
  ...SECRET_KEYS.map((key) => `*.${key}`),
  "headers.authorization",
  "*.headers.authorization",
];

export const REDACTED = "[REDACTED]";

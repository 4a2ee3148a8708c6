/**
 * Creates structured Pino loggers: pretty-printed in development, JSON
 * everywhere else, with credentials redacted.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, REDACTED } from "./redaction.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Component name attached to every log line. */
  service?: string;
  /** Destination stream; stdout when omitted. */
  destination?: pino.DestinationStream;
  /** Write to stderr instead of stdout, leaving stdout for command output. */
  stderr?: boolean;
  /** Runtime environment; `process.env.NODE_ENV` when omitted. */
  nodeEnv?: string;
}

function buildTransport(development: boolean, fd: 1 | 2): pino.TransportSingleOptions | undefined {
  if (development) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: fd,
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const development = (options?.nodeEnv ?? process.env["NODE_ENV"]) === "development";
  const level = options?.level ?? (development ? "debug" : "info");
  const service = options?.service ?? "docsage";

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // A transport and an explicit destination are mutually exclusive in pino.
  if (options?.destination) {
    return pino(loggerOptions, options.destination);
  }

  const fd = options?.stderr ? 2 : 1;
  const transport = buildTransport(development, fd);
  if (transport) {
    return pino({ ...loggerOptions, transport });
  }
  return fd === 2 ? pino(loggerOptions, pino.destination(2)) : pino(loggerOptions);
}

/**
 * Derive a logger that adds `bindings` (e.g. `component`) to every line.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * A logger that drops everything; the default for library classes
 * constructed without one.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

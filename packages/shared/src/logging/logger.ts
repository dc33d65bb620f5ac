/**
 * Structured logging.
 *
 * All packages log through pino, pino-style: a context object first, then
 * the message (`logger.info({ url }, "[HTTP] Request sent")`).
 */

import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export interface CreateLoggerOptions {
  /** Logger name, emitted as `name` on every line (default: "dtrack") */
  name?: string;
  level?: LogLevel;
  /** Destination stream; stdout when omitted */
  destination?: pino.DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: pino.LoggerOptions = {
    name: options.name ?? "dtrack",
    level: options.level ?? "info",
  };
  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }
  return pino(loggerOptions);
}

/** Logger that drops everything. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

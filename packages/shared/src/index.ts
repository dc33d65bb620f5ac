export * from "./api";
export * from "./config";
export * from "./errors";
export {
  createLogger,
  type CreateLoggerOptions,
  createSilentLogger,
  type Logger,
  type LogLevel,
} from "./logging/logger";

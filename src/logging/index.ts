/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  errorContext,
  formatLogEntry,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerBindings,
  type LoggerOptions,
} from "./logger.js";

/**
 * Line-oriented logger.
 *
 *   [2024-01-15T10:00:00.000Z] [WARN ] [20240115-a1b2c3] [pipeline.extractor] Model output rejected {"attempt":1}
 *
 * Lines go to the console, a log file, or both. Child loggers share the
 * parent's outputs and add a scope segment or a run ID of their own.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  /** Lowest level written (default: "info") */
  level?: LogLevel;
  /** Directory of the log file (default: "output/logs") */
  logDir?: string;
  /** Log file name (default: "advisor.log") */
  logFile?: string;
  /** Write to the console (default: true) */
  console?: boolean;
  /** Send every console line to stderr, keeping stdout for program output */
  stderr?: boolean;
  /** Append to the log file (default: true) */
  file?: boolean;
}

export interface LoggerBindings {
  /** Dotted component path, e.g. "pipeline.extractor" */
  scope?: string;
  /** Replaces the process run ID in this logger's lines */
  runId?: string;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LoggerBindings): Logger;
}

type Sink = (level: LogLevel, line: string) => void;

export function formatLogEntry(
  level: LogLevel,
  message: string,
  bindings: LoggerBindings,
  context?: LogContext,
  now: Date = new Date()
): string {
  const parts = [
    `[${now.toISOString()}]`,
    `[${level.toUpperCase().padEnd(5)}]`,
    `[${bindings.runId ?? getRunId() ?? "no-run-id"}]`,
  ];
  if (bindings.scope) parts.push(`[${bindings.scope}]`);
  parts.push(message);
  if (context !== undefined && Object.keys(context).length > 0) {
    parts.push(JSON.stringify(context));
  }
  return parts.join(" ");
}

/**
 * Loggable fields for a caught value.
 */
export function errorContext(err: unknown): LogContext {
  return err instanceof Error
    ? { error: err.name, message: err.message }
    : { error: String(err) };
}

function consoleSink(toStderr: boolean): Sink {
  return (level, line) => {
    if (toStderr || level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else if (level === "info") console.info(line);
    else console.debug(line);
  };
}

function fileSink(directory: string, filename: string): Sink {
  mkdirSync(directory, { recursive: true });
  const path = join(directory, filename);
  return (_level, line) => {
    try {
      appendFileSync(path, `${line}\n`);
    } catch (err) {
      console.error(`Cannot write log file ${path}: ${String(err)}`);
    }
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const sinks: Sink[] = [];
  if (options.console ?? true) {
    sinks.push(consoleSink(options.stderr ?? false));
  }
  if (options.file ?? true) {
    sinks.push(fileSink(options.logDir ?? "output/logs", options.logFile ?? "advisor.log"));
  }

  const bind = (bindings: LoggerBindings): Logger => {
    const log = (level: LogLevel, message: string, context?: LogContext): void => {
      if (SEVERITY[level] < threshold) return;
      const line = formatLogEntry(level, message, bindings, context);
      for (const sink of sinks) sink(level, line);
    };

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (extra) => {
        const scope = [bindings.scope, extra.scope].filter(Boolean).join(".");
        return bind({
          scope: scope === "" ? undefined : scope,
          runId: extra.runId ?? bindings.runId,
        });
      },
    };
  };

  return bind({});
}

/** Writes nothing. Default for components built without a logger. */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}

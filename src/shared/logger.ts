/**
 * Structured Logger
 * =================
 * Consistent logging across the application.
 *
 * One line per event: `[timestamp] [LEVEL] [scope] message {context}`.
 * Context objects are passed through `sanitizeForLogging` so credentials and
 * tokens are redacted before they are written.
 */

import { sanitizeForLogging } from "./log-sanitizer.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

const LEVEL_SET: ReadonlySet<string> = new Set(LOG_LEVELS);

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVEL_SET.has(value);
}

export function readLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const v = (raw ?? "").trim().toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

function defaultLevel(): LogLevel {
  const nodeEnv = process.env.APP_ENV || process.env.NODE_ENV;
  return readLogLevel(process.env.LOG_LEVEL, nodeEnv === "development" ? "debug" : "info");
}

/**
 * The subset of the logger that services depend on.
 */
export interface AppLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | LogContext): void;
}

export class Logger implements AppLogger {
  constructor(
    private level: LogLevel = defaultLevel(),
    private readonly scope?: string
  ) {}

  setLevel(level: LogLevel) {
    this.level = level;
  }

  /**
   * Scoped logger sharing this logger's level at creation time.
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const scopeStr = this.scope ? ` [${this.scope}]` : "";
    const contextStr = context ? ` ${JSON.stringify(sanitizeForLogging(context))}` : "";
    return `[${timestamp}] [${level.toUpperCase()}]${scopeStr} ${message}${contextStr}`;
  }

  info(message: string, context?: LogContext) {
    if (!this.enabled("info")) {return;}
    console.log(this.formatMessage("info", message, context));
  }

  warn(message: string, context?: LogContext) {
    if (!this.enabled("warn")) {return;}
    console.warn(this.formatMessage("warn", message, context));
  }

  error(message: string, error?: Error | LogContext) {
    if (!this.enabled("error")) {return;}
    if (error instanceof Error) {
      console.error(
        this.formatMessage("error", message, {
          error: error.message,
          stack: error.stack,
        })
      );
    } else {
      console.error(this.formatMessage("error", message, error));
    }
  }

  debug(message: string, context?: LogContext) {
    if (!this.enabled("debug")) {return;}
    console.log(this.formatMessage("debug", message, context));
  }
}

export const logger = new Logger();

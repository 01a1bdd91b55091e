/**
 * Leveled logger used across the switchboard.
 *
 * Components take a `Logger` and default to `silentLogger`; hosts inject a
 * `ConsoleLogger` or their own implementation. Context is serialised as JSON
 * on the same line. Credentials must never be passed as context.
 */

export const LOG_LEVEL = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVEL;

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Defaults to the console method matching the level. */
  sink?: LogSink;
  /** Prefix inside the line, e.g. the component name. */
  scope?: string;
  now?: () => Date;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly scope?: string;
  private readonly now: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sink = options.sink ?? consoleSink;
    this.scope = options.scope;
    this.now = options.now ?? (() => new Date());
  }

  /** A logger writing to the same sink under a nested scope. */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      sink: this.sink,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      now: this.now,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, undefined, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, undefined, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, undefined, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log("error", message, error, context);
  }

  private log(
    level: LogLevel,
    message: string,
    error: unknown,
    context: LogContext | undefined,
  ): void {
    if (LOG_LEVEL[level] < LOG_LEVEL[this.level]) return;

    const scope = this.scope ? ` [${this.scope}]` : "";
    let line = `[${this.now().toISOString()}] [${level.toUpperCase()}]${scope} ${message}`;

    if (context && Object.keys(context).length > 0) {
      line += ` ${safeJson(context)}`;
    }

    if (error != null) {
      const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
      line += `\n  ${detail}`;
    }

    this.sink(level, line);
  }
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserialisable context]";
  }
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Structured Logging
 *
 * Every channel component takes an optional Logger and defaults to
 * NoOpLogger, so tests stay quiet and the server decides where output goes.
 *
 * - Logger: "Here's a log message with context, do whatever you want"
 * - MetricsSink: "Here's a metric event, do whatever you want"
 */

// =============================================================================
// LOG LEVELS
// =============================================================================

/**
 * Log levels in order of severity.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Log level severity values (higher = more severe).
 */
export const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Narrow an arbitrary string (e.g. from the environment) to a LogLevel.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

// =============================================================================
// LOG ENTRY
// =============================================================================

/**
 * A structured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Epoch ms */
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
  /** Source component */
  component?: string;
}

// =============================================================================
// LOGGER INTERFACE
// =============================================================================

/**
 * Logger - Interface for structured logging.
 *
 * @example
 * ```typescript
 * const log = logger.child({ connectionId });
 * log.info("Command dispatched", { commandType: "create_label" });
 * log.logError("Collaborator failed", error, { commandType });
 * ```
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  fatal(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error with its stack at error level.
   */
  logError(message: string, error: Error, context?: Record<string, unknown>): void;

  /**
   * Create a child logger whose entries carry the extra context.
   */
  child(context: Record<string, unknown>): Logger;

  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// BASE LOGGER
// =============================================================================

/**
 * BaseLogger - level filtering and context merging.
 * Subclasses decide where entries go and how children are built.
 */
export abstract class BaseLogger implements Logger {
  protected level: LogLevel;
  protected baseContext: Record<string, unknown>;

  constructor(level: LogLevel = "info", baseContext: Record<string, unknown> = {}) {
    this.level = level;
    this.baseContext = baseContext;
  }

  abstract log(entry: LogEntry): void;

  abstract child(context: Record<string, unknown>): Logger;

  trace(message: string, context?: Record<string, unknown>): void {
    this.write("trace", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", message, context);
  }

  fatal(message: string, context?: Record<string, unknown>): void {
    this.write("fatal", message, context);
  }

  logError(message: string, error: Error, context?: Record<string, unknown>): void {
    if (this.isLevelEnabled("error")) {
      this.log({
        level: "error",
        message,
        timestamp: Date.now(),
        context: this.mergeContext(context),
        error,
      });
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  protected mergeContext(context?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!context) {
      return Object.keys(this.baseContext).length > 0 ? { ...this.baseContext } : undefined;
    }
    if (Object.keys(this.baseContext).length === 0) {
      return context;
    }
    return { ...this.baseContext, ...context };
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (this.isLevelEnabled(level)) {
      this.log({ level, message, timestamp: Date.now(), context: this.mergeContext(context) });
    }
  }
}

// =============================================================================
// BUILT-IN LOGGERS
// =============================================================================

/**
 * NoOpLogger - Discards all log messages.
 */
export class NoOpLogger extends BaseLogger {
  log(_entry: LogEntry): void {
    // Discard
  }

  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * ConsoleLogger - Logs to console as text or JSON lines.
 */
export class ConsoleLogger extends BaseLogger {
  private json: boolean;
  private component?: string;

  constructor(options: {
    level?: LogLevel;
    json?: boolean;
    component?: string;
    baseContext?: Record<string, unknown>;
  } = {}) {
    super(options.level ?? "info", options.baseContext ?? {});
    this.json = options.json ?? false;
    this.component = options.component;
  }

  log(entry: LogEntry): void {
    if (this.json) {
      this.logJson(entry);
    } else {
      this.logText(entry);
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      json: this.json,
      component: this.component,
      baseContext: { ...this.baseContext, ...context },
    });
  }

  private logText(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const component = entry.component ?? this.component ?? "";
    const prefix = component ? `[${component}] ` : "";
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";

    let message = `${timestamp} ${level} ${prefix}${entry.message}${contextStr}`;

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        message += `\n  ${entry.error.stack}`;
      }
    }

    switch (entry.level) {
      case "trace":
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.info(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
      case "fatal":
        console.error(message);
        break;
    }
  }

  private logJson(entry: LogEntry): void {
    const output: Record<string, unknown> = {
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
    };

    const component = entry.component ?? this.component;
    if (component) {
      output.component = component;
    }

    if (entry.context) {
      Object.assign(output, entry.context);
    }

    if (entry.error) {
      output.error = {
        message: entry.error.message,
        stack: entry.error.stack,
      };
    }

    console.log(JSON.stringify(output));
  }
}

/**
 * MemoryLogger - Keeps entries in an array. Used by tests to assert on
 * what a component logged.
 */
export class MemoryLogger extends BaseLogger {
  constructor(
    level: LogLevel = "trace",
    baseContext: Record<string, unknown> = {},
    readonly entries: LogEntry[] = []
  ) {
    super(level, baseContext);
  }

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  child(context: Record<string, unknown>): Logger {
    return new MemoryLogger(this.level, { ...this.baseContext, ...context }, this.entries);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }
}

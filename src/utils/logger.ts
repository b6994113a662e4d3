/**
 * Structured server-side logger for conduit-mcp.
 * Provides consistent log format with timestamps, levels, and structured data.
 *
 * This is the operator log. Log lines sent to MCP clients travel as
 * `notifications/message` through the broadcaster and are filtered separately.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp?: string;
  level: LogLevel;
  message: string;
  context?: LogData;
  data?: LogData;
}

export interface LoggerOptions {
  minLevel: LogLevel;
  enableColors: boolean;
  includeTimestamp: boolean;
  context?: LogData;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  bold: "\x1b[1m",
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

/** Shared by a logger and all of its children. */
interface LevelState {
  minLevel: LogLevel;
}

export class Logger {
  private options: Omit<LoggerOptions, "minLevel">;
  private context: LogData;
  private level: LevelState;

  constructor(options?: Partial<LoggerOptions>, level?: LevelState) {
    const envLogLevel = process.env.LOG_LEVEL;

    this.options = {
      enableColors: options?.enableColors ?? true,
      includeTimestamp: options?.includeTimestamp ?? true,
      context: options?.context,
    };
    this.level = level ?? {
      minLevel:
        options?.minLevel ?? (isLogLevel(envLogLevel) ? envLogLevel : "info"),
    };
    this.context = options?.context ?? {};
  }

  /**
   * Set the minimum log level for this logger and every child it created.
   */
  setMinLevel(level: LogLevel): void {
    this.level.minLevel = level;
  }

  get minLevel(): LogLevel {
    return this.level.minLevel;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level.minLevel];
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogData): Logger {
    return new Logger(
      {
        ...this.options,
        context: {
          ...this.context,
          ...context,
        },
      },
      this.level
    );
  }

  debug(message: string, data?: LogData): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log("warn", message, data);
  }

  /**
   * Log an error message. The error's message and stack are folded into the data.
   */
  error(message: string, error?: unknown, data?: LogData): void {
    let errorData = data;
    if (error instanceof Error) {
      errorData = { message: error.message, stack: error.stack, ...data };
    } else if (error !== undefined) {
      errorData = { error: String(error), ...data };
    }

    this.log("error", message, errorData);
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = this.options.includeTimestamp
      ? new Date().toISOString()
      : undefined;
    const context =
      Object.keys(this.context).length > 0 ? this.context : undefined;

    const logEntry: LogEntry = {
      timestamp,
      level,
      message,
      ...(context && { context }),
      ...(data && { data }),
    };

    if (this.options.enableColors) {
      const color = COLORS[level];
      const levelString = `${color}${level.toUpperCase()}${COLORS.reset}`;
      const timestampString = timestamp
        ? `${COLORS.dim}${timestamp}${COLORS.reset} `
        : "";
      const messageString = `${color}${message}${COLORS.reset}`;

      console.log(`${timestampString}${levelString}: ${messageString}`);
      if (context || data) {
        console.log(JSON.stringify({ ...context, ...data }, null, 2));
      }
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }
}

export const logger = new Logger({
  enableColors: process.env.NODE_ENV !== "production",
  includeTimestamp: true,
});

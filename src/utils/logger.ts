/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export type LogMeta = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "JsonSleuth";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private emit(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const label = `[${this.prefix}] ${level.toUpperCase()}:`;
    if (level === "error") {
      console.error(label, message, meta || "");
    } else if (level === "warn") {
      console.warn(label, message, meta || "");
    } else {
      // stderr keeps stdout free for piped schema output
      process.stderr.write(
        `${label} ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
      );
    }
  }

  error(message: string, meta?: LogMeta): void {
    this.emit("error", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.emit("warn", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.emit("info", message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.emit("debug", message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Default logger instance
export const logger = new Logger();

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  sink?: LogSink;
  clock?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local timestamp as YYYY.MM.DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}.${pad(date.getMonth() + 1)}.${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class Logger {
  private level: LogLevel;
  private sink: LogSink;
  private clock: () => Date;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.sink = config.sink || process.stderr;
    this.clock = config.clock || (() => new Date());
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  // Everything goes to stderr so stdout stays free for command output
  private emit(level: LogLevel, message: string, meta?: object): void {
    if (!this.shouldLog(level)) return;
    const marker = level.charAt(0).toUpperCase();
    const suffix = meta ? ` ${JSON.stringify(meta)}` : "";
    this.sink.write(
      `[${formatTimestamp(this.clock())}] ${marker} ${message}${suffix}\n`,
    );
  }

  error(message: string, meta?: object): void {
    this.emit("error", message, meta);
  }

  warn(message: string, meta?: object): void {
    this.emit("warn", message, meta);
  }

  info(message: string, meta?: object): void {
    this.emit("info", message, meta);
  }

  debug(message: string, meta?: object): void {
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

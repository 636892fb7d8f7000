/**
 * Logger Utility
 *
 * Structured logging to a line sink.
 * Supports log levels: DEBUG, INFO, WARN, ERROR.
 *
 * The CLI writes to a log file because the terminal belongs to the
 * practice screen. Tests use an in-memory sink.
 */

import * as fs from "fs";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

/** Anything that accepts whole lines of log output. */
export interface LogSink {
  appendLine(line: string): void;
  dispose?(): void;
}

export interface LoggerOptions {
  /** Lines below this level are dropped. Defaults to DEBUG. */
  level?: LogLevel;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case "debug": return LogLevel.DEBUG;
    case "info": return LogLevel.INFO;
    case "warn": return LogLevel.WARN;
    case "error": return LogLevel.ERROR;
    default: return undefined;
  }
}

export class Logger {
  private readonly _level: LogLevel;

  constructor(private readonly sink: LogSink, options: LoggerOptions = {}) {
    this._level = options.level ?? LogLevel.DEBUG;
  }

  private format(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const levelLabel = LOG_LEVEL_LABELS[level];
    const argsStr = args.length > 0 ? " " + args.map((a) => JSON.stringify(a)).join(" ") : "";
    return `[${timestamp}] [${levelLabel}] ${message}${argsStr}`;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (level < this._level) { return; }
    const formatted = this.format(level, message, ...args);
    this.sink.appendLine(formatted);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, error?: Error, ...args: unknown[]): void {
    const allArgs = error ? [error.message, ...args] : args;
    this.log(LogLevel.ERROR, message, ...allArgs);
    if (error?.stack && LogLevel.ERROR >= this._level) {
      this.sink.appendLine(error.stack);
    }
  }

  dispose(): void {
    this.sink.dispose?.();
  }
}

/**
 * Appends to a file, creating it if needed. If the file cannot be opened
 * or written, the sink goes quiet and keeps the error in `failure`; the
 * practice screen carries on without a log.
 */
export class FileLogSink implements LogSink {
  private readonly _stream: fs.WriteStream;
  private _failure: Error | null = null;

  constructor(readonly filePath: string) {
    this._stream = fs.createWriteStream(filePath, { flags: "a", encoding: "utf-8" });
    this._stream.on("error", (err) => {
      if (!this._failure) {
        this._failure = err;
      }
    });
  }

  get failure(): Error | null {
    return this._failure;
  }

  appendLine(line: string): void {
    if (this._failure || this._stream.destroyed) { return; }
    this._stream.write(line + "\n");
  }

  dispose(): void {
    if (!this._stream.destroyed) {
      this._stream.end();
    }
  }
}

/** Keeps lines in memory. */
export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }
}

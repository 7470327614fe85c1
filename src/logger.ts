// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Module-prefixed logger with levels and a pluggable sink.
 *
 * Loggers are passed in through options; nothing in the package logs
 * through a global.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3, SILENT: 4 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

export interface LoggerOptions {
  /** Minimum level that reaches the sink. Default: WARN. */
  level?: LogLevel;
  /** Output function. Default: the console. */
  sink?: LogSink;
}

export const consoleSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(
    private readonly module: string,
    options: LoggerOptions = {},
  ) {
    this.level = options.level ?? LogLevel.WARN;
    this.sink = options.sink ?? consoleSink;
  }

  /** A logger that drops everything. */
  static silent(): Logger {
    return new Logger("silent", { level: LogLevel.SILENT, sink: () => {} });
  }

  /** Same level and sink, different module prefix. */
  child(module: string): Logger {
    return new Logger(module, { level: this.level, sink: this.sink });
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.ERROR, message, args);
  }

  private emit(level: LogLevel, message: string, args: unknown[]): void {
    if (level < this.level) return;
    this.sink(level, `[${this.module}]`, message, ...args);
  }
}

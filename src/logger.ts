/**
 * Logger - Levelled JSON-line diagnostics on stderr
 */

import { describeError } from './errors';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent'
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.SILENT]: 100
};

export type LogSink = (line: string) => void;

export type LogFields = Record<string, unknown>;

export function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some(level => level === value);
}

export class Logger {
  private readonly sink: LogSink;

  constructor(
    private readonly level: LogLevel = LogLevel.WARN,
    sink?: LogSink,
    private readonly now: () => Date = () => new Date()
  ) {
    this.sink = sink ?? (line => console.error(line));
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, fields: LogFields = {}): void {
    this.write(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields: LogFields = {}): void {
    this.write(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.write(LogLevel.WARN, message, fields);
  }

  error(message: string, fields: LogFields = {}): void {
    this.write(LogLevel.ERROR, message, fields);
  }

  /**
   * Write one entry as a single JSON line. Never throws.
   */
  private write(level: LogLevel, message: string, fields: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    try {
      const entry = { timestamp: this.now().toISOString(), level, message, ...fields };
      this.sink(JSON.stringify(entry));
    } catch (error) {
      console.error(`Warning: Failed to write log entry: ${describeError(error)}`);
    }
  }
}

import type { LogLevel } from '../types/options.js';

/**
 * Log entry with metadata.
 */
export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Destination for log entries that passed level filtering.
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Logger interface for outline generation.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  isEnabled(level: LogLevel): boolean;
  child(context: string): ILogger;
}

/**
 * Log level priority for filtering.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Formats an entry as `<timestamp> <LEVEL> [context] message`.
 */
export function formatLogEntry(entry: LogEntry): string {
  const prefix = entry.context ? `[${entry.context}] ` : '';
  return `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)} ${prefix}${entry.message}`;
}

/**
 * Writes entries to the console method matching their level.
 */
export const consoleSink: LogSink = (entry) => {
  const line = formatLogEntry(entry);
  const write = console[entry.level];
  if (entry.data) {
    write(line, entry.data);
  } else {
    write(line);
  }
};

/**
 * Level-filtering logger that forwards to a sink.
 */
export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly context?: string;
  private readonly sink: LogSink;

  constructor(level: LogLevel = 'warn', context?: string, sink: LogSink = consoleSink) {
    this.level = level;
    this.context = context;
    this.sink = sink;
  }

  /**
   * Creates a child logger with additional context, sharing level and sink.
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext, this.sink);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = { level, message, timestamp: new Date() };
    if (this.context) entry.context = this.context;
    if (data) entry.data = data;
    this.sink(entry);
  }
}

/**
 * Creates a logger instance based on the log level.
 * The 'silent' level drops every entry.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, sink?: LogSink): ILogger {
  return new Logger(level, context, sink);
}

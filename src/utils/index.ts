export { Logger, createLogger, consoleSink, formatLogEntry } from './Logger.js';
export type { ILogger, LogEntry, LogSink } from './Logger.js';

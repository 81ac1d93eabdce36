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
 * Logger interface shared by handles, decoders and loaders.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
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
 * Formats an entry as `<timestamp> LEVEL [context] message`.
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
  const write = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  }[entry.level];

  if (entry.data) {
    write(line, entry.data);
  } else {
    write(line);
  }
};

/**
 * Levelled logger with colon-joined contexts.
 */
export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly context?: string;
  private readonly levelPriority: number;
  private readonly sink: LogSink;

  constructor(level: LogLevel = 'warn', context?: string, sink: LogSink = consoleSink) {
    this.level = level;
    this.context = context;
    this.levelPriority = LOG_LEVEL_PRIORITY[level];
    this.sink = sink;
  }

  /**
   * Creates a child logger with additional context.
   */
  child(context: string): ILogger {
    const fullContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(this.level, fullContext, this.sink);
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
    if (LOG_LEVEL_PRIORITY[level] < this.levelPriority) {
      return;
    }

    this.sink({
      level,
      message,
      context: this.context,
      data,
      timestamp: new Date(),
    });
  }
}

/**
 * Creates a logger instance based on the log level.
 * 'silent' outranks every message level, so nothing reaches the sink.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, sink?: LogSink): ILogger {
  return new Logger(level, context, sink);
}

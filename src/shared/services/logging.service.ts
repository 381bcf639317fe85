/**
 * Logging Service
 *
 * Structured logging for the sitemap core. Entries are kept in a bounded
 * in-memory ring and written to stderr, so stdout stays free for rendered
 * documents.
 */

/**
 * Log level type (RFC 5424 severities)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  logger: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Destination for log entries that passed the level filter
 */
export type LogSink = (entry: LogEntry) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

/**
 * Narrow an arbitrary string (e.g. an env var) to a LogLevel.
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logging Service
 *
 * Centralized logger with a configurable minimum level
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly loggerName: string;
  private sink: LogSink;

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000, loggerName = 'sitemap') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
    this.sink = (entry) => this.outputToConsole(entry);
  }

  /**
   * Replace the output destination (defaults to stderr)
   */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  /**
   * Set minimum log level
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log a notice message (normal but significant)
   */
  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      logger: this.loggerName,
      context,
      error,
    };

    this.logEntries.push(entry);

    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    this.sink(entry);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  /**
   * Output log entry to stderr
   */
  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(8);

    let output = `[${timestamp}] ${levelStr} [${entry.logger}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }

  /**
   * Get recent log entries
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minLevelValue = LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LOG_LEVELS[entry.level] >= minLevelValue);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  const envLevel = process.env.LOG_LEVEL;
  globalLogger ??= new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}

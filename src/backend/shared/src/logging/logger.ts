/**
 * Structured Logging Module
 *
 * Provides structured JSON logging with correlation ID support and an
 * in-memory entry buffer for tests.
 *
 * @tested tests/property/comprehensive-logging.property.test.ts
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: z.nativeEnum(LogLevel),
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * One analysis pass over a village collection
 */
export interface EvaluationLogEntry {
  operation: string;
  villageCount: number;
  thresholds: Readonly<Record<string, number>>;
  tierCounts?: Readonly<Record<string, number>>;
  processingTimeMs: number;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  /** Maximum number of entries kept in memory; older entries are dropped */
  maxBufferedEntries: number;
}

/**
 * Default logger configuration
 */
export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'village-gap-analysis',
  minLevel: LogLevel.INFO,
  enableConsole: true,
  maxBufferedEntries: 1000,
};

/**
 * Checks if a log level should be logged based on minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minLevel);
}

/**
 * Structured Logger class
 */
export class Logger {
  private config: LoggerConfig;
  private correlationId?: string;
  private logEntries: LogEntry[];

  constructor(config: Partial<LoggerConfig> = {}, sharedEntries: LogEntry[] = []) {
    this.config = { ...defaultLoggerConfig, ...config };
    this.logEntries = sharedEntries;
  }

  /**
   * Sets the correlation ID for all subsequent log entries
   */
  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }

  /**
   * Creates a child logger bound to a correlation ID. The child writes into
   * the parent's entry buffer.
   */
  child(correlationId: string): Logger {
    const childLogger = new Logger(this.config, this.logEntries);
    childLogger.setCorrelationId(correlationId);
    return childLogger;
  }

  /**
   * Gets all log entries (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  /**
   * Clears all log entries (for testing)
   */
  clearLogEntries(): void {
    this.logEntries.length = 0;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
    };

    if (this.correlationId) {
      entry.correlationId = this.correlationId;
    }

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);
    this.logEntries.push(entry);
    if (this.logEntries.length > this.config.maxBufferedEntries) {
      this.logEntries.splice(0, this.logEntries.length - this.config.maxBufferedEntries);
    }

    if (this.config.enableConsole) {
      const logFn = level === LogLevel.ERROR ? console.error : console.log;
      logFn(JSON.stringify(entry));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  /**
   * Logs an analysis pass with its inputs and tier outcome
   */
  logEvaluation(entry: EvaluationLogEntry): void {
    const metadata: Record<string, unknown> = {
      operation: entry.operation,
      villageCount: entry.villageCount,
      thresholds: { ...entry.thresholds },
      processingTimeMs: entry.processingTimeMs,
    };

    if (entry.tierCounts) {
      metadata.tierCounts = { ...entry.tierCounts };
    }

    this.info('Gap analysis completed', metadata);
  }
}

/**
 * Creates a logger instance with the given configuration
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

let globalLogger: Logger | null = null;

/**
 * Gets the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Sets the global logger instance
 */
export function setLogger(logger: Logger): void {
  globalLogger = logger;
}

/**
 * Resets the global logger (for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}

/**
 * Standardized logging for the curtailment impact analysis
 *
 * Thin facade over winston that keeps the `module` / `context` call shape used
 * throughout the services. Console output is always on (unless silenced for
 * tests); a daily JSON log file is written when LOG_DIR is set.
 */

import path from 'path';
import { format } from 'date-fns';
import { createLogger, format as logFormat, transports, type Logger as WinstonLogger } from 'winston';
import { AppError, ErrorSeverity } from './errors';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export interface LogOptions {
  level?: LogLevel;
  module?: string;
  context?: Record<string, unknown>;
  error?: Error;
}

// winston levels, most severe first
const winstonLevels: Record<LogLevel, number> = {
  [LogLevel.CRITICAL]: 0,
  [LogLevel.ERROR]: 1,
  [LogLevel.WARNING]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4
};

const severityToLevel: Record<ErrorSeverity, LogLevel> = {
  [ErrorSeverity.INFO]: LogLevel.INFO,
  [ErrorSeverity.WARNING]: LogLevel.WARNING,
  [ErrorSeverity.ERROR]: LogLevel.ERROR,
  [ErrorSeverity.CRITICAL]: LogLevel.CRITICAL
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return Object.values(LogLevel).some(level => level === value);
}

export interface LoggerSettings {
  level?: LogLevel;
  logDir?: string;
  silent?: boolean;
}

function createWinstonLogger(settings: LoggerSettings): WinstonLogger {
  const consoleFormat = logFormat.combine(
    logFormat.timestamp({ format: 'HH:mm:ss.SSS' }),
    logFormat.printf(({ level, message, timestamp, module }) => {
      return `[${timestamp}] [${level.toUpperCase()}] [${module ?? 'app'}] ${message}`;
    })
  );

  const logger = createLogger({
    levels: winstonLevels,
    level: settings.level ?? LogLevel.INFO,
    silent: settings.silent ?? false,
    transports: [new transports.Console({ format: consoleFormat })]
  });

  if (settings.logDir) {
    logger.add(
      new transports.File({
        filename: path.join(settings.logDir, `curtailment_${format(new Date(), 'yyyy-MM-dd')}.log`),
        format: logFormat.combine(logFormat.timestamp(), logFormat.json())
      })
    );
  }

  return logger;
}

/**
 * Main logger class
 */
export class Logger {
  private readonly output: WinstonLogger;

  constructor(settings: LoggerSettings = {}) {
    this.output = createWinstonLogger(settings);
  }

  log(message: string, options: LogOptions = {}): void {
    const { level = LogLevel.INFO, module = 'app', context, error } = options;

    this.output.log(level, message, {
      module,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
      ...(error ? { error: { name: error.name, message: error.message, stack: error.stack } } : {})
    });
  }

  debug(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.DEBUG });
  }

  info(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.INFO });
  }

  warning(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.WARNING });
  }

  error(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.ERROR });
  }

  critical(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.CRITICAL });
  }

  /**
   * Log an error object, taking the level from its severity when it is an AppError
   */
  logError(error: Error, options: Omit<LogOptions, 'error' | 'level'> = {}): void {
    const level = error instanceof AppError ? severityToLevel[error.severity] : LogLevel.ERROR;
    const errorContext = error instanceof AppError ? error.context : {};

    this.log(error.message, {
      ...options,
      level,
      error,
      context: {
        ...options.context,
        ...errorContext
      }
    });
  }
}

const envLevel = process.env.LOG_LEVEL;

// Singleton used by the services
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : LogLevel.INFO,
  logDir: process.env.LOG_DIR,
  silent: process.env.NODE_ENV === 'test'
});

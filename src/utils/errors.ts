/**
 * Standard error handling utilities for the curtailment impact analysis
 *
 * Errors carry a severity and a category so the logger can pick a level and
 * callers can tell fatal configuration problems from recoverable data defects.
 */

import type { ZodError } from 'zod';

export enum ErrorSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  VALIDATION = 'validation',
  DATA_QUALITY = 'data_quality',
  CALCULATION = 'calculation',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

export interface ErrorOptions {
  severity?: ErrorSeverity;
  category?: ErrorCategory;
  context?: ErrorContext;
  originalError?: Error;
}

/**
 * Base application error class with standardized properties
 */
export class AppError extends Error {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
  timestamp: Date;
  originalError?: Error;

  constructor(message: string, options: ErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.severity = options.severity || ErrorSeverity.ERROR;
    this.category = options.category || ErrorCategory.UNKNOWN;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
  }

  /**
   * Format error for logging
   */
  toLogFormat(): string {
    return `[${this.severity.toUpperCase()}] [${this.category}] ${this.message}`;
  }
}

/**
 * Flatten zod issues into `path: message` strings
 */
function describeZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.VALIDATION,
      severity: options.severity || ErrorSeverity.WARNING
    });
  }

  /**
   * Create from Zod error
   */
  static fromZodError(error: ZodError, context: ErrorContext = {}): ValidationError {
    const issues = describeZodIssues(error);

    return new ValidationError(issues[0] || 'Validation failed', {
      context: {
        ...context,
        validationErrors: issues
      },
      originalError: error
    });
  }
}

/**
 * Calculation invariant breach (e.g. an event with no duration reaching apportionment)
 */
export class CalculationError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.CALCULATION
    });
  }
}

/**
 * Configuration error. Always fatal: every figure is scaled by the configuration.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.CONFIGURATION,
      severity: options.severity || ErrorSeverity.CRITICAL
    });
  }

  static fromZodError(error: ZodError, context: ErrorContext = {}): ConfigurationError {
    const issues = describeZodIssues(error);

    return new ConfigurationError(`Invalid analysis configuration: ${issues.join('; ')}`, {
      context: {
        ...context,
        validationErrors: issues
      },
      originalError: error
    });
  }
}

/**
 * Read a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

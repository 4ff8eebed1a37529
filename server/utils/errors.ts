/**
 * Standard error handling utilities for the chart telemetry reconciler
 *
 * Every failure raised by the extraction and reconciliation pipeline carries a
 * severity, a category and a context object so that the logger can render it
 * consistently.
 */

import type { ZodError } from 'zod';

export enum ErrorSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  DATABASE = 'database',
  VALIDATION = 'validation',
  BROWSER = 'browser',
  EXTRACTION = 'extraction',
  RECONCILIATION = 'reconciliation',
  REPORT = 'report',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

export interface ErrorOptions {
  severity?: ErrorSeverity;
  category?: ErrorCategory;
  context?: ErrorContext;
  originalError?: unknown;
}

/**
 * Base application error class with standardized properties
 */
export class AppError extends Error {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
  timestamp: Date;
  originalError?: unknown;

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
 * Fields node-postgres attaches to a failed query
 */
interface PgErrorLike {
  message?: string;
  code?: string;
  detail?: string;
  hint?: string;
  position?: string;
}

function isPgErrorLike(error: unknown): error is PgErrorLike {
  return typeof error === 'object' && error !== null;
}

/**
 * Database-related error
 */
export class DatabaseError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.DATABASE
    });
  }

  /**
   * Create DatabaseError from pg error
   */
  static fromPgError(error: unknown, context: ErrorContext = {}): DatabaseError {
    const pgError: PgErrorLike = isPgErrorLike(error) ? error : {};
    const message = pgError.message || 'Unknown database error';
    // SQLSTATE class 08 is a connection exception
    const severity = pgError.code?.startsWith('08') ?
      ErrorSeverity.CRITICAL : ErrorSeverity.ERROR;

    return new DatabaseError(message, {
      severity,
      context: {
        ...context,
        code: pgError.code,
        detail: pgError.detail,
        hint: pgError.hint,
        position: pgError.position
      },
      originalError: error
    });
  }
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
    const first = error.issues[0];
    const message = first ?
      `${first.path.join('.') || 'value'}: ${first.message}` :
      'Validation failed';

    return new ValidationError(message, {
      context: {
        ...context,
        validationErrors: error.issues
      },
      originalError: error
    });
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.CONFIGURATION,
      severity: options.severity || ErrorSeverity.CRITICAL
    });
  }
}

export type CollaboratorName = 'browser' | 'datastore' | 'report';

const collaboratorCategories: Record<CollaboratorName, ErrorCategory> = {
  browser: ErrorCategory.BROWSER,
  datastore: ErrorCategory.DATABASE,
  report: ErrorCategory.REPORT
};

/**
 * A failure of one of the external collaborators (browser session, datastore,
 * report sink). Always fatal to the run that hit it.
 */
export class CollaboratorError extends AppError {
  collaborator: CollaboratorName;

  constructor(collaborator: CollaboratorName, message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: collaboratorCategories[collaborator]
    });
    this.collaborator = collaborator;
  }

  static wrap(collaborator: CollaboratorName, error: unknown, context: ErrorContext = {}): CollaboratorError {
    if (error instanceof CollaboratorError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new CollaboratorError(collaborator, `${collaborator} failure: ${message}`, {
      severity: error instanceof AppError ? error.severity : ErrorSeverity.ERROR,
      context: error instanceof AppError ? { ...error.context, ...context } : context,
      originalError: error
    });
  }
}

/**
 * The position scan finished without discovering a single key
 */
export class EmptyScanResultError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.EXTRACTION
    });
  }
}

/**
 * Reconciliation-specific error
 */
export class ReconciliationError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.RECONCILIATION
    });
  }
}

/**
 * Normalise anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

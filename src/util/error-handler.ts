/**
 * Error Handler Utility
 *
 * Fault taxonomy for the control engine plus a handler that classifies,
 * logs and optionally rethrows. No fault here is fatal to the process.
 */

import { Logger, LogContext } from './logger';

/**
 * Error categories, one per fault kind the engine reports
 */
export enum ErrorCategory {
  NO_DATA = 'NO_DATA',
  MODEL_INTEGRITY = 'MODEL_INTEGRITY',
  SEARCH_NON_CONVERGENCE = 'SEARCH_NON_CONVERGENCE',
  PERSISTENCE = 'PERSISTENCE',
  PARAMETER_BOUND = 'PARAMETER_BOUND',
  NETWORK = 'NETWORK',
  VALIDATION = 'VALIDATION',
  INTERNAL = 'INTERNAL',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Extended Error class with additional properties
 */
export class AppError extends Error {
  category: ErrorCategory;
  originalError?: Error | unknown;
  context?: LogContext;
  recoverable: boolean;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    originalError?: Error | unknown,
    context?: LogContext,
    recoverable: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.originalError = originalError;
    this.context = context;
    this.recoverable = recoverable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Required snapshot fields were absent or not finite. */
export class NoDataError extends AppError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required inputs: ${missing.join(', ')}`, ErrorCategory.NO_DATA, undefined, { missing });
    this.name = 'NoDataError';
    this.missing = missing;
  }
}

/** Equilibrium prediction fell outside the physically admissible band. */
export class ModelIntegrityError extends AppError {
  constructor(message: string, context?: LogContext) {
    super(message, ErrorCategory.MODEL_INTEGRITY, undefined, context);
    this.name = 'ModelIntegrityError';
  }
}

/** Outlet search stopped at its iteration cap; the best candidate is still used. */
export class SearchNonConvergenceError extends AppError {
  constructor(iterations: number, context?: LogContext) {
    super(`Outlet search did not converge after ${iterations} iterations`, ErrorCategory.SEARCH_NON_CONVERGENCE, undefined, context);
    this.name = 'SearchNonConvergenceError';
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, originalError?: unknown, context?: LogContext) {
    super(message, ErrorCategory.PERSISTENCE, originalError, context);
    this.name = 'PersistenceError';
  }
}

export class NetworkError extends AppError {
  constructor(message: string, originalError?: unknown, context?: LogContext) {
    super(message, ErrorCategory.NETWORK, originalError, context);
    this.name = 'NetworkError';
  }
}

/**
 * Type guard to check if a value is an Error
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Type guard to check if a value is an AppError
 */
export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}

/**
 * Error handler utility class
 */
export class ErrorHandler {
  constructor(private readonly logger: Logger) {}

  /**
   * Categorize an error based on its type or message
   */
  categorizeError(error: unknown): ErrorCategory {
    if (isAppError(error)) {
      return error.category;
    }
    if (!isError(error)) {
      return ErrorCategory.UNKNOWN;
    }

    const message = error.message.toLowerCase();
    const code = 'code' in error && typeof error.code === 'string' ? error.code : '';

    if (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('connection') ||
      message.includes('circuit') ||
      ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT'].includes(code)
    ) {
      return ErrorCategory.NETWORK;
    }

    if (['ENOENT', 'EACCES', 'EISDIR', 'ENOSPC', 'EROFS'].includes(code)) {
      return ErrorCategory.PERSISTENCE;
    }

    if (
      message.includes('invalid') ||
      message.includes('required') ||
      message.includes('must be')
    ) {
      return ErrorCategory.VALIDATION;
    }

    return ErrorCategory.INTERNAL;
  }

  /**
   * Create a standardized AppError from any error
   */
  createAppError(error: unknown, context?: LogContext, message?: string): AppError {
    if (isAppError(error)) {
      if (context) {
        error.context = { ...error.context, ...context };
      }
      return error;
    }

    const category = this.categorizeError(error);
    const text = message || errorMessage(error);
    return new AppError(text, category, error, context, true);
  }

  /**
   * Log an error at the level its category warrants
   */
  logError(error: unknown, context?: LogContext, message?: string): AppError {
    const appError = this.createAppError(error, context, message);

    const logContext: LogContext = {
      category: appError.category,
      recoverable: appError.recoverable,
      ...(appError.context || {})
    };

    switch (appError.category) {
      case ErrorCategory.NETWORK:
        this.logger.warn(`Network Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.VALIDATION:
      case ErrorCategory.NO_DATA:
      case ErrorCategory.SEARCH_NON_CONVERGENCE:
      case ErrorCategory.PARAMETER_BOUND:
        this.logger.warn(`${appError.category}: ${appError.message}`, logContext);
        break;
      default:
        this.logger.error(`${appError.category} Error: ${appError.message}`, appError.originalError ?? appError, logContext);
    }

    return appError;
  }

  /**
   * Handle an error: log it, then rethrow if asked to
   */
  handleError(error: unknown, context?: LogContext, message?: string, rethrow: boolean = true): AppError {
    const appError = this.logError(error, context, message);
    if (rethrow) {
      throw appError;
    }
    return appError;
  }

  isRecoverable(error: unknown): boolean {
    if (isAppError(error)) {
      return error.recoverable;
    }
    return true;
  }
}

/**
 * Custom error classes for the report core
 * These errors provide safe, non-PII error messages for API responses
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for malformed input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Not found error (report or report version)
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

// ============================================================================
// REPORT LIFECYCLE ERRORS
// ============================================================================

/**
 * Patient national identification number is malformed
 * The message never echoes the identifier itself
 */
export class InvalidPatientIdError extends AppError {
  public readonly expectedLength: number;
  public readonly actualLength: number;

  constructor(expectedLength: number, actualLength: number) {
    super(
      `Patient national id must be exactly ${expectedLength} characters (got ${actualLength})`,
      'INVALID_PATIENT_ID',
      400
    );
    this.name = 'InvalidPatientIdError';
    this.expectedLength = expectedLength;
    this.actualLength = actualLength;
  }
}

/**
 * Mutation attempted on a report that is no longer a draft
 */
export class EditNotAllowedError extends AppError {
  public readonly reportId: string;
  public readonly status: string;

  constructor(reportId: string, status: string) {
    super(
      `Report ${reportId} cannot be modified in status '${status}': only drafts are editable`,
      'EDIT_NOT_ALLOWED',
      409
    );
    this.name = 'EditNotAllowedError';
    this.reportId = reportId;
    this.status = status;
  }
}

/**
 * Status change not permitted by the workflow transition table
 */
export class InvalidTransitionError extends AppError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string) {
    super(`Invalid status transition: ${from} -> ${to}`, 'INVALID_TRANSITION', 409);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Report content does not satisfy the completeness rules required to leave draft
 */
export class IncompleteContentError extends AppError {
  public readonly reportId: string;
  public readonly violations: readonly { section: string; field: string; code: string }[];

  constructor(
    reportId: string,
    violations: readonly { section: string; field: string; code: string }[]
  ) {
    super(
      `Report ${reportId} is incomplete: ${violations.length} mandatory field(s) failed validation`,
      'INCOMPLETE_CONTENT',
      422
    );
    this.name = 'IncompleteContentError';
    this.reportId = reportId;
    this.violations = violations;
  }
}

// ============================================================================
// STORE ERRORS - Standardized error types for the data access layer
// ============================================================================

/**
 * Concurrency error (optimistic locking failure)
 * Thrown when a concurrent modification is detected. Retryable by the caller.
 */
export class ConcurrencyError extends AppError {
  public readonly recordType: string;
  public readonly recordId: string;
  public readonly isRetryable = true;

  constructor(recordType: string, recordId: string) {
    super(
      `Concurrent modification detected for ${recordType}: ${recordId}. Please retry.`,
      'CONCURRENCY_ERROR',
      409
    );
    this.name = 'ConcurrencyError';
    this.recordType = recordType;
    this.recordId = recordId;
  }
}

/**
 * The durable store failed, timed out or the call was cancelled
 * Retried a bounded number of times before surfacing to the request
 */
export class StoreUnavailableError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;
  public readonly isRetryable = true;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Report store ${operation} failed: ${message}`, 'STORE_UNAVAILABLE', 503);
    this.name = 'StoreUnavailableError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Database configuration error
 * Thrown when the database is not properly configured
 */
export class DatabaseConfigError extends AppError {
  constructor(message = 'Database connection not configured') {
    super(message, 'DATABASE_CONFIG_ERROR', 503);
    this.name = 'DatabaseConfigError';
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Check if the caller may retry the failed operation
 */
export function isRetryableError(error: unknown): error is ConcurrencyError | StoreUnavailableError {
  return error instanceof ConcurrencyError || error instanceof StoreUnavailableError;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}

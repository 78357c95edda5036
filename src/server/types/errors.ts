/**
 * Centralized error type definitions for the report indexer
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The report could not be read as markup at all. Fatal for that report only.
 */
export class ReportParseError extends AppError {
  constructor(source: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Failed to parse test report '${source}': ${reason}`,
      ErrorCode.REPORT_PARSE_ERROR,
      422,
      true,
      { source, reason, ...context }
    );
  }
}

/**
 * The report could not be retrieved from its location (file or URL).
 */
export class ReportSourceError extends AppError {
  constructor(location: string, message: string, context?: Record<string, unknown>) {
    super(
      `Failed to load test report from '${location}': ${message}`,
      ErrorCode.REPORT_SOURCE_ERROR,
      502,
      true,
      { location, ...context }
    );
  }
}

export class InvalidTimestampError extends AppError {
  constructor(value: string, context?: Record<string, unknown>) {
    super(
      `Invalid processing timestamp '${value}'. Expected "YYYY-MM-DD HH:MM:SS" or an ISO 8601 instant`,
      ErrorCode.INVALID_TIMESTAMP,
      400,
      true,
      { value, ...context }
    );
  }
}

/**
 * A value crossing a module boundary did not match its contract schema.
 */
export class ContractValidationError extends AppError {
  constructor(contract: string, issues: string[], context?: Record<string, unknown>) {
    super(
      `${contract} validation failed: ${issues.join('; ')}`,
      ErrorCode.VALIDATION_ERROR,
      400,
      true,
      { contract, issues, ...context }
    );
  }
}

/**
 * The external index store rejected or failed a bulk upload.
 */
export class IndexUploadError extends AppError {
  constructor(target: string, message: string, context?: Record<string, unknown>) {
    super(
      `Index upload to '${target}' failed: ${message}`,
      ErrorCode.INDEX_UPLOAD_ERROR,
      502,
      true,
      { target, ...context }
    );
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_TIMESTAMP = 'INVALID_TIMESTAMP',

  REPORT_PARSE_ERROR = 'REPORT_PARSE_ERROR',
  REPORT_SOURCE_ERROR = 'REPORT_SOURCE_ERROR',
  INDEX_UPLOAD_ERROR = 'INDEX_UPLOAD_ERROR',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Type guard to check if error is an operational error
 */
export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, 500, false);
}

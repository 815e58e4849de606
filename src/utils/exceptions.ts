/**
 * Error codes used to tell failure classes apart in logs and exit paths.
 */
export const ErrorCode = {
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  SETUP_ERROR: 'SETUP_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails (configuration, upstream payload shape)
 */
export class ValidationException extends AppException {
  constructor(message: string) {
    super(message, ErrorCode.VALIDATION_ERROR);
  }
}

/**
 * Thrown when the run cannot start: data directory or database unavailable.
 */
export class SetupException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, ErrorCode.SETUP_ERROR);
    this.originalError = originalError;
  }

  static fromError(step: string, error: unknown): SetupException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new SetupException(`${step}: ${originalError.message}`, originalError);
  }
}

/**
 * Thrown when a database operation fails.
 * Wraps the original error; the message names the operation.
 */
export class DatabaseException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, ErrorCode.DATABASE_ERROR);
    this.originalError = originalError;
  }

  static fromError(error: unknown, operation: string): DatabaseException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new DatabaseException(
      `Database operation failed: ${operation} (${originalError.message})`,
      originalError
    );
  }
}

/**
 * Thrown when an external API call fails.
 * Wraps the original error and provides context about the API and operation.
 */
export class ExternalApiException extends AppException {
  public readonly originalError?: Error;
  public readonly apiName: string;
  public readonly operation: string;
  public readonly statusCode?: number;

  constructor(
    apiName: string,
    operation: string,
    message: string,
    statusCode?: number,
    originalError?: Error
  ) {
    super(`[${apiName}] ${operation}: ${message}`, ErrorCode.EXTERNAL_API_ERROR);
    this.apiName = apiName;
    this.operation = operation;
    this.statusCode = statusCode;
    this.originalError = originalError;
  }
}

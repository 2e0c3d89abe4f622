/**
 * Standardized error codes for HTTP responses.
 */
export enum HttpErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  CONFLICT = 'CONFLICT',
  LOCKED = 'LOCKED',
  STORAGE_ERROR = 'STORAGE_ERROR',
  CONSISTENCY_VIOLATION = 'CONSISTENCY_VIOLATION',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

/**
 * Base class for all custom application errors.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: HttpErrorCode;

  public constructor(message: string, statusCode: number, code: HttpErrorCode) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Represents invalid caller input (HTTP 400).
 */
export class ValidationError extends AppError {
  public readonly details?: ValidationIssue[];

  public constructor(message: string, details?: ValidationIssue[]) {
    super(message, 400, HttpErrorCode.VALIDATION_ERROR);
    this.details = details;
  }
}

/**
 * Represents a "not found" error (HTTP 404).
 */
export class NotFoundError extends AppError {
  public constructor(message = 'Resource not found') {
    super(message, 404, HttpErrorCode.NOT_FOUND);
  }
}

/**
 * Represents a rejected admin secret (HTTP 401).
 */
export class UnauthorizedError extends AppError {
  public constructor(message = 'Admin secret required') {
    super(message, 401, HttpErrorCode.UNAUTHORIZED);
  }
}

/**
 * The request is well formed but clashes with the current catalog state (HTTP 409).
 */
export class ConflictError extends AppError {
  public constructor(message: string) {
    super(message, 409, HttpErrorCode.CONFLICT);
  }
}

/**
 * Represents a file lock error (HTTP 423).
 */
export class LockError extends AppError {
  public readonly details: { file: string };

  public constructor(message: string, file: string) {
    super(message, 423, HttpErrorCode.LOCKED);
    this.details = { file };
  }
}

/**
 * Persistence failed. The in-flight request is aborted and nothing is retried.
 */
export class StorageError extends AppError {
  public readonly details?: { location: string };

  public constructor(message: string, location?: string, options?: { cause?: unknown }) {
    super(message, 500, HttpErrorCode.STORAGE_ERROR);
    if (location) {
      this.details = { location };
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * An internal catalog invariant does not hold. Always a bug, never user error.
 */
export class ConsistencyError extends AppError {
  public readonly details: string[];

  public constructor(violations: string[]) {
    super(`Catalog consistency check failed: ${violations.join('; ')}`, 500, HttpErrorCode.CONSISTENCY_VIOLATION);
    this.details = violations;
  }
}

/**
 * Raised by parseConfig when the environment does not describe a usable setup.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid or missing environment variables:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

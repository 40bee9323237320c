/**
 * Common Error Type Definitions
 *
 * Domain error classes carry an HTTP status so the server's error handler and
 * the CLI can report them without knowing every concrete type.
 */

/**
 * Get the errno-style code (ENOENT, EACCES, ...) from an error, if available.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check whether a filesystem error means the path does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}

/**
 * Render any thrown value as a message string.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Domain-Specific Error Classes
// ============================================================================

/**
 * Error type discriminator for domain errors.
 */
export type DomainErrorType =
  | 'VALIDATION_ERROR'
  | 'CONFLICT_ERROR'
  | 'STORAGE_ERROR';

/**
 * Base class for domain-specific errors.
 */
export abstract class DomainError extends Error {
  abstract readonly type: DomainErrorType;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for API responses
   */
  toJSON(): { type: DomainErrorType; message: string; context?: Record<string, unknown> } {
    return {
      type: this.type,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

/**
 * Validation error for malformed input (configuration values, CLI arguments).
 *
 * @example
 * throw new ValidationError('Invalid quota size', 'quota', { value: '12X' });
 * throw ValidationError.required('username');
 */
export class ValidationError extends DomainError {
  readonly type = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(field && { field }) });
  }

  static required(field: string): ValidationError {
    return new ValidationError(`${field} is required`, field);
  }

  static invalidFormat(field: string, expectedFormat?: string): ValidationError {
    const message = expectedFormat
      ? `Invalid ${field} format. Expected: ${expectedFormat}`
      : `Invalid ${field} format`;
    return new ValidationError(message, field, { expectedFormat });
  }
}

/**
 * Conflict error for duplicate resources.
 *
 * @example
 * throw new ConflictError('User already exists', 'user', { username: 'alice' });
 */
export class ConflictError extends DomainError {
  readonly type = 'CONFLICT_ERROR' as const;
  readonly statusCode = 409;

  constructor(
    message: string,
    public readonly resource?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(resource && { resource }) });
  }
}

/**
 * Storage error for unreadable or corrupt persisted state.
 */
export class StorageError extends DomainError {
  readonly type = 'STORAGE_ERROR' as const;
  readonly statusCode = 500;

  constructor(
    message: string,
    public readonly path?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(path && { path }) });
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

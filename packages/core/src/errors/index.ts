/**
 * Custom Error Classes
 */

/**
 * Base error class for all docbinder errors
 */
export class DocBinderError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DocBinderError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends DocBinderError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Input file with an extension the pipeline cannot handle
 */
export class UnsupportedFormatError extends DocBinderError {
  public readonly path: string;

  constructor(path: string, kind: string, allowed: readonly string[]) {
    super(
      `${kind} format not recognized for ${path}, allowed ${allowed.length > 1 ? 'formats are' : 'format is'}: ${allowed.join(', ')}`,
      'UNSUPPORTED_FORMAT',
      { path, kind, allowed: [...allowed] }
    );
    this.name = 'UnsupportedFormatError';
    this.path = path;
  }
}

/**
 * Failure while writing the final archive
 */
export class PackagingError extends DocBinderError {
  constructor(target: string, cause: unknown) {
    super(
      `Failed to write archive ${target}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PACKAGING_ERROR',
      { target },
      { cause }
    );
    this.name = 'PackagingError';
  }
}

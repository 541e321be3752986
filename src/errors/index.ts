/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures (configuration, identifiers)
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

/**
 * Error for page or workbook retrieval failures
 */
export class FetchError extends AppError {
  constructor(
    message: string,
    public url: string,
    public status: number,
    cause?: Error
  ) {
    super(message, 'FETCH_ERROR', cause);
  }
}

/**
 * Error for persisted table reads and writes
 */
export class StoreError extends AppError {
  constructor(message: string, public operation: string, public path: string, cause?: Error) {
    super(message, 'STORE_ERROR', cause);
  }
}

/**
 * Error for pages whose shape does not match what the parsers expect
 */
export class StructureError extends AppError {
  constructor(message: string, public section: string) {
    super(message, 'STRUCTURE_ERROR');
  }
}

/**
 * Error for a pipeline phase whose precondition failed
 */
export class PhaseError extends AppError {
  constructor(message: string, public phase: string, cause?: Error) {
    super(message, 'PHASE_ERROR', cause);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

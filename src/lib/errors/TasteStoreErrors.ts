/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Transient errors that may resolve on retry
   */
  TRANSIENT = 'transient',

  /**
   * Permanent errors that won't resolve on retry
   */
  PERMANENT = 'permanent',

  /**
   * Fatal errors: a dependency is missing or misconfigured
   */
  FATAL = 'fatal'
}

/**
 * Base error class for taste store errors
 */
export abstract class TasteStoreError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, code: string, category: ErrorCategory, retryable: boolean = false, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A dependency (embedding model, vector index, credentials) is not usable
 */
export class ServiceUnavailableError extends TasteStoreError {
  public readonly dependency: string;

  constructor(dependency: string, message: string, cause?: Error) {
    super(`${dependency} unavailable: ${message}`, 'SERVICE_UNAVAILABLE', ErrorCategory.FATAL, false, cause);
    this.dependency = dependency;
  }
}

/**
 * Malformed input: missing identifiers, bad feedback keyword, bad servings
 */
export class TasteValidationError extends TasteStoreError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', ErrorCategory.PERMANENT, false);
    this.field = field;
  }
}

/**
 * No record satisfied the lookup. Returned as a value, never thrown.
 */
export class TasteNotFoundError extends TasteStoreError {
  public readonly userId: string;
  public readonly ingredient: string;

  constructor(userId: string, ingredient: string, detail?: string) {
    const message = `No taste preference found for user '${userId}' and ingredient '${ingredient}'${detail ? ` (${detail})` : ''}`;
    super(message, 'NOT_FOUND', ErrorCategory.PERMANENT, false);
    this.userId = userId;
    this.ingredient = ingredient;
  }
}

/**
 * Embedding or index call failed mid-operation
 */
export class TransientExternalError extends TasteStoreError {
  public readonly operation: string;

  constructor(operation: string, message: string, cause?: Error) {
    super(`${operation} failed: ${message}`, 'EXTERNAL_FAILURE', ErrorCategory.TRANSIENT, true, cause);
    this.operation = operation;
  }
}

/**
 * Configuration could not be loaded or is invalid
 */
export class ConfigError extends TasteStoreError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', ErrorCategory.FATAL, false);
  }
}

/**
 * Classify a failed embedding or index call
 *
 * Retryable failures become TransientExternalError; the rest mean the
 * dependency cannot serve requests.
 */
export function dependencyFailure(
  dependency: string,
  operation: string,
  error: Error & { retryable: boolean }
): ServiceUnavailableError | TransientExternalError {
  if (error.retryable) {
    return new TransientExternalError(operation, error.message, error);
  }
  return new ServiceUnavailableError(dependency, error.message, error);
}

/**
 * Errors an operation of the query interface can produce
 */
export type TasteOperationError =
  | ServiceUnavailableError
  | TasteValidationError
  | TasteNotFoundError
  | TransientExternalError;

/**
 * Map an arbitrary error to a user-facing message string
 */
export function describeError(error: unknown): string {
  if (error instanceof TasteStoreError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

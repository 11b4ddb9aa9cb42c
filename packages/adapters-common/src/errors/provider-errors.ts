/**
 * Provider error taxonomy.
 *
 * Every error a resource handler raises on purpose is a ProviderError, so
 * callers can branch on `type` without string matching.
 */

export enum ProviderErrorType {
  NOT_FOUND = "NOT_FOUND",
  OPERATION_TIMEOUT = "OPERATION_TIMEOUT",
  OPERATION_FAILED = "OPERATION_FAILED",
  VALIDATION = "VALIDATION",
  TRANSIENT = "TRANSIENT",
}

/**
 * Structured error for provider operations
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

/**
 * The resource (or operation) does not exist upstream.
 */
export class NotFoundError extends ProviderError {
  constructor(message: string, originalError?: unknown) {
    super(message, ProviderErrorType.NOT_FOUND, originalError);
    this.name = "NotFoundError";
  }
}

/**
 * The wait ceiling elapsed before the operation settled.
 */
export class OperationTimeoutError extends ProviderError {
  constructor(
    message: string,
    public readonly operationId: string,
    public readonly lastStatus?: string
  ) {
    super(message, ProviderErrorType.OPERATION_TIMEOUT);
    this.name = "OperationTimeoutError";
  }
}

/**
 * The vendor reported the operation as failed.
 */
export class OperationFailedError extends ProviderError {
  constructor(
    message: string,
    public readonly operationId: string,
    public readonly errorCode?: string
  ) {
    super(message, ProviderErrorType.OPERATION_FAILED);
    this.name = "OperationFailedError";
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Configuration was rejected before any API call was made.
 */
export class ValidationError extends ProviderError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message, ProviderErrorType.VALIDATION);
    this.name = "ValidationError";
  }
}

/**
 * A retryable API error outlived its retry budget.
 */
export class TransientApiError extends ProviderError {
  constructor(
    message: string,
    public readonly attempts: number,
    originalError?: unknown
  ) {
    super(message, ProviderErrorType.TRANSIENT, originalError);
    this.name = "TransientApiError";
  }
}

/**
 * Best-effort message extraction for values thrown by SDKs and callbacks.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

import {
  NotFoundError,
  OperationFailedError,
  OperationTimeoutError,
  ProviderError,
  TransientApiError,
  ValidationError,
  type OperationSnapshot,
  type ProviderLogCallback,
} from "@skyform/adapters-common";

/**
 * Pick the operation to wait on from a mutating call's response.
 *
 * Lightsail may acknowledge several operations; only the first is awaited.
 */
export function firstOperation(
  operations: OperationSnapshot[],
  action: string,
  log: ProviderLogCallback
): OperationSnapshot {
  const [operation] = operations;
  if (!operation) {
    throw new Error(`No operations found for ${action} request`);
  }
  if (operations.length > 1) {
    log(`${action} returned ${operations.length} operations, waiting on ${operation.id}`, "debug");
  }
  return operation;
}

/**
 * Prefix a provider error with the action and resource it belongs to.
 * The result is the same error class with the same details.
 */
export function withContext(prefix: string, error: ProviderError): ProviderError {
  const message = `${prefix}: ${error.message}`;

  if (error instanceof OperationTimeoutError) {
    return new OperationTimeoutError(message, error.operationId, error.lastStatus);
  }
  if (error instanceof OperationFailedError) {
    return new OperationFailedError(message, error.operationId, error.errorCode);
  }
  if (error instanceof TransientApiError) {
    return new TransientApiError(message, error.attempts, error.originalError);
  }
  if (error instanceof NotFoundError) {
    return new NotFoundError(message, error.originalError);
  }
  if (error instanceof ValidationError) {
    return new ValidationError(message, error.issues);
  }
  return new ProviderError(message, error.type, error);
}

/**
 * Operation Waiter Interface
 *
 * Provides abstraction for waiting on vendor async operations.
 * Enables dependency injection for testing and modularity.
 */

import type { OperationOutcome, OperationSnapshot } from "@skyform/adapters-common";

/**
 * Interface for polling an operation until it settles.
 */
export interface IOperationWaiter {
  /**
   * Wait for an operation to reach a terminal state or the wait ceiling.
   *
   * Resolves with a tagged outcome; only misuse (an unknown operation id) and
   * non-retryable lookup errors reject.
   *
   * @param operationId - Handle returned by a mutating API call
   * @param description - Human-readable label for log lines
   */
  waitForOperation(operationId: string, description?: string): Promise<OperationOutcome>;

  /**
   * Same as waitForOperation, but rejects with the outcome's error unless
   * the operation succeeded.
   */
  waitForOperationOrThrow(operationId: string, description?: string): Promise<OperationSnapshot>;
}

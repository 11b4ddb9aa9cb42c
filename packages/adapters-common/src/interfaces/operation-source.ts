/**
 * Operation Source Interface
 *
 * Provides abstraction over a vendor API's "get operation" call.
 * Implemented by the Lightsail operation status service; the reconciler in
 * @skyform/cloud-providers only ever talks to this interface.
 */

import type { OperationPhase, OperationSnapshot } from "../types/operation";

/**
 * Interface for looking up asynchronous operations by id.
 */
export interface IOperationSource {
  /**
   * Fetch the current state of an operation.
   *
   * @param operationId - Handle returned by a mutating API call
   * @returns The current snapshot, or undefined when the vendor does not know the id
   */
  getOperation(operationId: string): Promise<OperationSnapshot | undefined>;

  /**
   * Map a raw vendor status onto pending / succeeded / failed.
   */
  classifyStatus(status: string): OperationPhase;

  /**
   * Whether a lookup error is worth retrying (throttling, 5xx, resets).
   */
  isTransientError(error: unknown): boolean;

  /**
   * Whether a lookup error means the operation id is unknown.
   */
  isNotFoundError(error: unknown): boolean;
}

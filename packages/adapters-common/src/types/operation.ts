/**
 * Asynchronous operation type definitions.
 *
 * Shared types for vendor-side operations that are acknowledged by a
 * mutating API call and then settle on their own.
 */

import type {
  OperationFailedError,
  OperationTimeoutError,
  TransientApiError,
} from "../errors/provider-errors";

/**
 * Classification of a vendor operation status.
 */
export type OperationPhase = "pending" | "succeeded" | "failed";

/**
 * A single observation of a vendor operation.
 */
export interface OperationSnapshot {
  /** Opaque handle returned at submission time */
  id: string;
  /** Raw vendor status (e.g. "Started", "Succeeded") */
  status: string;
  /** Kind of action that produced the operation (e.g. "CreateInstance") */
  operationType?: string;
  /** Name of the resource the operation acts on */
  resourceName?: string;
  /** Vendor error code, set on failed operations */
  errorCode?: string;
  /** Vendor error details, set on failed operations */
  errorDetails?: string;
}

/**
 * Result of waiting on an operation.
 *
 * Timeout is distinct from failure: a timed-out operation may still
 * complete on the remote side.
 */
export type OperationOutcome =
  | { kind: "succeeded"; operation: OperationSnapshot }
  | {
      kind: "failed";
      operationId: string;
      operation?: OperationSnapshot;
      reason: string;
      error: OperationFailedError | TransientApiError;
    }
  | {
      kind: "timeout";
      operationId: string;
      lastStatus?: string;
      elapsedMs: number;
      error: OperationTimeoutError;
    };

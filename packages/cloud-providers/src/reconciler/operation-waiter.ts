/**
 * Operation Waiter
 *
 * Polls a vendor operation until it succeeds, fails, or the wait ceiling
 * elapses. The vendor side is reached only through IOperationSource, so the
 * same loop serves every action that returns an operation handle.
 */

import {
  NotFoundError,
  OperationFailedError,
  OperationTimeoutError,
  TransientApiError,
  ValidationError,
  errorMessage,
  silentLog,
  type IOperationSource,
  type OperationOutcome,
  type OperationSnapshot,
  type ProviderLogCallback,
} from "@skyform/adapters-common";
import {
  OPERATION_BACKOFF_MULTIPLIER,
  OPERATION_MAX_POLL_INTERVAL_MS,
  OPERATION_MAX_TRANSIENT_RETRIES,
  OPERATION_POLL_INTERVAL_MS,
  OPERATION_TIMEOUT_MS,
} from "../constants/timeouts";
import { sleep } from "../utils/provider-utils";
import type { IOperationWaiter } from "./interfaces/operation-waiter.interface";

export interface OperationWaiterOptions {
  /** Wait ceiling in milliseconds */
  timeoutMs?: number;
  /** Delay before the second poll */
  pollIntervalMs?: number;
  /** Factor applied to the delay after every poll */
  backoffMultiplier?: number;
  /** Upper bound for the delay */
  maxPollIntervalMs?: number;
  /** Consecutive transient lookup errors tolerated */
  maxTransientRetries?: number;
  log?: ProviderLogCallback;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

type Lookup =
  | { kind: "snapshot"; snapshot: OperationSnapshot }
  | { kind: "missing"; error?: unknown }
  | { kind: "transient"; error: unknown };

export class OperationWaiter implements IOperationWaiter {
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly backoffMultiplier: number;
  private readonly maxPollIntervalMs: number;
  private readonly maxTransientRetries: number;
  private readonly log: ProviderLogCallback;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly source: IOperationSource,
    options: OperationWaiterOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? OPERATION_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? OPERATION_POLL_INTERVAL_MS;
    this.backoffMultiplier = options.backoffMultiplier ?? OPERATION_BACKOFF_MULTIPLIER;
    this.maxPollIntervalMs = Math.max(
      options.maxPollIntervalMs ?? OPERATION_MAX_POLL_INTERVAL_MS,
      this.pollIntervalMs
    );
    this.maxTransientRetries = options.maxTransientRetries ?? OPERATION_MAX_TRANSIENT_RETRIES;
    this.log = options.log ?? silentLog;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  async waitForOperation(operationId: string, description = operationId): Promise<OperationOutcome> {
    if (!operationId) {
      throw new ValidationError("Operation id must not be empty");
    }

    const start = this.now();
    let delay = this.pollIntervalMs;
    let seen = false;
    let transientFailures = 0;
    let lastStatus: string | undefined;

    for (;;) {
      const lookup = await this.lookup(operationId);

      if (lookup.kind === "snapshot") {
        seen = true;
        transientFailures = 0;

        const { snapshot } = lookup;
        if (snapshot.status !== lastStatus) {
          const elapsed = Math.round((this.now() - start) / 1000);
          this.log(`  [${description}] ${snapshot.status} - ${elapsed}s elapsed`, "info");
          lastStatus = snapshot.status;
        }

        const phase = this.source.classifyStatus(snapshot.status);
        if (phase === "succeeded") {
          return { kind: "succeeded", operation: snapshot };
        }
        if (phase === "failed") {
          const reason = snapshot.errorDetails || snapshot.errorCode || `operation ${snapshot.status}`;
          this.log(`  [${description}] FAILED: ${reason}`, "error");
          return {
            kind: "failed",
            operationId,
            operation: snapshot,
            reason,
            error: new OperationFailedError(reason, operationId, snapshot.errorCode),
          };
        }
      } else {
        if (lookup.kind === "missing" && !seen) {
          throw new NotFoundError(`Operation (${operationId}) not found`, lookup.error);
        }

        transientFailures++;
        const reason = lookup.error === undefined
          ? "operation missing from response"
          : errorMessage(lookup.error);
        this.log(
          `  [${description}] lookup failed (${transientFailures}/${this.maxTransientRetries}): ${reason}`,
          "warn"
        );

        if (transientFailures > this.maxTransientRetries) {
          const message = `Giving up on operation (${operationId}) after ${transientFailures} failed lookups: ${reason}`;
          return {
            kind: "failed",
            operationId,
            reason: message,
            error: new TransientApiError(message, transientFailures, lookup.error),
          };
        }
      }

      const elapsed = this.now() - start;
      if (elapsed >= this.timeoutMs) {
        const message =
          `Timeout while waiting for operation (${operationId}) to settle ` +
          `(last status: ${lastStatus ?? "unknown"}, timeout: ${this.timeoutMs / 1000}s)`;
        this.log(`  [${description}] TIMEOUT after ${this.timeoutMs / 1000}s`, "error");
        return {
          kind: "timeout",
          operationId,
          lastStatus,
          elapsedMs: elapsed,
          error: new OperationTimeoutError(message, operationId, lastStatus),
        };
      }

      await this.sleep(Math.min(delay, this.timeoutMs - elapsed));
      delay = Math.min(delay * this.backoffMultiplier, this.maxPollIntervalMs);
    }
  }

  async waitForOperationOrThrow(operationId: string, description?: string): Promise<OperationSnapshot> {
    const outcome = await this.waitForOperation(operationId, description);
    if (outcome.kind !== "succeeded") {
      throw outcome.error;
    }
    return outcome.operation;
  }

  private async lookup(operationId: string): Promise<Lookup> {
    try {
      const snapshot = await this.source.getOperation(operationId);
      return snapshot ? { kind: "snapshot", snapshot } : { kind: "missing" };
    } catch (error) {
      if (this.source.isNotFoundError(error)) {
        return { kind: "missing", error };
      }
      if (this.source.isTransientError(error)) {
        return { kind: "transient", error };
      }
      throw error;
    }
  }
}

import {
  NotFoundError,
  OperationFailedError,
  OperationTimeoutError,
  TransientApiError,
  ValidationError,
  type IOperationSource,
  type OperationSnapshot,
} from "@skyform/adapters-common";
import { OperationWaiter, type OperationWaiterOptions } from "./operation-waiter";

type Step = OperationSnapshot | Error | undefined;

const started: OperationSnapshot = { id: "op-1", status: "Started" };
const succeeded: OperationSnapshot = { id: "op-1", status: "Succeeded" };

function namedError(name: string, message = name): Error {
  return Object.assign(new Error(message), { name });
}

/** Replays the given steps; the last one repeats forever. */
function sourceFrom(steps: Step[]) {
  let index = 0;
  const getOperation = jest.fn(async (_operationId: string) => {
    const step = steps[Math.min(index++, steps.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  });

  const source: IOperationSource = {
    getOperation,
    classifyStatus: (status) =>
      status === "Succeeded" || status === "Completed"
        ? "succeeded"
        : status === "Failed"
          ? "failed"
          : "pending",
    isTransientError: (error) => error instanceof Error && error.name === "ThrottlingException",
    isNotFoundError: (error) => error instanceof Error && error.name === "NotFoundException",
  };

  return { source, getOperation };
}

describe("OperationWaiter", () => {
  let clock: number;
  let sleep: jest.Mock;
  let log: jest.Mock;

  const createWaiter = (source: IOperationSource, options: OperationWaiterOptions = {}) =>
    new OperationWaiter(source, {
      pollIntervalMs: 5_000,
      timeoutMs: 600_000,
      log,
      sleep,
      now: () => clock,
      ...options,
    });

  beforeEach(() => {
    clock = 0;
    sleep = jest.fn(async (ms: number) => {
      clock += ms;
    });
    log = jest.fn();
  });

  describe("waitForOperation", () => {
    it("returns succeeded once the operation reaches a success status", async () => {
      const { source, getOperation } = sourceFrom([started, started, succeeded]);

      const outcome = await createWaiter(source).waitForOperation("op-1");

      expect(outcome).toEqual({ kind: "succeeded", operation: succeeded });
      expect(getOperation).toHaveBeenCalledTimes(3);
      expect(getOperation).toHaveBeenCalledWith("op-1");
      expect(sleep.mock.calls).toEqual([[5_000], [5_000]]);
    });

    it("treats Completed as success", async () => {
      const { source } = sourceFrom([{ id: "op-1", status: "Completed" }]);

      const outcome = await createWaiter(source).waitForOperation("op-1");

      expect(outcome.kind).toBe("succeeded");
      expect(sleep).not.toHaveBeenCalled();
    });

    it("returns failed with the vendor reason", async () => {
      const failed: OperationSnapshot = {
        id: "op-1",
        status: "Failed",
        errorCode: "QuotaExceeded",
        errorDetails: "quota exceeded",
      };
      const { source } = sourceFrom([started, failed]);

      const outcome = await createWaiter(source).waitForOperation("op-1");

      expect(outcome.kind).toBe("failed");
      if (outcome.kind !== "failed") return;
      expect(outcome.reason).toBe("quota exceeded");
      expect(outcome.operation).toEqual(failed);
      expect(outcome.error).toBeInstanceOf(OperationFailedError);
      expect(outcome.error.message).toBe("quota exceeded");
      expect(outcome.error).toMatchObject({ operationId: "op-1", errorCode: "QuotaExceeded" });
    });

    it("falls back to the error code, then the status, as the failure reason", async () => {
      const byCode = sourceFrom([{ id: "op-1", status: "Failed", errorCode: "Boom" }]);
      const bare = sourceFrom([{ id: "op-1", status: "Failed" }]);

      const first = await createWaiter(byCode.source).waitForOperation("op-1");
      const second = await createWaiter(bare.source).waitForOperation("op-1");

      expect(first.kind === "failed" && first.reason).toBe("Boom");
      expect(second.kind === "failed" && second.reason).toBe("operation Failed");
    });

    it("times out without classifying the operation as failed", async () => {
      const { source, getOperation } = sourceFrom([started]);

      const outcome = await createWaiter(source, { timeoutMs: 12_000 }).waitForOperation("op-1");

      expect(outcome.kind).toBe("timeout");
      if (outcome.kind !== "timeout") return;
      expect(outcome.elapsedMs).toBe(12_000);
      expect(outcome.lastStatus).toBe("Started");
      expect(outcome.error).toBeInstanceOf(OperationTimeoutError);
      expect(outcome.error).not.toBeInstanceOf(OperationFailedError);
      expect(outcome.error.message).toBe(
        "Timeout while waiting for operation (op-1) to settle (last status: Started, timeout: 12s)"
      );
      expect(getOperation).toHaveBeenCalledTimes(4);
      expect(sleep.mock.calls).toEqual([[5_000], [5_000], [2_000]]);
    });

    it("grows the poll interval up to the configured maximum", async () => {
      const { source } = sourceFrom([started, started, started, started, succeeded]);

      await createWaiter(source, {
        pollIntervalMs: 1_000,
        backoffMultiplier: 2,
        maxPollIntervalMs: 4_000,
      }).waitForOperation("op-1");

      expect(sleep.mock.calls).toEqual([[1_000], [2_000], [4_000], [4_000]]);
    });

    it("throws NotFoundError for an operation that was never seen", async () => {
      const { source, getOperation } = sourceFrom([namedError("NotFoundException")]);

      await expect(createWaiter(source).waitForOperation("op-1")).rejects.toThrow(NotFoundError);
      expect(getOperation).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("throws NotFoundError when the first lookup comes back empty", async () => {
      const { source } = sourceFrom([undefined]);

      await expect(createWaiter(source).waitForOperation("op-1")).rejects.toThrow(
        "Operation (op-1) not found"
      );
    });

    it("retries a not-found after the operation was already observed", async () => {
      const { source, getOperation } = sourceFrom([
        started,
        namedError("NotFoundException"),
        succeeded,
      ]);

      const outcome = await createWaiter(source).waitForOperation("op-1");

      expect(outcome.kind).toBe("succeeded");
      expect(getOperation).toHaveBeenCalledTimes(3);
    });

    it("retries transient lookup errors", async () => {
      const throttled = namedError("ThrottlingException", "Rate exceeded");
      const { source } = sourceFrom([throttled, throttled, succeeded]);

      const outcome = await createWaiter(source).waitForOperation("op-1");

      expect(outcome.kind).toBe("succeeded");
      expect(log).toHaveBeenCalledWith("  [op-1] lookup failed (1/3): Rate exceeded", "warn");
    });

    it("reports failure once transient errors exhaust the retry budget", async () => {
      const throttled = namedError("ThrottlingException", "Rate exceeded");
      const { source, getOperation } = sourceFrom([throttled]);

      const outcome = await createWaiter(source, { maxTransientRetries: 2 }).waitForOperation("op-1");

      expect(outcome.kind).toBe("failed");
      if (outcome.kind !== "failed") return;
      expect(outcome.error).toBeInstanceOf(TransientApiError);
      expect(outcome.error).toMatchObject({ attempts: 3 });
      expect(outcome.reason).toBe(
        "Giving up on operation (op-1) after 3 failed lookups: Rate exceeded"
      );
      expect(getOperation).toHaveBeenCalledTimes(3);
    });

    it("propagates non-retryable lookup errors unchanged", async () => {
      const denied = namedError("AccessDeniedException");
      const { source } = sourceFrom([denied]);

      await expect(createWaiter(source).waitForOperation("op-1")).rejects.toBe(denied);
    });

    it("rejects an empty operation id before polling", async () => {
      const { source, getOperation } = sourceFrom([succeeded]);

      await expect(createWaiter(source).waitForOperation("")).rejects.toThrow(ValidationError);
      expect(getOperation).not.toHaveBeenCalled();
    });

    it("logs each status transition once", async () => {
      const { source } = sourceFrom([started, started, succeeded]);

      await createWaiter(source).waitForOperation("op-1", "create web-1");

      expect(log.mock.calls).toEqual([
        ["  [create web-1] Started - 0s elapsed", "info"],
        ["  [create web-1] Succeeded - 10s elapsed", "info"],
      ]);
    });
  });

  describe("waitForOperationOrThrow", () => {
    it("returns the settled operation", async () => {
      const { source } = sourceFrom([succeeded]);

      await expect(createWaiter(source).waitForOperationOrThrow("op-1")).resolves.toEqual(succeeded);
    });

    it("rejects with the outcome error", async () => {
      const { source } = sourceFrom([started]);

      await expect(
        createWaiter(source, { timeoutMs: 5_000 }).waitForOperationOrThrow("op-1")
      ).rejects.toThrow(OperationTimeoutError);
    });
  });
});

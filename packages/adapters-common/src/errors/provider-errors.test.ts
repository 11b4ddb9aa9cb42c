import {
  NotFoundError,
  OperationFailedError,
  OperationTimeoutError,
  ProviderError,
  ProviderErrorType,
  TransientApiError,
  ValidationError,
  errorMessage,
} from "./provider-errors";

describe("ProviderError", () => {
  it("extends Error", () => {
    const error = new ProviderError("boom", ProviderErrorType.TRANSIENT);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ProviderError");
  });
});

describe("NotFoundError", () => {
  it("extends ProviderError with the NOT_FOUND type", () => {
    const cause = new Error("NotFoundException");
    const error = new NotFoundError("Instance (web) not found", cause);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error.name).toBe("NotFoundError");
    expect(error.type).toBe(ProviderErrorType.NOT_FOUND);
    expect(error.originalError).toBe(cause);
  });
});

describe("OperationTimeoutError", () => {
  it("is not an OperationFailedError", () => {
    const error = new OperationTimeoutError("timed out", "op-1", "Started");

    expect(error).not.toBeInstanceOf(OperationFailedError);
    expect(error.type).toBe(ProviderErrorType.OPERATION_TIMEOUT);
    expect(error.operationId).toBe("op-1");
    expect(error.lastStatus).toBe("Started");
  });
});

describe("OperationFailedError", () => {
  it("stores the vendor error code", () => {
    const error = new OperationFailedError("quota", "op-2", "QuotaExceeded");

    expect(error.type).toBe(ProviderErrorType.OPERATION_FAILED);
    expect(error.errorCode).toBe("QuotaExceeded");
  });
});

describe("ValidationError", () => {
  it("defaults to no issues", () => {
    expect(new ValidationError("bad").issues).toEqual([]);
  });
});

describe("TransientApiError", () => {
  it("records the attempt count", () => {
    const error = new TransientApiError("throttled", 4);

    expect(error.attempts).toBe(4);
    expect(error.type).toBe(ProviderErrorType.TRANSIENT);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies everything else", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage("plain")).toBe("plain");
  });
});

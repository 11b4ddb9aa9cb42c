/**
 * AWS error classification.
 *
 * SDK v3 exceptions are matched by `name` (the service's exception shape) and
 * by `$metadata.httpStatusCode`, so plain errors carrying the same fields are
 * classified the same way.
 */

const NOT_FOUND_NAMES = ["NotFoundException", "ResourceNotFoundException", "NoSuchEntity"];

const TRANSIENT_NAMES = [
  "ThrottlingException",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceException",
  "ServiceUnavailable",
  "InternalError",
  "RequestTimeout",
  "TimeoutError",
];

const TRANSIENT_CODES = ["ECONNRESET", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"];

export class AwsErrorHandler {
  static getErrorName(error: unknown): string {
    if (typeof error === "object" && error !== null && "name" in error) {
      return typeof error.name === "string" ? error.name : "";
    }
    return "";
  }

  static getErrorCode(error: unknown): string {
    if (typeof error === "object" && error !== null && "code" in error) {
      return typeof error.code === "string" ? error.code : "";
    }
    return "";
  }

  static getHttpStatusCode(error: unknown): number | undefined {
    if (typeof error !== "object" || error === null || !("$metadata" in error)) {
      return undefined;
    }
    const metadata = error.$metadata;
    if (typeof metadata === "object" && metadata !== null && "httpStatusCode" in metadata) {
      return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
    }
    return undefined;
  }

  static isResourceNotFound(error: unknown): boolean {
    const name = AwsErrorHandler.getErrorName(error);
    return NOT_FOUND_NAMES.some((candidate) => name.includes(candidate));
  }

  static isTransient(error: unknown): boolean {
    const name = AwsErrorHandler.getErrorName(error);
    if (TRANSIENT_NAMES.includes(name)) return true;

    if (TRANSIENT_CODES.includes(AwsErrorHandler.getErrorCode(error))) return true;

    const status = AwsErrorHandler.getHttpStatusCode(error);
    return status !== undefined && (status === 429 || status >= 500);
  }
}

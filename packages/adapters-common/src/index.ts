// Interfaces
export type { IOperationSource } from "./interfaces/operation-source";
export type { IResourceHandler } from "./interfaces/resource-handler";

// Types
export type { LogLevel, ProviderLogCallback } from "./types/logging";
export { silentLog } from "./types/logging";
export type {
  OperationPhase,
  OperationSnapshot,
  OperationOutcome,
} from "./types/operation";
export type { ReadResult, ChangePlan } from "./types/resource";
export type { TagMap, DefaultTagsConfig, IgnoreTagsConfig } from "./types/tags";

// Errors
export {
  ProviderErrorType,
  ProviderError,
  NotFoundError,
  OperationTimeoutError,
  OperationFailedError,
  ValidationError,
  TransientApiError,
  errorMessage,
} from "./errors/provider-errors";
export type { ValidationIssue } from "./errors/provider-errors";

// Utilities
export {
  AWS_TAG_PREFIX,
  mergeDefaultTags,
  ignoreAwsTags,
  ignoreConfiguredTags,
  removeDefaultTags,
  diffTags,
  tagsEqual,
} from "./utils/tags";
export type { TagDiff } from "./utils/tags";

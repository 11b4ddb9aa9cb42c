/**
 * Provider configuration.
 *
 * Validated with zod; region falls back to the standard AWS environment
 * variables. Credentials are optional, the SDK's default chain applies when
 * they are omitted.
 */

import { z } from "zod";
import {
  DEFAULT_REGION,
} from "../constants/defaults";
import {
  OPERATION_BACKOFF_MULTIPLIER,
  OPERATION_MAX_POLL_INTERVAL_MS,
  OPERATION_MAX_TRANSIENT_RETRIES,
  OPERATION_POLL_INTERVAL_MS,
  OPERATION_TIMEOUT_MS,
} from "../constants/timeouts";
import { toValidationError } from "../utils/provider-utils";

export const CredentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  sessionToken: z.string().min(1).optional(),
});

export const DefaultTagsSchema = z.object({
  tags: z.record(z.string()).default({}),
});

export const IgnoreTagsSchema = z.object({
  keys: z.array(z.string().min(1)).default([]),
  keyPrefixes: z.array(z.string().min(1)).default([]),
});

export const OperationWaitSchema = z.object({
  timeoutMs: z.number().int().positive().default(OPERATION_TIMEOUT_MS),
  pollIntervalMs: z.number().int().positive().default(OPERATION_POLL_INTERVAL_MS),
  backoffMultiplier: z.number().min(1).default(OPERATION_BACKOFF_MULTIPLIER),
  maxPollIntervalMs: z.number().int().positive().default(OPERATION_MAX_POLL_INTERVAL_MS),
  maxTransientRetries: z.number().int().min(0).default(OPERATION_MAX_TRANSIENT_RETRIES),
});

export const ProviderConfigSchema = z.object({
  region: z.string().min(1).optional(),
  credentials: CredentialsSchema.optional(),
  defaultTags: DefaultTagsSchema.optional(),
  ignoreTags: IgnoreTagsSchema.optional(),
  operation: OperationWaitSchema.default({}),
});

export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

export type ProviderConfig = Omit<z.output<typeof ProviderConfigSchema>, "region"> & {
  region: string;
};

/**
 * Validate raw provider settings and fill in defaults.
 *
 * @throws ValidationError when the settings do not match the schema
 */
export function loadProviderConfig(
  input: unknown = {},
  env: NodeJS.ProcessEnv = process.env
): ProviderConfig {
  const result = ProviderConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw toValidationError("provider configuration", result.error);
  }

  return {
    ...result.data,
    region: result.data.region ?? env.AWS_REGION ?? env.AWS_DEFAULT_REGION ?? DEFAULT_REGION,
  };
}

import { z } from "zod";
import type { TagMap } from "@skyform/adapters-common";
import { LIGHTSAIL_DEFAULT_IP_ADDRESS_TYPE } from "../../../constants/defaults";
import { toValidationError } from "../../../utils/provider-utils";

export const INSTANCE_RESOURCE_TYPE = "lightsail_instance";

export const IpAddressTypeSchema = z.enum(["dualstack", "ipv4", "ipv6"]);

export const InstanceNameSchema = z
  .string()
  .min(2)
  .max(255)
  .regex(/^[a-zA-Z]/, "must begin with an alphabetic character")
  .regex(
    /^[a-zA-Z0-9_.-]+$/,
    "must contain only alphanumeric characters, underscores, hyphens, and dots"
  )
  .regex(/[^._-]$/, "must not end with a dot, underscore or hyphen");

export const InstanceConfigSchema = z
  .object({
    name: InstanceNameSchema,
    availability_zone: z.string().min(1),
    blueprint_id: z.string().min(1),
    bundle_id: z.string().min(1),
    key_pair_name: z.string().optional(),
    /** Write-only: passed to CreateInstances, never read back */
    user_data: z.string().optional(),
    ip_address_type: IpAddressTypeSchema.default(LIGHTSAIL_DEFAULT_IP_ADDRESS_TYPE),
    tags: z.record(z.string()).default({}),
  })
  .strict();

export type InstanceConfigInput = z.input<typeof InstanceConfigSchema>;
export type InstanceConfig = z.output<typeof InstanceConfigSchema>;

/**
 * Observed state of a Lightsail instance.
 */
export interface InstanceAttributes {
  name: string;
  availability_zone?: string;
  blueprint_id?: string;
  bundle_id?: string;
  key_pair_name?: string;
  arn?: string;
  /** RFC 3339 */
  created_at?: string;
  cpu_count?: number;
  ram_size?: number;
  /** @deprecated use ipv6_addresses */
  ipv6_address?: string;
  ipv6_addresses: string[];
  ip_address_type?: string;
  is_static_ip: boolean;
  private_ip_address?: string;
  public_ip_address?: string;
  username?: string;
  /** Configured tags, provider defaults removed */
  tags: TagMap;
  /** Every tag on the instance, defaults included */
  tags_all: TagMap;
}

/**
 * @throws ValidationError
 */
export function parseInstanceConfig(input: unknown): InstanceConfig {
  const result = InstanceConfigSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError("Lightsail instance configuration", result.error);
  }
  return result.data;
}

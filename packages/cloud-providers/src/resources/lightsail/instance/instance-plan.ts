/**
 * Change planning for Lightsail instances.
 *
 * Everything except the IP address type and tags forces a replacement.
 */

import { tagsEqual, type ChangePlan } from "@skyform/adapters-common";
import { LIGHTSAIL_DEFAULT_KEY_PAIR } from "../../../constants/defaults";
import type { InstanceAttributes, InstanceConfig } from "./instance-schema";

const REPLACE_KEYS = [
  "name",
  "availability_zone",
  "blueprint_id",
  "bundle_id",
  "key_pair_name",
  "user_data",
] as const;

type ReplaceKey = (typeof REPLACE_KEYS)[number];

function keyPairChanged(prior: string | undefined, desired: string | undefined): boolean {
  // Lightsail reports its default key pair when none was requested
  if (prior === LIGHTSAIL_DEFAULT_KEY_PAIR && !desired) return false;
  return (prior ?? "") !== (desired ?? "");
}

function valueChanged(key: ReplaceKey, prior: InstanceConfig, desired: InstanceConfig): boolean {
  if (key === "key_pair_name") {
    return keyPairChanged(prior.key_pair_name, desired.key_pair_name);
  }
  return (prior[key] ?? "") !== (desired[key] ?? "");
}

export function planInstanceChange(prior: InstanceConfig, desired: InstanceConfig): ChangePlan {
  const replaced = REPLACE_KEYS.filter((key) => valueChanged(key, prior, desired));
  const updated: string[] = [];

  if (prior.ip_address_type !== desired.ip_address_type) updated.push("ip_address_type");
  if (!tagsEqual(prior.tags, desired.tags)) updated.push("tags");

  const changed = [...replaced, ...updated];
  if (replaced.length > 0) return { action: "replace", changed };
  if (updated.length > 0) return { action: "update", changed };
  return { action: "noop", changed };
}

/**
 * Overlay observed attributes on the last applied configuration, giving the
 * prior side of the next plan. `user_data` cannot be read and is carried over.
 */
export function refreshInstanceConfig(
  config: InstanceConfig,
  attributes: InstanceAttributes
): InstanceConfig {
  return {
    ...config,
    name: attributes.name || config.name,
    availability_zone: attributes.availability_zone ?? config.availability_zone,
    blueprint_id: attributes.blueprint_id ?? config.blueprint_id,
    bundle_id: attributes.bundle_id ?? config.bundle_id,
    key_pair_name: attributes.key_pair_name ?? config.key_pair_name,
    ip_address_type: observedIpAddressType(attributes.ip_address_type) ?? config.ip_address_type,
    tags: { ...attributes.tags },
  };
}

function observedIpAddressType(value: string | undefined): InstanceConfig["ip_address_type"] | undefined {
  switch (value) {
    case "dualstack":
    case "ipv4":
    case "ipv6":
      return value;
    default:
      return undefined;
  }
}

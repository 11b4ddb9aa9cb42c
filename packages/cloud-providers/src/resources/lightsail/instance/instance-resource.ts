/**
 * Lightsail Instance resource handler.
 *
 * Create and delete wait on the operation Lightsail returns before reading
 * the instance back. A failed wait after create is only logged, since the
 * instance was provisioned; a failed wait after delete fails the delete.
 */

import {
  diffTags,
  errorMessage,
  ignoreAwsTags,
  ignoreConfiguredTags,
  mergeDefaultTags,
  removeDefaultTags,
  tagsEqual,
  type IResourceHandler,
  type ReadResult,
  type TagMap,
} from "@skyform/adapters-common";
import type { ProviderMeta } from "../../../provider/provider-meta";
import { firstOperation, withContext } from "../operation-helpers";
import {
  INSTANCE_RESOURCE_TYPE,
  parseInstanceConfig,
  type InstanceAttributes,
  type InstanceConfigInput,
} from "./instance-schema";
import type { LightsailInstanceInfo } from "../lightsail-services.interface";

export class LightsailInstanceResource
  implements IResourceHandler<InstanceConfigInput, InstanceAttributes, ProviderMeta>
{
  readonly typeName = INSTANCE_RESOURCE_TYPE;

  async create(
    input: InstanceConfigInput,
    meta: ProviderMeta
  ): Promise<ReadResult<InstanceAttributes>> {
    const config = parseInstanceConfig(input);
    const tags = ignoreAwsTags(mergeDefaultTags(meta.defaultTags, config.tags));

    const operations = await meta.lightsail.createInstance({
      name: config.name,
      availabilityZone: config.availability_zone,
      blueprintId: config.blueprint_id,
      bundleId: config.bundle_id,
      keyPairName: config.key_pair_name || undefined,
      userData: config.user_data || undefined,
      ipAddressType: config.ip_address_type,
      tags,
    });

    const operation = firstOperation(operations, "CreateInstance", meta.log);
    const id = config.name;

    // CreateInstances has already provisioned the instance; wait errors are only logged
    try {
      const outcome = await meta.waiter.waitForOperation(operation.id, `create instance ${id}`);
      if (outcome.kind !== "succeeded") {
        meta.log(
          `Error waiting for instance (${id}) to become ready: ${outcome.error.message}`,
          "error"
        );
      }
    } catch (error) {
      meta.log(`Error waiting for instance (${id}) to become ready: ${errorMessage(error)}`, "error");
    }

    return this.read(id, meta);
  }

  async read(id: string, meta: ProviderMeta): Promise<ReadResult<InstanceAttributes>> {
    const instance = await meta.lightsail.getInstance(id);

    if (!instance) {
      meta.log(`Lightsail Instance (${id}) not found, removing from state`, "warn");
      return { found: false, id };
    }

    return { found: true, id, attributes: this.toAttributes(instance, meta) };
  }

  async update(
    id: string,
    priorInput: InstanceConfigInput,
    desiredInput: InstanceConfigInput,
    meta: ProviderMeta
  ): Promise<ReadResult<InstanceAttributes>> {
    const prior = parseInstanceConfig(priorInput);
    const desired = parseInstanceConfig(desiredInput);

    if (prior.ip_address_type !== desired.ip_address_type) {
      const operations = await meta.lightsail.setIpAddressType(id, desired.ip_address_type);
      const operation = firstOperation(operations, "SetIpAddressType", meta.log);
      await meta.waiter.waitForOperationOrThrow(operation.id, `set ip address type ${id}`);
    }

    const priorTags = mergeDefaultTags(meta.defaultTags, prior.tags);
    const desiredTags = mergeDefaultTags(meta.defaultTags, desired.tags);
    if (!tagsEqual(priorTags, desiredTags)) {
      try {
        await this.updateTags(id, priorTags, desiredTags, meta);
      } catch (error) {
        throw new Error(
          `Error updating Lightsail Instance (${id}) tags: ${errorMessage(error)}`
        );
      }
    }

    return this.read(id, meta);
  }

  async delete(id: string, meta: ProviderMeta): Promise<void> {
    const operations = await meta.lightsail.deleteInstance(id);
    const operation = firstOperation(operations, "DeleteInstance", meta.log);

    const outcome = await meta.waiter.waitForOperation(operation.id, `delete instance ${id}`);
    if (outcome.kind !== "succeeded") {
      throw withContext(`Error waiting for instance (${id}) to become destroyed`, outcome.error);
    }
  }

  importState(id: string, meta: ProviderMeta): Promise<ReadResult<InstanceAttributes>> {
    return this.read(id, meta);
  }

  private async updateTags(
    id: string,
    previous: TagMap,
    next: TagMap,
    meta: ProviderMeta
  ): Promise<void> {
    const { upserts, removedKeys } = diffTags(previous, next);

    if (removedKeys.length > 0) {
      meta.log(`Removing tags from Lightsail Instance (${id}): ${removedKeys.join(", ")}`, "debug");
      await meta.lightsail.untagResource(id, removedKeys);
    }

    if (Object.keys(upserts).length > 0) {
      meta.log(`Tagging Lightsail Instance (${id}): ${Object.keys(upserts).join(", ")}`, "debug");
      await meta.lightsail.tagResource(id, upserts);
    }
  }

  private toAttributes(instance: LightsailInstanceInfo, meta: ProviderMeta): InstanceAttributes {
    const tagsAll = ignoreConfiguredTags(ignoreAwsTags(instance.tags), meta.ignoreTags);

    return {
      name: instance.name,
      availability_zone: instance.availabilityZone,
      blueprint_id: instance.blueprintId,
      bundle_id: instance.bundleId,
      key_pair_name: instance.sshKeyName,
      arn: instance.arn,
      created_at: instance.createdAt ? toRfc3339(instance.createdAt) : undefined,
      cpu_count: instance.cpuCount,
      ram_size: instance.ramSizeInGb,
      ipv6_address: instance.ipv6Addresses[0],
      ipv6_addresses: [...instance.ipv6Addresses],
      ip_address_type: instance.ipAddressType,
      is_static_ip: instance.isStaticIp,
      private_ip_address: instance.privateIpAddress,
      public_ip_address: instance.publicIpAddress,
      username: instance.username,
      tags: removeDefaultTags(tagsAll, meta.defaultTags),
      tags_all: tagsAll,
    };
  }
}

/** RFC 3339 at second precision, e.g. 2024-03-01T10:00:00Z */
function toRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

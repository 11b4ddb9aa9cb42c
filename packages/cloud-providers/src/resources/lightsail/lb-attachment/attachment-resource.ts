/**
 * Lightsail Load Balancer Attachment resource handler.
 *
 * An attachment has no vendor-side identity of its own: it exists while the
 * instance is listed in the load balancer's instance health summary.
 */

import {
  NotFoundError,
  type IResourceHandler,
  type ReadResult,
} from "@skyform/adapters-common";
import type { ProviderMeta } from "../../../provider/provider-meta";
import type { ILightsailServices } from "../lightsail-services.interface";
import { firstOperation, withContext } from "../operation-helpers";
import {
  ATTACHMENT_RESOURCE_TYPE,
  formatAttachmentId,
  parseAttachmentConfig,
  parseAttachmentId,
  type AttachmentAttributes,
  type AttachmentConfigInput,
} from "./attachment-schema";

/**
 * Look up an attachment by id.
 *
 * @returns The attached instance name
 * @throws NotFoundError when the load balancer is gone or the instance is not attached
 */
export async function findLoadBalancerAttachmentById(
  lightsail: ILightsailServices,
  id: string
): Promise<string> {
  const { lb_name, instance_name } = parseAttachmentId(id);

  const loadBalancer = await lightsail.getLoadBalancer(lb_name);
  if (!loadBalancer) {
    throw new NotFoundError(`Lightsail Load Balancer (${lb_name}) not found`);
  }

  if (!loadBalancer.instanceNames.includes(instance_name)) {
    throw new NotFoundError(
      `Lightsail Instance (${instance_name}) not attached to Load Balancer (${lb_name})`
    );
  }

  return instance_name;
}

export class LightsailLoadBalancerAttachmentResource
  implements IResourceHandler<AttachmentConfigInput, AttachmentAttributes, ProviderMeta>
{
  readonly typeName = ATTACHMENT_RESOURCE_TYPE;

  async create(
    input: AttachmentConfigInput,
    meta: ProviderMeta
  ): Promise<ReadResult<AttachmentAttributes>> {
    const config = parseAttachmentConfig(input);
    const id = formatAttachmentId(config.lb_name, config.instance_name);

    const operations = await meta.lightsail.attachInstances(config.lb_name, [config.instance_name]);
    const operation = firstOperation(operations, "AttachInstancesToLoadBalancer", meta.log);

    const outcome = await meta.waiter.waitForOperation(operation.id, `attach ${id}`);
    if (outcome.kind !== "succeeded") {
      throw withContext(
        `Error waiting for Load Balancer Attachment (${id}) to be created`,
        outcome.error
      );
    }

    return this.read(id, meta);
  }

  async read(id: string, meta: ProviderMeta): Promise<ReadResult<AttachmentAttributes>> {
    try {
      const instanceName = await findLoadBalancerAttachmentById(meta.lightsail, id);
      const { lb_name } = parseAttachmentId(id);

      return { found: true, id, attributes: { lb_name, instance_name: instanceName } };
    } catch (error) {
      if (error instanceof NotFoundError) {
        meta.log(`Lightsail Load Balancer Attachment (${id}) not found, removing from state`, "warn");
        return { found: false, id };
      }
      throw error;
    }
  }

  async delete(id: string, meta: ProviderMeta): Promise<void> {
    const { lb_name, instance_name } = parseAttachmentId(id);

    const operations = await meta.lightsail.detachInstances(lb_name, [instance_name]);
    const operation = firstOperation(operations, "DetachInstancesFromLoadBalancer", meta.log);

    const outcome = await meta.waiter.waitForOperation(operation.id, `detach ${id}`);
    if (outcome.kind !== "succeeded") {
      throw withContext(
        `Error waiting for Load Balancer Attachment (${id}) to be deleted`,
        outcome.error
      );
    }
  }

  importState(id: string, meta: ProviderMeta): Promise<ReadResult<AttachmentAttributes>> {
    return this.read(id, meta);
  }
}

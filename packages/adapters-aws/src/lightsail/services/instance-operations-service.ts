/**
 * Instance Operations Service
 *
 * Handles Lightsail instance CRUD calls.
 * Mutating calls return the operations Lightsail acknowledged; waiting on
 * them is the caller's job.
 */

import {
  LightsailClient,
  CreateInstancesCommand,
  GetInstanceCommand,
  DeleteInstanceCommand,
  SetIpAddressTypeCommand,
} from "@aws-sdk/client-lightsail";
import { NotFoundError, type OperationSnapshot } from "@skyform/adapters-common";
import { AwsErrorHandler } from "../../errors";
import {
  mapInstanceToInfo,
  toLightsailTags,
  toOperationSnapshots,
  type CreateInstanceParams,
  type LightsailInstanceInfo,
  type LightsailIpAddressType,
} from "../types";

export class InstanceOperationsService {
  constructor(private readonly client: LightsailClient) {}

  /**
   * Create a single instance.
   */
  async createInstance(params: CreateInstanceParams): Promise<OperationSnapshot[]> {
    const tags = params.tags && Object.keys(params.tags).length > 0
      ? toLightsailTags(params.tags)
      : undefined;

    const result = await this.client.send(
      new CreateInstancesCommand({
        instanceNames: [params.name],
        availabilityZone: params.availabilityZone,
        blueprintId: params.blueprintId,
        bundleId: params.bundleId,
        keyPairName: params.keyPairName,
        userData: params.userData,
        ipAddressType: params.ipAddressType,
        tags,
      })
    );

    return toOperationSnapshots(result.operations);
  }

  /**
   * Describe an instance.
   * Returns undefined if the instance does not exist.
   */
  async getInstance(name: string): Promise<LightsailInstanceInfo | undefined> {
    try {
      const result = await this.client.send(
        new GetInstanceCommand({ instanceName: name })
      );

      return result.instance ? mapInstanceToInfo(result.instance) : undefined;
    } catch (error) {
      if (AwsErrorHandler.isResourceNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Delete an instance.
   * Throws NotFoundError if the instance does not exist.
   */
  async deleteInstance(name: string): Promise<OperationSnapshot[]> {
    try {
      const result = await this.client.send(
        new DeleteInstanceCommand({ instanceName: name })
      );

      return toOperationSnapshots(result.operations);
    } catch (error) {
      if (AwsErrorHandler.isResourceNotFound(error)) {
        throw new NotFoundError(`Lightsail Instance (${name}) not found`, error);
      }
      throw error;
    }
  }

  /**
   * Switch an instance between dual-stack and single-stack addressing.
   */
  async setIpAddressType(
    name: string,
    ipAddressType: LightsailIpAddressType
  ): Promise<OperationSnapshot[]> {
    const result = await this.client.send(
      new SetIpAddressTypeCommand({
        resourceType: "Instance",
        resourceName: name,
        ipAddressType,
      })
    );

    return toOperationSnapshots(result.operations);
  }
}

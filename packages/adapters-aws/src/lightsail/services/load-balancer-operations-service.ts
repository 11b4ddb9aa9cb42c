/**
 * Load Balancer Operations Service
 *
 * Handles registering instances with Lightsail load balancers.
 */

import {
  LightsailClient,
  AttachInstancesToLoadBalancerCommand,
  DetachInstancesFromLoadBalancerCommand,
  GetLoadBalancerCommand,
} from "@aws-sdk/client-lightsail";
import { NotFoundError, type OperationSnapshot } from "@skyform/adapters-common";
import { AwsErrorHandler } from "../../errors";
import {
  mapLoadBalancerToInfo,
  toOperationSnapshots,
  type LightsailLoadBalancerInfo,
} from "../types";

export class LoadBalancerOperationsService {
  constructor(private readonly client: LightsailClient) {}

  /**
   * Describe a load balancer.
   * Returns undefined if the load balancer does not exist.
   */
  async getLoadBalancer(name: string): Promise<LightsailLoadBalancerInfo | undefined> {
    try {
      const result = await this.client.send(
        new GetLoadBalancerCommand({ loadBalancerName: name })
      );

      return result.loadBalancer ? mapLoadBalancerToInfo(result.loadBalancer) : undefined;
    } catch (error) {
      if (AwsErrorHandler.isResourceNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async attachInstances(
    loadBalancerName: string,
    instanceNames: string[]
  ): Promise<OperationSnapshot[]> {
    const result = await this.client.send(
      new AttachInstancesToLoadBalancerCommand({ loadBalancerName, instanceNames })
    );

    return toOperationSnapshots(result.operations);
  }

  /**
   * Throws NotFoundError if the load balancer does not exist.
   */
  async detachInstances(
    loadBalancerName: string,
    instanceNames: string[]
  ): Promise<OperationSnapshot[]> {
    try {
      const result = await this.client.send(
        new DetachInstancesFromLoadBalancerCommand({ loadBalancerName, instanceNames })
      );

      return toOperationSnapshots(result.operations);
    } catch (error) {
      if (AwsErrorHandler.isResourceNotFound(error)) {
        throw new NotFoundError(
          `Lightsail Load Balancer (${loadBalancerName}) not found`,
          error
        );
      }
      throw error;
    }
  }
}

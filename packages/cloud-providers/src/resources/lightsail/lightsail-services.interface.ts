/**
 * Lightsail service interface for the resource handlers.
 *
 * Matches the LightsailService API from @skyform/adapters-aws, enabling
 * an in-process fake in tests.
 */

import type {
  CreateInstanceParams,
  LightsailInstanceInfo,
  LightsailIpAddressType,
  LightsailLoadBalancerInfo,
} from "@skyform/adapters-aws";
import type {
  IOperationSource,
  OperationSnapshot,
  TagMap,
} from "@skyform/adapters-common";

// Re-export types needed by consumers
export type {
  CreateInstanceParams,
  LightsailInstanceInfo,
  LightsailIpAddressType,
  LightsailLoadBalancerInfo,
};

export interface ILightsailServices {
  /** Operation lookups for the reconciler */
  readonly operations: IOperationSource;

  /**
   * Create one instance. Returns the acknowledged operations.
   */
  createInstance(params: CreateInstanceParams): Promise<OperationSnapshot[]>;

  /**
   * Describe an instance. Returns undefined if it does not exist.
   */
  getInstance(name: string): Promise<LightsailInstanceInfo | undefined>;

  /**
   * Delete an instance. Throws NotFoundError if it does not exist.
   */
  deleteInstance(name: string): Promise<OperationSnapshot[]>;

  setIpAddressType(
    name: string,
    ipAddressType: LightsailIpAddressType
  ): Promise<OperationSnapshot[]>;

  /**
   * Describe a load balancer. Returns undefined if it does not exist.
   */
  getLoadBalancer(name: string): Promise<LightsailLoadBalancerInfo | undefined>;

  attachInstances(loadBalancerName: string, instanceNames: string[]): Promise<OperationSnapshot[]>;

  /**
   * Throws NotFoundError if the load balancer does not exist.
   */
  detachInstances(loadBalancerName: string, instanceNames: string[]): Promise<OperationSnapshot[]>;

  tagResource(resourceName: string, tags: TagMap): Promise<OperationSnapshot[]>;

  untagResource(resourceName: string, tagKeys: string[]): Promise<OperationSnapshot[]>;
}

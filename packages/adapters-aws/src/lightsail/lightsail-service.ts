/**
 * Lightsail Service
 *
 * Facade over the Lightsail sub-services, sharing one LightsailClient.
 * The client is only ever used for requests, so one instance can serve every
 * resource handler call.
 */

import { LightsailClient } from "@aws-sdk/client-lightsail";
import type {
  IOperationSource,
  OperationSnapshot,
  TagMap,
} from "@skyform/adapters-common";
import { InstanceOperationsService } from "./services/instance-operations-service";
import { LoadBalancerOperationsService } from "./services/load-balancer-operations-service";
import { OperationStatusService } from "./services/operation-status-service";
import { TaggingService } from "./services/tagging-service";
import type {
  CreateInstanceParams,
  LightsailCredentials,
  LightsailInstanceInfo,
  LightsailIpAddressType,
  LightsailLoadBalancerInfo,
} from "./types";

export interface LightsailServiceOptions {
  region?: string;
  credentials?: LightsailCredentials;
  /** Pre-built client; region and credentials are ignored when set */
  client?: LightsailClient;
}

export class LightsailService {
  readonly operations: IOperationSource;
  private readonly instances: InstanceOperationsService;
  private readonly loadBalancers: LoadBalancerOperationsService;
  private readonly tagging: TaggingService;

  constructor(options: LightsailServiceOptions = {}) {
    const client =
      options.client ??
      new LightsailClient({
        region: options.region ?? "us-east-1",
        credentials: options.credentials
          ? {
              accessKeyId: options.credentials.accessKeyId,
              secretAccessKey: options.credentials.secretAccessKey,
              sessionToken: options.credentials.sessionToken,
            }
          : undefined,
      });

    this.instances = new InstanceOperationsService(client);
    this.loadBalancers = new LoadBalancerOperationsService(client);
    this.operations = new OperationStatusService(client);
    this.tagging = new TaggingService(client);
  }

  // ── Instances ────────────────────────────────────────────────────────

  createInstance(params: CreateInstanceParams): Promise<OperationSnapshot[]> {
    return this.instances.createInstance(params);
  }

  getInstance(name: string): Promise<LightsailInstanceInfo | undefined> {
    return this.instances.getInstance(name);
  }

  deleteInstance(name: string): Promise<OperationSnapshot[]> {
    return this.instances.deleteInstance(name);
  }

  setIpAddressType(
    name: string,
    ipAddressType: LightsailIpAddressType
  ): Promise<OperationSnapshot[]> {
    return this.instances.setIpAddressType(name, ipAddressType);
  }

  // ── Load balancers ───────────────────────────────────────────────────

  getLoadBalancer(name: string): Promise<LightsailLoadBalancerInfo | undefined> {
    return this.loadBalancers.getLoadBalancer(name);
  }

  attachInstances(
    loadBalancerName: string,
    instanceNames: string[]
  ): Promise<OperationSnapshot[]> {
    return this.loadBalancers.attachInstances(loadBalancerName, instanceNames);
  }

  detachInstances(
    loadBalancerName: string,
    instanceNames: string[]
  ): Promise<OperationSnapshot[]> {
    return this.loadBalancers.detachInstances(loadBalancerName, instanceNames);
  }

  // ── Tags ─────────────────────────────────────────────────────────────

  tagResource(resourceName: string, tags: TagMap): Promise<OperationSnapshot[]> {
    return this.tagging.tagResource(resourceName, tags);
  }

  untagResource(resourceName: string, tagKeys: string[]): Promise<OperationSnapshot[]> {
    return this.tagging.untagResource(resourceName, tagKeys);
  }
}

export function createLightsailService(options: LightsailServiceOptions = {}): LightsailService {
  return new LightsailService(options);
}

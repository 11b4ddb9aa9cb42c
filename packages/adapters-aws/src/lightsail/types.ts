import type {
  Instance,
  LoadBalancer,
  Operation,
  Tag,
} from "@aws-sdk/client-lightsail";
import type { OperationSnapshot, TagMap } from "@skyform/adapters-common";

export interface LightsailCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export type LightsailIpAddressType = "dualstack" | "ipv4" | "ipv6";

export interface CreateInstanceParams {
  name: string;
  availabilityZone: string;
  blueprintId: string;
  bundleId: string;
  keyPairName?: string;
  userData?: string;
  ipAddressType?: LightsailIpAddressType;
  tags?: TagMap;
}

export interface LightsailInstanceInfo {
  name: string;
  arn?: string;
  createdAt?: Date;
  availabilityZone?: string;
  regionName?: string;
  blueprintId?: string;
  bundleId?: string;
  sshKeyName?: string;
  username?: string;
  cpuCount?: number;
  ramSizeInGb?: number;
  ipv6Addresses: string[];
  ipAddressType?: string;
  isStaticIp: boolean;
  privateIpAddress?: string;
  publicIpAddress?: string;
  state?: string;
  tags: TagMap;
}

export interface LightsailLoadBalancerInfo {
  name: string;
  arn?: string;
  state?: string;
  /** Instances registered with the load balancer */
  instanceNames: string[];
  tags: TagMap;
}

export function toTagMap(tags: Tag[] | undefined): TagMap {
  const map: TagMap = {};
  for (const tag of tags ?? []) {
    if (tag.key) map[tag.key] = tag.value ?? "";
  }
  return map;
}

export function toLightsailTags(tags: TagMap): Tag[] {
  return Object.entries(tags).map(([key, value]) => ({ key, value }));
}

export function toOperationSnapshot(operation: Operation): OperationSnapshot | undefined {
  if (!operation.id) return undefined;

  return {
    id: operation.id,
    status: operation.status ?? "NotStarted",
    operationType: operation.operationType,
    resourceName: operation.resourceName,
    errorCode: operation.errorCode,
    errorDetails: operation.errorDetails,
  };
}

export function toOperationSnapshots(operations: Operation[] | undefined): OperationSnapshot[] {
  const snapshots: OperationSnapshot[] = [];
  for (const operation of operations ?? []) {
    const snapshot = toOperationSnapshot(operation);
    if (snapshot) snapshots.push(snapshot);
  }
  return snapshots;
}

export function mapInstanceToInfo(instance: Instance): LightsailInstanceInfo {
  return {
    name: instance.name ?? "",
    arn: instance.arn,
    createdAt: instance.createdAt,
    availabilityZone: instance.location?.availabilityZone,
    regionName: instance.location?.regionName,
    blueprintId: instance.blueprintId,
    bundleId: instance.bundleId,
    sshKeyName: instance.sshKeyName,
    username: instance.username,
    cpuCount: instance.hardware?.cpuCount,
    ramSizeInGb: instance.hardware?.ramSizeInGb,
    ipv6Addresses: instance.ipv6Addresses ?? [],
    ipAddressType: instance.ipAddressType,
    isStaticIp: instance.isStaticIp ?? false,
    privateIpAddress: instance.privateIpAddress,
    publicIpAddress: instance.publicIpAddress,
    state: instance.state?.name,
    tags: toTagMap(instance.tags),
  };
}

export function mapLoadBalancerToInfo(loadBalancer: LoadBalancer): LightsailLoadBalancerInfo {
  const instanceNames: string[] = [];
  for (const summary of loadBalancer.instanceHealthSummary ?? []) {
    if (summary.instanceName) instanceNames.push(summary.instanceName);
  }

  return {
    name: loadBalancer.name ?? "",
    arn: loadBalancer.arn,
    state: loadBalancer.state,
    instanceNames,
    tags: toTagMap(loadBalancer.tags),
  };
}

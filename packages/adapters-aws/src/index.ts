// Lightsail
export {
  LightsailService,
  createLightsailService,
} from "./lightsail/lightsail-service";
export type { LightsailServiceOptions } from "./lightsail/lightsail-service";
export { InstanceOperationsService } from "./lightsail/services/instance-operations-service";
export { LoadBalancerOperationsService } from "./lightsail/services/load-balancer-operations-service";
export { OperationStatusService } from "./lightsail/services/operation-status-service";
export { TaggingService } from "./lightsail/services/tagging-service";
export type {
  CreateInstanceParams,
  LightsailCredentials,
  LightsailInstanceInfo,
  LightsailIpAddressType,
  LightsailLoadBalancerInfo,
} from "./lightsail/types";

// Errors
export { AwsErrorHandler } from "./errors";

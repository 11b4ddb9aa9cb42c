// Configuration
export {
  CredentialsSchema,
  DefaultTagsSchema,
  IgnoreTagsSchema,
  OperationWaitSchema,
  ProviderConfigSchema,
  loadProviderConfig,
} from "./config/provider-config";
export type { ProviderConfig, ProviderConfigInput } from "./config/provider-config";

// Provider meta
export { createProviderMeta } from "./provider/provider-meta";
export type { ProviderMeta, ProviderMetaOptions } from "./provider/provider-meta";

// Reconciler
export { OperationWaiter } from "./reconciler/operation-waiter";
export type { OperationWaiterOptions } from "./reconciler/operation-waiter";
export type { IOperationWaiter } from "./reconciler/interfaces/operation-waiter.interface";

// Lightsail resources
export type { ILightsailServices } from "./resources/lightsail/lightsail-services.interface";
export { firstOperation, withContext } from "./resources/lightsail/operation-helpers";
export { LightsailInstanceResource } from "./resources/lightsail/instance/instance-resource";
export {
  INSTANCE_RESOURCE_TYPE,
  InstanceConfigSchema,
  InstanceNameSchema,
  IpAddressTypeSchema,
  parseInstanceConfig,
} from "./resources/lightsail/instance/instance-schema";
export type {
  InstanceAttributes,
  InstanceConfig,
  InstanceConfigInput,
} from "./resources/lightsail/instance/instance-schema";
export { planInstanceChange, refreshInstanceConfig } from "./resources/lightsail/instance/instance-plan";
export {
  LightsailLoadBalancerAttachmentResource,
  findLoadBalancerAttachmentById,
} from "./resources/lightsail/lb-attachment/attachment-resource";
export {
  ATTACHMENT_RESOURCE_TYPE,
  AttachmentConfigSchema,
  formatAttachmentId,
  parseAttachmentConfig,
  parseAttachmentId,
} from "./resources/lightsail/lb-attachment/attachment-schema";
export type {
  AttachmentAttributes,
  AttachmentConfig,
  AttachmentConfigInput,
} from "./resources/lightsail/lb-attachment/attachment-schema";

// Constants and utilities
export * from "./constants";
export { sleep, toValidationError } from "./utils/provider-utils";

/**
 * Default values for cloud provider configurations.
 */

// Provider defaults
export const DEFAULT_REGION = "us-east-1";

// Lightsail defaults
export const LIGHTSAIL_DEFAULT_IP_ADDRESS_TYPE = "dualstack";
export const LIGHTSAIL_DEFAULT_KEY_PAIR = "LightsailDefaultKeyPair";
export const LIGHTSAIL_ATTACHMENT_ID_SEPARATOR = ",";

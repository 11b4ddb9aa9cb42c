/**
 * Constants Module
 *
 * Re-exports all constants for cloud provider operations including
 * timeouts and default values.
 */

export * from "./timeouts";
export * from "./defaults";

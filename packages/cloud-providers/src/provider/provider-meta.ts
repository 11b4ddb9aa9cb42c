/**
 * Provider meta: the capability handed to every resource handler call.
 */

import { createLightsailService } from "@skyform/adapters-aws";
import {
  silentLog,
  type DefaultTagsConfig,
  type IgnoreTagsConfig,
  type ProviderLogCallback,
} from "@skyform/adapters-common";
import type { ProviderConfig } from "../config/provider-config";
import { OperationWaiter } from "../reconciler/operation-waiter";
import type { IOperationWaiter } from "../reconciler/interfaces/operation-waiter.interface";
import type { ILightsailServices } from "../resources/lightsail/lightsail-services.interface";

export interface ProviderMeta {
  region: string;
  lightsail: ILightsailServices;
  waiter: IOperationWaiter;
  defaultTags?: DefaultTagsConfig;
  ignoreTags?: IgnoreTagsConfig;
  log: ProviderLogCallback;
}

export interface ProviderMetaOptions {
  log?: ProviderLogCallback;
  /** Replaces the SDK-backed Lightsail service */
  lightsail?: ILightsailServices;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function createProviderMeta(
  config: ProviderConfig,
  options: ProviderMetaOptions = {}
): ProviderMeta {
  const log = options.log ?? silentLog;
  const lightsail =
    options.lightsail ??
    createLightsailService({ region: config.region, credentials: config.credentials });

  const waiter = new OperationWaiter(lightsail.operations, {
    ...config.operation,
    log,
    sleep: options.sleep,
    now: options.now,
  });

  return {
    region: config.region,
    lightsail,
    waiter,
    defaultTags: config.defaultTags,
    ignoreTags: config.ignoreTags,
    log,
  };
}

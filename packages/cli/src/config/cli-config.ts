import fs from "fs-extra";
import path from "path";
import { loadProviderConfig, type ProviderConfig } from "@skyform/cloud-providers";

export const DEFAULT_PROVIDER_CONFIG_FILE = "skyform.config.json";

/**
 * Read provider settings from `filePath` (or ./skyform.config.json when it
 * exists) and fill the gaps from the environment.
 */
export async function readProviderConfig(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ProviderConfig> {
  const resolved = path.resolve(filePath ?? DEFAULT_PROVIDER_CONFIG_FILE);

  if (!filePath && !(await fs.pathExists(resolved))) {
    return loadProviderConfig({}, env);
  }

  const raw: unknown = await fs.readJson(resolved);
  return loadProviderConfig(raw, env);
}

/**
 * Read a resource's desired configuration. Validation is left to the handler.
 */
export async function readResourceConfig(filePath: string): Promise<unknown> {
  return fs.readJson(path.resolve(filePath));
}

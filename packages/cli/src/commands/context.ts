import chalk from "chalk";
import ora, { type Ora } from "ora";
import path from "path";
import { createProviderMeta, type ProviderMeta } from "@skyform/cloud-providers";
import { readProviderConfig, readResourceConfig } from "../config/cli-config";
import { createConsoleLog } from "../log";
import { StateStore } from "../state/state-store";

export interface GlobalOptions {
  state?: string;
  providerConfig?: string;
  verbose?: boolean;
}

export interface ResourceCommandOptions extends GlobalOptions {
  config?: string;
}

export interface CommandContext {
  meta: ProviderMeta;
  store: StateStore;
  spinner: Ora;
}

export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const providerConfig = await readProviderConfig(options.providerConfig);
  const store = await new StateStore(options.state ? path.resolve(options.state) : undefined).load();
  const spinner = ora();
  const meta = createProviderMeta(providerConfig, {
    log: createConsoleLog({ verbose: options.verbose, spinner }),
  });

  return { meta, store, spinner };
}

export async function readDesiredConfig(options: ResourceCommandOptions): Promise<unknown> {
  if (!options.config) {
    throw new Error("Missing --config <path> with the resource configuration");
  }
  return readResourceConfig(options.config);
}

export function printAttributes(attributes: object): void {
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined) continue;
    const text = typeof value === "string" ? value : JSON.stringify(value);
    console.log(`  ${chalk.gray(key.padEnd(20))} ${chalk.cyan(text)}`);
  }
}

/**
 * Run `task` behind the spinner, failing the spinner when it throws.
 */
export async function withSpinner<T>(spinner: Ora, text: string, task: () => Promise<T>): Promise<T> {
  spinner.start(text);
  try {
    return await task();
  } catch (error) {
    spinner.fail(`${text} failed`);
    throw error;
  }
}

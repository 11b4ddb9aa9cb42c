/**
 * Local state file tracking the resources the CLI manages.
 *
 * Stands in for the state a declarative engine would keep: the last applied
 * configuration and the attributes read back after it was applied.
 */

import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { toValidationError } from "@skyform/cloud-providers";

export const DEFAULT_STATE_FILE = "skyform.state.json";

const StateEntrySchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  /** Last applied configuration */
  config: z.unknown(),
  /** Attributes read back after the last apply */
  attributes: z.unknown(),
  updatedAt: z.string(),
});

const StateFileSchema = z.object({
  version: z.literal(1),
  resources: z.array(StateEntrySchema).default([]),
});

export type StateEntry = z.infer<typeof StateEntrySchema>;

export class StateStore {
  private entries: StateEntry[] = [];

  constructor(readonly filePath: string = path.resolve(DEFAULT_STATE_FILE)) {}

  /**
   * Load the state file. A missing file is an empty state.
   *
   * @throws ValidationError when the file is not a state file
   */
  async load(): Promise<this> {
    if (!(await fs.pathExists(this.filePath))) {
      this.entries = [];
      return this;
    }

    const raw: unknown = await fs.readJson(this.filePath);
    const result = StateFileSchema.safeParse(raw);
    if (!result.success) {
      throw toValidationError(`state file ${this.filePath}`, result.error);
    }
    this.entries = result.data.resources;
    return this;
  }

  async save(): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeJson(
      this.filePath,
      { version: 1, resources: this.entries },
      { spaces: 2 }
    );
  }

  list(type?: string): StateEntry[] {
    return this.entries.filter((entry) => !type || entry.type === type);
  }

  get(type: string, id: string): StateEntry | undefined {
    return this.entries.find((entry) => entry.type === type && entry.id === id);
  }

  put(
    type: string,
    id: string,
    config: unknown,
    attributes: unknown
  ): StateEntry {
    const entry: StateEntry = {
      type,
      id,
      config,
      attributes,
      updatedAt: new Date().toISOString(),
    };
    this.entries = [...this.entries.filter((e) => !(e.type === type && e.id === id)), entry];
    return entry;
  }

  /** @returns whether an entry was removed */
  remove(type: string, id: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((e) => !(e.type === type && e.id === id));
    return this.entries.length !== before;
  }
}

/**
 * Resource Handler Interface
 *
 * The contract a declarative engine drives. The engine owns desired
 * configuration and tracked ids; a handler translates them into vendor calls.
 */

import type { ReadResult } from "../types/resource";

/**
 * CRUD lifecycle for one resource type.
 *
 * `TMeta` is the provider capability (API clients, default tags, logger)
 * handed to every call, so handlers hold no client of their own.
 */
export interface IResourceHandler<TConfig, TAttributes, TMeta> {
  /** Resource type name, e.g. "lightsail_instance" */
  readonly typeName: string;

  /**
   * Provision the resource and return its freshly read state.
   */
  create(config: TConfig, meta: TMeta): Promise<ReadResult<TAttributes>>;

  /**
   * Read actual state. Absent upstream resolves to `{ found: false }`.
   */
  read(id: string, meta: TMeta): Promise<ReadResult<TAttributes>>;

  /**
   * Apply in-place changes. Omitted when every attribute forces replacement.
   */
  update?(
    id: string,
    prior: TConfig,
    desired: TConfig,
    meta: TMeta
  ): Promise<ReadResult<TAttributes>>;

  /**
   * Destroy the resource; resolves only once the vendor confirms it.
   */
  delete(id: string, meta: TMeta): Promise<void>;

  /**
   * Adopt an existing resource by id.
   */
  importState(id: string, meta: TMeta): Promise<ReadResult<TAttributes>>;
}

/**
 * Resource lifecycle type definitions.
 */

/**
 * Result of reading a resource from the vendor.
 *
 * `found: false` means the resource is absent upstream; the caller drops it
 * from tracked state instead of treating the read as a failure.
 */
export type ReadResult<TAttributes> =
  | { found: true; id: string; attributes: TAttributes }
  | { found: false; id: string };

/**
 * Outcome of comparing prior and desired configuration.
 */
export interface ChangePlan {
  action: "noop" | "update" | "replace";
  /** Configuration keys whose value differs */
  changed: string[];
}

/**
 * Tag type definitions.
 */

/** Key/value labels attached to a resource */
export type TagMap = Record<string, string>;

/**
 * Provider-wide tags merged into every resource's configured tags.
 */
export interface DefaultTagsConfig {
  tags: TagMap;
}

/**
 * Tags the provider never reports back, matched by exact key or key prefix.
 */
export interface IgnoreTagsConfig {
  keys: string[];
  keyPrefixes: string[];
}

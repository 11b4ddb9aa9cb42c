import type { DefaultTagsConfig, IgnoreTagsConfig, TagMap } from "../types/tags";

/** Keys reserved by AWS; they can be neither set nor removed by users. */
export const AWS_TAG_PREFIX = "aws:";

/**
 * Merge provider default tags with resource tags. Resource tags win.
 */
export function mergeDefaultTags(
  defaults: DefaultTagsConfig | undefined,
  tags: TagMap = {}
): TagMap {
  return { ...(defaults?.tags ?? {}), ...tags };
}

/**
 * Drop AWS-reserved tags.
 */
export function ignoreAwsTags(tags: TagMap): TagMap {
  return Object.fromEntries(
    Object.entries(tags).filter(([key]) => !key.startsWith(AWS_TAG_PREFIX))
  );
}

/**
 * Drop tags the provider was configured to ignore.
 */
export function ignoreConfiguredTags(
  tags: TagMap,
  ignore: IgnoreTagsConfig | undefined
): TagMap {
  if (!ignore) return { ...tags };

  return Object.fromEntries(
    Object.entries(tags).filter(
      ([key]) =>
        !ignore.keys.includes(key) &&
        !ignore.keyPrefixes.some((prefix) => key.startsWith(prefix))
    )
  );
}

/**
 * Remove tags that come from the provider defaults unchanged.
 *
 * A key the resource overrides with a different value is kept.
 */
export function removeDefaultTags(
  tags: TagMap,
  defaults: DefaultTagsConfig | undefined
): TagMap {
  if (!defaults) return { ...tags };

  return Object.fromEntries(
    Object.entries(tags).filter(([key, value]) => defaults.tags[key] !== value)
  );
}

export interface TagDiff {
  /** Tags to create or overwrite */
  upserts: TagMap;
  /** Keys to remove */
  removedKeys: string[];
}

/**
 * Compute the tag calls needed to move from `previous` to `next`.
 * AWS-reserved keys are never touched.
 */
export function diffTags(previous: TagMap, next: TagMap): TagDiff {
  const before = ignoreAwsTags(previous);
  const after = ignoreAwsTags(next);

  const removedKeys = Object.keys(before).filter((key) => !(key in after));
  const upserts = Object.fromEntries(
    Object.entries(after).filter(([key, value]) => before[key] !== value)
  );

  return { upserts, removedKeys };
}

/**
 * Order-insensitive equality of two tag maps.
 */
export function tagsEqual(a: TagMap, b: TagMap): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => key in b && a[key] === b[key]);
}

import {
  diffTags,
  ignoreAwsTags,
  ignoreConfiguredTags,
  mergeDefaultTags,
  removeDefaultTags,
  tagsEqual,
} from "./tags";

describe("mergeDefaultTags", () => {
  it("lets resource tags override defaults", () => {
    const merged = mergeDefaultTags(
      { tags: { team: "platform", env: "dev" } },
      { env: "prod" }
    );

    expect(merged).toEqual({ team: "platform", env: "prod" });
  });

  it("returns resource tags when no defaults are configured", () => {
    expect(mergeDefaultTags(undefined, { env: "prod" })).toEqual({ env: "prod" });
  });

  it("returns an empty map when nothing is configured", () => {
    expect(mergeDefaultTags(undefined)).toEqual({});
  });
});

describe("ignoreAwsTags", () => {
  it("drops aws: prefixed keys", () => {
    expect(
      ignoreAwsTags({ "aws:cloudformation:stack-name": "s", Name: "web" })
    ).toEqual({ Name: "web" });
  });
});

describe("ignoreConfiguredTags", () => {
  it("drops exact keys and prefixed keys", () => {
    const tags = { Name: "web", "kubernetes.io/cluster": "a", owner: "me" };

    expect(
      ignoreConfiguredTags(tags, { keys: ["owner"], keyPrefixes: ["kubernetes.io/"] })
    ).toEqual({ Name: "web" });
  });

  it("copies tags when nothing is ignored", () => {
    const tags = { Name: "web" };
    const result = ignoreConfiguredTags(tags, undefined);

    expect(result).toEqual(tags);
    expect(result).not.toBe(tags);
  });
});

describe("removeDefaultTags", () => {
  it("removes tags that only come from defaults", () => {
    const all = { team: "platform", Name: "web" };

    expect(removeDefaultTags(all, { tags: { team: "platform" } })).toEqual({
      Name: "web",
    });
  });

  it("keeps a default key the resource overrides with another value", () => {
    const all = { team: "data" };

    expect(removeDefaultTags(all, { tags: { team: "platform" } })).toEqual({
      team: "data",
    });
  });
});

describe("diffTags", () => {
  it("splits changes into upserts and removals", () => {
    const diff = diffTags(
      { keep: "1", change: "old", drop: "x" },
      { keep: "1", change: "new", add: "y" }
    );

    expect(diff.upserts).toEqual({ change: "new", add: "y" });
    expect(diff.removedKeys).toEqual(["drop"]);
  });

  it("never touches aws: keys", () => {
    const diff = diffTags({ "aws:created": "a" }, { "aws:other": "b" });

    expect(diff).toEqual({ upserts: {}, removedKeys: [] });
  });
});

describe("tagsEqual", () => {
  it("ignores key order", () => {
    expect(tagsEqual({ a: "1", b: "2" }, { b: "2", a: "1" })).toBe(true);
  });

  it("detects different values and sizes", () => {
    expect(tagsEqual({ a: "1" }, { a: "2" })).toBe(false);
    expect(tagsEqual({ a: "1" }, { a: "1", b: "2" })).toBe(false);
  });
});

import { ValidationError } from "@skyform/adapters-common";
import { parseInstanceConfig } from "./instance-schema";

const base = {
  name: "web-1",
  availability_zone: "us-east-1a",
  blueprint_id: "amazon_linux",
  bundle_id: "nano_1_0",
};

describe("parseInstanceConfig", () => {
  it("fills in the ip address type and tags", () => {
    expect(parseInstanceConfig(base)).toEqual({ ...base, ip_address_type: "dualstack", tags: {} });
  });

  it.each(["ab", "Web.server_1", "a".repeat(255)])("accepts the name %s", (name) => {
    expect(parseInstanceConfig({ ...base, name }).name).toBe(name);
  });

  it.each([
    ["a", "String must contain at least 2 character(s)"],
    ["1web", "must begin with an alphabetic character"],
    ["web server", "must contain only alphanumeric characters, underscores, hyphens, and dots"],
    ["web-", "must not end with a dot, underscore or hyphen"],
    ["web.", "must not end with a dot, underscore or hyphen"],
  ])("rejects the name %s", (name, message) => {
    expect(() => parseInstanceConfig({ ...base, name })).toThrow(`name: ${message}`);
  });

  it("lists every invalid field in the error", () => {
    let caught: unknown;
    try {
      parseInstanceConfig({ name: "web-1", availability_zone: "", ip_address_type: "ipv5" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    const paths = caught instanceof ValidationError ? caught.issues.map((i) => i.path) : [];
    expect(paths).toEqual(
      expect.arrayContaining(["availability_zone", "blueprint_id", "bundle_id", "ip_address_type"])
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseInstanceConfig({ ...base, size: "large" })).toThrow(ValidationError);
  });
});

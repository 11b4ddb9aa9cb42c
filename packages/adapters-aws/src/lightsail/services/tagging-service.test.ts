import type { LightsailClient } from "@aws-sdk/client-lightsail";
import { TagResourceCommand, UntagResourceCommand } from "@aws-sdk/client-lightsail";
import { TaggingService } from "./tagging-service";

describe("TaggingService", () => {
  let mockSend: jest.Mock;
  let service: TaggingService;

  beforeEach(() => {
    mockSend = jest.fn().mockResolvedValue({ operations: [{ id: "op-1", status: "Succeeded" }] });
    service = new TaggingService({ send: mockSend } as unknown as LightsailClient);
  });

  it("sends tags as key/value pairs", async () => {
    const operations = await service.tagResource("web-1", { env: "prod", tier: "web" });

    expect(mockSend).toHaveBeenCalledWith(expect.any(TagResourceCommand));
    expect(mockSend.mock.calls[0][0].input).toEqual({
      resourceName: "web-1",
      tags: [
        { key: "env", value: "prod" },
        { key: "tier", value: "web" },
      ],
    });
    expect(operations.map((operation) => operation.id)).toEqual(["op-1"]);
  });

  it("removes tags by key", async () => {
    await service.untagResource("web-1", ["team"]);

    expect(mockSend).toHaveBeenCalledWith(expect.any(UntagResourceCommand));
    expect(mockSend.mock.calls[0][0].input).toEqual({ resourceName: "web-1", tagKeys: ["team"] });
  });
});

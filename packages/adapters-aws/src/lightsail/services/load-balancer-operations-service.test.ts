import type { LightsailClient } from "@aws-sdk/client-lightsail";
import {
  AttachInstancesToLoadBalancerCommand,
  DetachInstancesFromLoadBalancerCommand,
  GetLoadBalancerCommand,
} from "@aws-sdk/client-lightsail";
import { NotFoundError } from "@skyform/adapters-common";
import { LoadBalancerOperationsService } from "./load-balancer-operations-service";

describe("LoadBalancerOperationsService", () => {
  let mockSend: jest.Mock;
  let service: LoadBalancerOperationsService;

  beforeEach(() => {
    mockSend = jest.fn();
    service = new LoadBalancerOperationsService({ send: mockSend } as unknown as LightsailClient);
  });

  it("lists registered instances from the health summary", async () => {
    mockSend.mockResolvedValue({
      loadBalancer: {
        name: "lb1",
        state: "active",
        instanceHealthSummary: [
          { instanceName: "i1", instanceHealth: "healthy" },
          { instanceHealth: "initial" },
          { instanceName: "i2", instanceHealth: "unhealthy" },
        ],
      },
    });

    const info = await service.getLoadBalancer("lb1");

    expect(mockSend).toHaveBeenCalledWith(expect.any(GetLoadBalancerCommand));
    expect(info).toEqual({
      name: "lb1",
      arn: undefined,
      state: "active",
      instanceNames: ["i1", "i2"],
      tags: {},
    });
  });

  it("returns undefined for a missing load balancer", async () => {
    mockSend.mockRejectedValue(Object.assign(new Error("gone"), { name: "NotFoundException" }));

    await expect(service.getLoadBalancer("lb1")).resolves.toBeUndefined();
  });

  it("attaches instances", async () => {
    mockSend.mockResolvedValue({ operations: [{ id: "op-att", status: "Started" }] });

    const operations = await service.attachInstances("lb1", ["i1"]);

    expect(mockSend).toHaveBeenCalledWith(expect.any(AttachInstancesToLoadBalancerCommand));
    expect(mockSend.mock.calls[0][0].input).toEqual({
      loadBalancerName: "lb1",
      instanceNames: ["i1"],
    });
    expect(operations.map((op) => op.id)).toEqual(["op-att"]);
  });

  it("translates a missing load balancer on detach into NotFoundError", async () => {
    mockSend.mockRejectedValue(Object.assign(new Error("gone"), { name: "NotFoundException" }));

    await expect(service.detachInstances("lb1", ["i1"])).rejects.toThrow(NotFoundError);
    expect(mockSend).toHaveBeenCalledWith(expect.any(DetachInstancesFromLoadBalancerCommand));
  });
});

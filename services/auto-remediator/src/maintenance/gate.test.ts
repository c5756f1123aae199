import { describe, it, expect, beforeEach } from "vitest";
import { mockClient } from "aws-sdk-client-mock";
import { DescribeInstancesCommand, EC2Client } from "@aws-sdk/client-ec2";
import { createEc2MaintenanceGate, parseMaintenanceFlag } from "./gate";
import { LookupError } from "../errors";

const ec2Mock = mockClient(EC2Client);

function instanceWithTags(tags: Array<{ Key: string; Value: string }>) {
  return {
    Reservations: [{ Instances: [{ InstanceId: "i-123", Tags: tags }] }],
  };
}

describe("parseMaintenanceFlag", () => {
  it("treats true-like values as maintenance", () => {
    for (const value of ["true", "TRUE", " True ", "yes", "on", "1", "enabled"]) {
      expect(parseMaintenanceFlag(value)).toBe(true);
    }
  });

  it("treats anything else as not in maintenance", () => {
    for (const value of ["false", "no", "0", "", "maybe"]) {
      expect(parseMaintenanceFlag(value)).toBe(false);
    }
  });

  it("treats a missing tag as not in maintenance", () => {
    expect(parseMaintenanceFlag(undefined)).toBe(false);
  });
});

describe("createEc2MaintenanceGate", () => {
  beforeEach(() => {
    ec2Mock.reset();
  });

  it("reports maintenance when the tag is set", async () => {
    ec2Mock.on(DescribeInstancesCommand).resolves(
      instanceWithTags([
        { Key: "Name", Value: "web" },
        { Key: "Maintenance", Value: "true" },
      ]),
    );

    const gate = createEc2MaintenanceGate(new EC2Client({ region: "ap-southeast-1" }));
    expect(await gate.check("i-123")).toEqual({ resourceId: "i-123", inMaintenance: true });
    expect(ec2Mock.commandCalls(DescribeInstancesCommand)[0].args[0].input).toEqual({
      InstanceIds: ["i-123"],
    });
  });

  it("reports no maintenance when the tag is absent", async () => {
    ec2Mock.on(DescribeInstancesCommand).resolves(instanceWithTags([{ Key: "Name", Value: "web" }]));

    const gate = createEc2MaintenanceGate(new EC2Client({ region: "ap-southeast-1" }));
    expect(await gate.check("i-123")).toEqual({ resourceId: "i-123", inMaintenance: false });
  });

  it("reads a custom tag key", async () => {
    ec2Mock.on(DescribeInstancesCommand).resolves(
      instanceWithTags([
        { Key: "Maintenance", Value: "false" },
        { Key: "ops:maintenance", Value: "yes" },
      ]),
    );

    const gate = createEc2MaintenanceGate(new EC2Client({ region: "ap-southeast-1" }), "ops:maintenance");
    expect((await gate.check("i-123")).inMaintenance).toBe(true);
  });

  it("looks up fresh on every call", async () => {
    ec2Mock
      .on(DescribeInstancesCommand)
      .resolvesOnce(instanceWithTags([{ Key: "Maintenance", Value: "true" }]))
      .resolvesOnce(instanceWithTags([]));

    const gate = createEc2MaintenanceGate(new EC2Client({ region: "ap-southeast-1" }));
    expect((await gate.check("i-123")).inMaintenance).toBe(true);
    expect((await gate.check("i-123")).inMaintenance).toBe(false);
    expect(ec2Mock.commandCalls(DescribeInstancesCommand)).toHaveLength(2);
  });

  it("throws LookupError when the instance is not returned", async () => {
    ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

    const gate = createEc2MaintenanceGate(new EC2Client({ region: "ap-southeast-1" }));
    await expect(gate.check("i-123")).rejects.toThrow(new LookupError("i-123", "Instance i-123 not found"));
  });

  it("wraps SDK failures in LookupError", async () => {
    ec2Mock.on(DescribeInstancesCommand).rejects(new Error("UnauthorizedOperation"));

    const gate = createEc2MaintenanceGate(new EC2Client({ region: "ap-southeast-1" }));
    const err = await gate.check("i-123").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LookupError);
    expect((err as LookupError).message).toBe("Failed to describe instance i-123: UnauthorizedOperation");
    expect((err as LookupError).resourceId).toBe("i-123");
  });
});

/**
 * EC2 Backend Facade - Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";

vi.mock("@aws-sdk/client-ec2", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@aws-sdk/client-ec2")>()),
  ...(await import("../../test/ec2-stub.js")).createEC2Module(),
}));

import { FakeServiceError, fakeEC2 } from "../../test/ec2-stub.js";
import { AWSClientPoolManager } from "../client-pool/manager.js";
import { StaticCredentialProvider } from "../credentials/manager.js";
import { MemoryTransport, createCpiLogger } from "../logging/logger.js";
import { AWSEC2Facade, createEC2Facade, isInstanceType, isVolumeType } from "./facade.js";

function setup() {
  const transport = new MemoryTransport();
  const logger = createCpiLogger("facade", { level: "trace", transports: [transport] });
  const pool = new AWSClientPoolManager(
    new StaticCredentialProvider({ accessKeyId: "test-access-key", secretAccessKey: "test-secret" }),
  );
  return { facade: createEC2Facade(pool, logger), pool, transport };
}

describe("AWSEC2Facade", () => {
  let facade: AWSEC2Facade;

  beforeEach(() => {
    fakeEC2.reset();
    ({ facade } = setup());
  });

  describe("describeInstances", () => {
    it("should follow NextToken across pages", async () => {
      fakeEC2.pageSize = 2;
      for (let n = 1; n <= 5; n++) {
        fakeEC2.addInstance("us-east-1", { State: { Name: "running" } });
      }

      const instances = await facade.describeInstances("us-east-1");

      expect(instances).toHaveLength(5);
      expect(fakeEC2.callsTo("DescribeInstancesCommand").map((c) => c.input.NextToken)).toEqual([
        undefined,
        "2",
        "4",
      ]);
    });

    it("should not send MaxResults with explicit ids", async () => {
      const id = fakeEC2.addInstance("us-east-1", { State: { Name: "stopped" } });

      await facade.describeInstances("us-east-1", [id]);

      expect(fakeEC2.callsTo("DescribeInstancesCommand")[0]?.input).toEqual({
        InstanceIds: [id],
        MaxResults: undefined,
        NextToken: undefined,
      });
    });

    it("should propagate service errors unchanged", async () => {
      const error = new FakeServiceError("InvalidInstanceID.NotFound", "missing");
      fakeEC2.failNext("DescribeInstancesCommand", error);

      await expect(facade.describeInstances("us-east-1", ["i-0123456789abcdef0"])).rejects.toBe(error);
    });
  });

  describe("runInstance", () => {
    it("should launch exactly one instance in the requested zone", async () => {
      const instance = await facade.runInstance("us-west-2", {
        imageId: "ami-12345678",
        instanceType: "t2.micro",
        availabilityZone: "us-west-2b",
      });

      expect(instance.InstanceId).toMatch(/^i-[0-9a-f]{17}$/);
      const call = fakeEC2.callsTo("RunInstancesCommand")[0];
      expect(call?.region).toBe("us-west-2");
      expect(call?.input).toEqual({
        ImageId: "ami-12345678",
        InstanceType: "t2.micro",
        MinCount: 1,
        MaxCount: 1,
        Placement: { AvailabilityZone: "us-west-2b" },
      });
    });
  });

  describe("volumes", () => {
    it("should pass tags as a volume tag specification", async () => {
      await facade.createVolume("us-east-1", {
        sizeGb: 10,
        availabilityZone: "us-east-1a",
        volumeType: "gp3",
        tags: { Name: "data" },
      });

      expect(fakeEC2.callsTo("CreateVolumeCommand")[0]?.input.TagSpecifications).toEqual([
        { ResourceType: "volume", Tags: [{ Key: "Name", Value: "data" }] },
      ]);
    });

    it("should omit the tag specification when there are no tags", async () => {
      await facade.createSnapshot("us-east-1", {
        volumeId: fakeEC2.addVolume("us-east-1", { Size: 4, State: "available" }),
        description: "empty",
        tags: {},
      });

      expect(fakeEC2.callsTo("CreateSnapshotCommand")[0]?.input.TagSpecifications).toBeUndefined();
    });
  });

  describe("logging", () => {
    it("should log failed calls at debug with the error name", async () => {
      const { facade: logged, transport } = setup();
      fakeEC2.failNext("DeleteVolumeCommand", new FakeServiceError("VolumeInUse", "attached"));

      await expect(logged.deleteVolume("us-east-1", "vol-0123456789abcdef0")).rejects.toThrow("attached");

      const entry = transport.entries.find((e) => e.message === "DeleteVolume failed");
      expect(entry?.level).toBe("debug");
      expect(entry?.metadata?.error).toBe("VolumeInUse");
      expect(entry?.metadata?.region).toBe("us-east-1");
    });
  });
});

describe("type guards", () => {
  it("should recognise EC2 instance and volume types", () => {
    expect(isInstanceType("t3.micro")).toBe(true);
    expect(isInstanceType("x9.galactic")).toBe(false);
    expect(isVolumeType("gp2")).toBe(true);
    expect(isVolumeType("floppy")).toBe(false);
  });
});

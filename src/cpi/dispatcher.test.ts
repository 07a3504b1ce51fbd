/**
 * EC2 Action Dispatcher - Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";

vi.mock("@aws-sdk/client-ec2", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@aws-sdk/client-ec2")>()),
  ...(await import("../../test/ec2-stub.js")).createEC2Module(),
}));

import { FakeServiceError, fakeEC2 } from "../../test/ec2-stub.js";
import { AWSClientPoolManager } from "../client-pool/manager.js";
import { loadConfig, type CpiAwsConfigInput } from "../config.js";
import { StaticCredentialProvider } from "../credentials/manager.js";
import { AWSEC2Facade } from "../ec2/facade.js";
import { MemoryTransport, createCpiLogger } from "../logging/logger.js";
import { AWSCpiDispatcher } from "./dispatcher.js";
import type { ActionResult, Volume, Worker } from "./types.js";

const credentials = new StaticCredentialProvider({
  accessKeyId: "test-access-key",
  secretAccessKey: "test-secret",
});

function setup(config: CpiAwsConfigInput = {}) {
  const transport = new MemoryTransport();
  const logger = createCpiLogger("test", { level: "trace", transports: [transport] });
  const pool = new AWSClientPoolManager(credentials);
  const backend = new AWSEC2Facade(pool, logger);
  const dispatcher = new AWSCpiDispatcher({
    config: loadConfig({ pollIntervalMs: 0, ...config }, {}),
    backend,
    logger,
    sleep: async () => undefined,
  });
  return { dispatcher, backend, pool, transport };
}

function workerOf(result: ActionResult): Worker {
  if (result.status === "failure" || result.payload.type !== "worker") {
    throw new Error(`expected a worker payload, got ${JSON.stringify(result)}`);
  }
  return result.payload.worker;
}

function volumeOf(result: ActionResult): Volume {
  if (result.status === "failure" || result.payload.type !== "volume") {
    throw new Error(`expected a volume payload, got ${JSON.stringify(result)}`);
  }
  return result.payload.volume;
}

function volumesOf(result: ActionResult): Volume[] {
  if (result.status === "failure" || result.payload.type !== "volumes") {
    throw new Error(`expected a volumes payload, got ${JSON.stringify(result)}`);
  }
  return result.payload.volumes;
}

async function launch(dispatcher: AWSCpiDispatcher, region = "us-east-1"): Promise<string> {
  return workerOf(
    await dispatcher.dispatch("create_worker", { image_id: "ami-12345678", instance_type: "t2.micro", region }),
  ).id;
}

describe("AWSCpiDispatcher", () => {
  beforeEach(() => {
    fakeEC2.reset();
  });

  describe("provider identity", () => {
    it("should identify as the ec2 cloud provider", () => {
      const { dispatcher } = setup();

      expect(dispatcher.name).toBe("ec2");
      expect(dispatcher.providerType).toBe("cloud");
      expect(dispatcher.listActions()).toHaveLength(19);
    });

    it("should include configured defaults in action definitions", () => {
      const { dispatcher } = setup({ defaults: { instanceType: "t3.small" } });
      const definition = dispatcher.getActionDefinition("create_worker");

      expect(definition?.parameters.find((p) => p.name === "instance_type")?.default).toBe("t3.small");
      expect(definition?.parameters.find((p) => p.name === "region")?.default).toBe("us-east-1");
      expect(dispatcher.getActionDefinition("launch_rocket")).toBeUndefined();
    });
  });

  describe("unsupported actions", () => {
    it("should fail without any backend call", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("launch_rocket", { region: "us-east-1" });

      expect(result).toEqual({
        status: "failure",
        action: "launch_rocket",
        error: { kind: "UnsupportedAction", message: "Unsupported action: launch_rocket" },
      });
      expect(fakeEC2.calls).toHaveLength(0);
    });
  });

  describe("validation", () => {
    it("should fail invalid parameters before any backend call", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("attach_volume", { volume_id: "vol-0123456789abcdef0" });

      expect(result.status).toBe("failure");
      if (result.status === "failure") {
        expect(result.error.kind).toBe("InvalidParameters");
        expect(result.region).toBeUndefined();
      }
      expect(fakeEC2.calls).toHaveLength(0);
    });

    it("should require an image when no default is configured", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("create_worker", { instance_type: "t2.micro" });

      expect(result).toEqual({
        status: "failure",
        action: "create_worker",
        region: "us-east-1",
        error: {
          kind: "InvalidParameters",
          message: "Invalid parameters for create_worker: image_id is required",
        },
      });
      expect(fakeEC2.calls).toHaveLength(0);
    });

    it("should not send CreateTags with an empty tag set", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("set_worker_metadata", { worker_id: "i-0123456789abcdef0", tags: {} });

      expect(result).toEqual({
        status: "failure",
        action: "set_worker_metadata",
        error: {
          kind: "InvalidParameters",
          message: "Invalid parameters for set_worker_metadata: at least one tag is required",
        },
      });
      expect(fakeEC2.calls).toHaveLength(0);
    });

    it("should reject unknown instance types", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("create_worker", { ami: "ami-12345678", instance_type: "x9.galactic" });

      expect(result.status === "failure" && result.error.kind).toBe("InvalidParameters");
      expect(fakeEC2.calls).toHaveLength(0);
    });
  });

  describe("regions", () => {
    it("should use the configured default region", async () => {
      const { dispatcher } = setup({ defaultRegion: "us-west-2" });

      const result = await dispatcher.dispatch("list_workers");

      expect(result).toEqual({
        status: "success",
        action: "list_workers",
        region: "us-west-2",
        payload: { type: "workers", workers: [] },
      });
      expect(fakeEC2.calls.map((c) => c.region)).toEqual(["us-west-2"]);
    });

    it("should only use the session of an explicit region", async () => {
      const { dispatcher, pool } = setup();
      const getClient = vi.spyOn(pool, "getEC2Client");
      fakeEC2.addInstance("eu-west-1", { InstanceId: "i-00000000000000eu1", State: { Name: "running" } });
      fakeEC2.addInstance("us-east-1", { InstanceId: "i-00000000000000us1", State: { Name: "running" } });

      const result = await dispatcher.dispatch("list_workers", { region: "eu-west-1" });

      expect(getClient.mock.calls).toEqual([["eu-west-1"]]);
      expect(result.status === "success" && result.payload).toEqual({
        type: "workers",
        workers: [{ id: "i-00000000000000eu1", state: "Running", region: "eu-west-1", tags: {} }],
      });
      expect(pool.getStats().regions).toEqual(["eu-west-1"]);
    });
  });

  describe("test_install", () => {
    it("should list the regions visible to the credentials", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("test_install");

      expect(result).toEqual({
        status: "success",
        action: "test_install",
        region: "us-east-1",
        payload: { type: "install", regions: ["us-east-1", "us-west-2", "eu-west-1"] },
      });
    });

    it("should report any failure as an authentication error keeping the code", async () => {
      const { dispatcher } = setup();
      fakeEC2.failNext("DescribeRegionsCommand", new FakeServiceError("RequestLimitExceeded", "slow down", 503));

      const result = await dispatcher.dispatch("test_install");

      expect(result).toEqual({
        status: "failure",
        action: "test_install",
        region: "us-east-1",
        error: {
          kind: "AuthenticationError",
          message: "Unable to reach EC2 in us-east-1: slow down",
          code: "RequestLimitExceeded",
          statusCode: 503,
        },
      });
    });
  });

  describe("workers", () => {
    it("should return the launched worker from get_worker", async () => {
      const { dispatcher } = setup();
      const id = await launch(dispatcher);

      const worker = workerOf(await dispatcher.dispatch("get_worker", { worker_id: id }));

      expect(worker.id).toBe(id);
      expect(worker.imageId).toBe("ami-12345678");
      expect(worker.instanceType).toBe("t2.micro");
    });

    it("should apply the Name tag and extra tags after launch", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("create_worker", {
        ami: "ami-12345678",
        instance_type: "t2.micro",
        worker_name: "build-1",
        tags: { Team: "infra" },
      });

      expect(result.status).toBe("success");
      const worker = workerOf(result);
      expect(worker.name).toBe("build-1");
      expect(worker.tags).toEqual({ Team: "infra", Name: "build-1" });
      expect(fakeEC2.callsTo("CreateTagsCommand")[0]?.input).toEqual({
        Resources: [worker.id],
        Tags: [
          { Key: "Team", Value: "infra" },
          { Key: "Name", Value: "build-1" },
        ],
      });
    });

    it("should fall back to configured defaults", async () => {
      const { dispatcher } = setup({
        defaults: { imageId: "ami-87654321", instanceType: "t3.micro", availabilityZone: "us-east-1c" },
      });

      const worker = workerOf(await dispatcher.dispatch("create_worker"));

      expect(worker.imageId).toBe("ami-87654321");
      expect(worker.instanceType).toBe("t3.micro");
      expect(worker.availabilityZone).toBe("us-east-1c");
      expect(fakeEC2.callsTo("CreateTagsCommand")).toHaveLength(0);
    });

    it("should skip the wait unless asked", async () => {
      const { dispatcher } = setup();

      const worker = workerOf(
        await dispatcher.dispatch("create_worker", { image_id: "ami-12345678", instance_type: "t2.micro" }),
      );

      expect(worker.state).toBe("Pending");
      expect(fakeEC2.callsTo("DescribeInstancesCommand")).toHaveLength(0);
    });

    it("should wait for running when asked", async () => {
      const { dispatcher } = setup();

      const worker = workerOf(
        await dispatcher.dispatch("create_worker", {
          image_id: "ami-12345678",
          instance_type: "t2.micro",
          wait_for_running: true,
        }),
      );

      expect(worker.state).toBe("Running");
    });

    it("should keep polling through NotFound while the instance becomes visible", async () => {
      const { dispatcher } = setup({ waitForRunning: true });
      fakeEC2.failNext("DescribeInstancesCommand", new FakeServiceError("InvalidInstanceID.NotFound", "not yet"));

      const worker = workerOf(
        await dispatcher.dispatch("create_worker", { image_id: "ami-12345678", instance_type: "t2.micro" }),
      );

      expect(worker.state).toBe("Running");
      expect(fakeEC2.callsTo("DescribeInstancesCommand")).toHaveLength(2);
    });

    it("should report a wait timeout as a warning and still apply tags", async () => {
      const { dispatcher } = setup({ waitTimeoutMs: 0 });
      fakeEC2.autoRun = false;

      const result = await dispatcher.dispatch("create_worker", {
        image_id: "ami-12345678",
        instance_type: "t2.micro",
        worker_name: "slow",
        wait_for_running: true,
      });

      expect(result.status).toBe("partial");
      if (result.status === "partial") {
        expect(result.warnings).toHaveLength(1);
        expect(result.warnings[0]).toMatchObject({ step: "wait_for_running", kind: "UnknownBackendError" });
        expect(result.payload.type === "worker" && result.payload.worker.name).toBe("slow");
      }
      expect(fakeEC2.callsTo("CreateTagsCommand")).toHaveLength(1);
    });

    it("should report a tagging failure as a warning on the launched worker", async () => {
      const { dispatcher } = setup();
      fakeEC2.failNext("CreateTagsCommand", new FakeServiceError("UnauthorizedOperation", "no tagging", 403));

      const result = await dispatcher.dispatch("create_worker", {
        image_id: "ami-12345678",
        instance_type: "t2.micro",
        worker_name: "web",
      });

      expect(result.status).toBe("partial");
      if (result.status === "partial") {
        expect(result.warnings).toEqual([
          {
            step: "create_tags",
            kind: "AuthenticationError",
            message: "no tagging",
            code: "UnauthorizedOperation",
            statusCode: 403,
          },
        ]);
        expect(workerOf(result).tags).toEqual({});
      }
    });

    it("should fail when the launch itself fails", async () => {
      const { dispatcher } = setup();
      fakeEC2.failNext("RunInstancesCommand", new FakeServiceError("InvalidAMIID.NotFound", "no such image"));

      const result = await dispatcher.dispatch("create_worker", {
        image_id: "ami-12345678",
        instance_type: "t2.micro",
        worker_name: "web",
      });

      expect(result.status === "failure" && result.error.kind).toBe("NotFound");
      expect(fakeEC2.callsTo("CreateTagsCommand")).toHaveLength(0);
    });

    it("should report NotFound for an empty describe", async () => {
      const { dispatcher, backend } = setup();
      vi.spyOn(backend, "describeInstances").mockResolvedValueOnce([]);

      const result = await dispatcher.dispatch("get_worker", { worker_id: "i-0123456789abcdef0" });

      expect(result.status === "failure" && result.error).toEqual({
        kind: "NotFound",
        message: "Worker i-0123456789abcdef0 not found",
      });
    });

    it("should answer has_worker without failing on NotFound", async () => {
      const { dispatcher } = setup();
      const id = await launch(dispatcher);

      const present = await dispatcher.dispatch("has_worker", { worker_id: id });
      const absent = await dispatcher.dispatch("has_worker", { worker_id: "i-0123456789abcdef0" });

      expect(present.status === "success" && present.payload).toEqual({ type: "exists", exists: true });
      expect(absent).toEqual({
        status: "success",
        action: "has_worker",
        region: "us-east-1",
        payload: { type: "exists", exists: false },
      });
    });

    it("should not hide other errors in has_worker", async () => {
      const { dispatcher } = setup();
      fakeEC2.failNext("DescribeInstancesCommand", new FakeServiceError("AuthFailure", "bad signature", 401));

      const result = await dispatcher.dispatch("has_worker", { worker_id: "i-0123456789abcdef0" });

      expect(result.status === "failure" && result.error.kind).toBe("AuthenticationError");
    });

    it("should delete workers idempotently and report missing ones", async () => {
      const { dispatcher } = setup();
      const id = await launch(dispatcher);

      const first = await dispatcher.dispatch("delete_worker", { worker_id: id });
      const second = await dispatcher.dispatch("delete_worker", { worker_id: id });
      const missing = await dispatcher.dispatch("delete_worker", { worker_id: "i-0123456789abcdef0" });

      expect(first.status === "success" && first.payload).toEqual({ type: "ack", resourceId: id });
      expect(second.status).toBe("success");
      expect(missing.status === "failure" && missing.error.kind).toBe("NotFound");
    });

    it("should describe a worker after starting it", async () => {
      const { dispatcher } = setup();
      const id = await launch(dispatcher);

      const result = await dispatcher.dispatch("start_worker", { worker_id: id });

      expect(result.status).toBe("success");
      expect(workerOf(result).imageId).toBe("ami-12345678");
    });

    it("should build the worker from the state change when the describe fails", async () => {
      const { dispatcher } = setup();
      const id = await launch(dispatcher);
      fakeEC2.failNext("DescribeInstancesCommand", new FakeServiceError("RequestLimitExceeded", "throttled", 503));

      const result = await dispatcher.dispatch("start_worker", { worker_id: id });

      expect(result).toEqual({
        status: "partial",
        action: "start_worker",
        region: "us-east-1",
        payload: { type: "worker", worker: { id, state: "Pending", region: "us-east-1", tags: {} } },
        warnings: [
          {
            step: "describe_worker",
            kind: "RateLimited",
            message: "throttled",
            code: "RequestLimitExceeded",
            statusCode: 503,
          },
        ],
      });
    });

    it("should reboot and tag workers", async () => {
      const { dispatcher } = setup();
      const id = await launch(dispatcher);

      const reboot = await dispatcher.dispatch("reboot_worker", { worker_id: id });
      const tagged = await dispatcher.dispatch("set_worker_metadata", {
        worker_id: id,
        tags: { Team: "infra" },
        key: "Owner",
        value: "ops",
      });

      expect(reboot.status === "success" && reboot.payload).toEqual({ type: "ack", resourceId: id });
      expect(tagged.status === "success" && tagged.payload).toEqual({ type: "ack", resourceId: id });
      expect(workerOf(await dispatcher.dispatch("get_worker", { worker_id: id })).tags).toEqual({
        Team: "infra",
        Owner: "ops",
      });
    });
  });

  describe("volumes", () => {
    it("should create volumes with the default type and a Name tag", async () => {
      const { dispatcher } = setup();

      const volume = volumeOf(
        await dispatcher.dispatch("create_volume", {
          size_gb: 20,
          availability_zone: "us-east-1a",
          volume_name: "data",
        }),
      );

      expect(volume).toMatchObject({
        sizeGb: 20,
        state: "Creating",
        availabilityZone: "us-east-1a",
        volumeType: "gp2",
        tags: { Name: "data" },
      });
    });

    it("should require an availability zone without a default", async () => {
      const { dispatcher } = setup();

      const result = await dispatcher.dispatch("create_volume", { size_gb: 20 });

      expect(result.status === "failure" && result.error.message).toBe(
        "Invalid parameters for create_volume: availability_zone is required",
      );
    });

    it("should show attachment state through get_volumes", async () => {
      const { dispatcher } = setup();
      const workerId = await launch(dispatcher);
      const volumeId = volumeOf(
        await dispatcher.dispatch("create_volume", { size_gb: 8, availability_zone: "us-east-1a" }),
      ).id;

      const attached = await dispatcher.dispatch("attach_volume", {
        volume_id: volumeId,
        worker_id: workerId,
        device_name: "/dev/sdf",
      });
      expect(volumeOf(attached)).toMatchObject({ state: "InUse", attachedTo: workerId, device: "/dev/sdf" });

      const listed = volumesOf(await dispatcher.dispatch("get_volumes"));
      expect(listed.find((v) => v.id === volumeId)).toMatchObject({ state: "InUse", attachedTo: workerId });

      const detached = await dispatcher.dispatch("detach_volume", { volume_id: volumeId });
      expect(volumeOf(detached).state).toBe("Available");

      const after = volumesOf(await dispatcher.dispatch("get_volumes")).find((v) => v.id === volumeId);
      expect(after?.state).toBe("Available");
      expect(after?.attachedTo).toBeUndefined();
    });

    it("should build the volume from the attachment when the describe fails", async () => {
      const { dispatcher } = setup();
      const workerId = await launch(dispatcher);
      const volumeId = volumeOf(
        await dispatcher.dispatch("create_volume", { size_gb: 8, availability_zone: "us-east-1a" }),
      ).id;
      fakeEC2.failNext("DescribeVolumesCommand", new Error("socket hang up"));

      const result = await dispatcher.dispatch("attach_volume", {
        volume_id: volumeId,
        worker_id: workerId,
        device_name: "/dev/xvdf",
      });

      expect(result).toEqual({
        status: "partial",
        action: "attach_volume",
        region: "us-east-1",
        payload: {
          type: "volume",
          volume: {
            id: volumeId,
            sizeGb: 0,
            state: "InUse",
            attachedTo: workerId,
            region: "us-east-1",
            device: "/dev/xvdf",
            tags: {},
          },
        },
        warnings: [{ step: "describe_volume", kind: "UnknownBackendError", message: "socket hang up" }],
      });
    });

    it("should report a conflict when deleting an attached volume", async () => {
      const { dispatcher } = setup();
      const workerId = await launch(dispatcher);
      const volumeId = volumeOf(
        await dispatcher.dispatch("create_volume", { size_gb: 8, availability_zone: "us-east-1a" }),
      ).id;
      await dispatcher.dispatch("attach_volume", { volume_id: volumeId, worker_id: workerId, device_name: "/dev/sdf" });

      const result = await dispatcher.dispatch("delete_volume", { volume_id: volumeId });

      expect(result.status === "failure" && result.error.kind).toBe("Conflict");
    });

    it("should answer has_volume", async () => {
      const { dispatcher } = setup();
      const volumeId = volumeOf(
        await dispatcher.dispatch("create_volume", { size_gb: 8, availability_zone: "us-east-1a" }),
      ).id;
      await dispatcher.dispatch("delete_volume", { volume_id: volumeId });

      const result = await dispatcher.dispatch("has_volume", { volume_id: volumeId });

      expect(result.status === "success" && result.payload).toEqual({ type: "exists", exists: false });
    });
  });

  describe("snapshots", () => {
    it("should snapshot a volume with a default description", async () => {
      const { dispatcher } = setup();
      const volumeId = volumeOf(
        await dispatcher.dispatch("create_volume", { size_gb: 8, availability_zone: "us-east-1a" }),
      ).id;

      const result = await dispatcher.dispatch("snapshot_volume", {
        source_volume_id: volumeId,
        snapshot_name: "nightly",
      });

      expect(result.status === "success" && result.payload).toMatchObject({
        type: "snapshot",
        snapshot: { sourceVolumeId: volumeId, state: "Pending", name: "nightly", sizeGb: 8 },
      });
      expect(fakeEC2.callsTo("CreateSnapshotCommand")[0]?.input.Description).toBe(`Snapshot of ${volumeId}`);
    });

    it("should create, find and delete snapshots", async () => {
      const { dispatcher } = setup();
      const volumeId = volumeOf(
        await dispatcher.dispatch("create_volume", { size_gb: 8, availability_zone: "us-east-1a" }),
      ).id;

      const created = await dispatcher.dispatch("create_snapshot", { volume_id: volumeId, description: "before upgrade" });
      const snapshotId = created.status === "success" && created.payload.type === "snapshot" ? created.payload.snapshot.id : "";

      const found = await dispatcher.dispatch("has_snapshot", { snapshot_id: snapshotId });
      const deleted = await dispatcher.dispatch("delete_snapshot", { snapshot_id: snapshotId });
      const gone = await dispatcher.dispatch("has_snapshot", { snapshot_id: snapshotId });
      const again = await dispatcher.dispatch("delete_snapshot", { snapshot_id: snapshotId });

      expect(found.status === "success" && found.payload).toEqual({ type: "exists", exists: true });
      expect(deleted.status === "success" && deleted.payload).toEqual({ type: "ack", resourceId: snapshotId });
      expect(gone.status === "success" && gone.payload).toEqual({ type: "exists", exists: false });
      expect(again.status === "failure" && again.error.kind).toBe("NotFound");
    });
  });

  describe("logging", () => {
    it("should log the outcome with action, region and duration", async () => {
      const { dispatcher, transport } = setup();

      await dispatcher.dispatch("list_workers", { region: "eu-west-1" });

      const entry = transport.entries.find((e) => e.message === "Action succeeded");
      expect(entry?.level).toBe("info");
      expect(entry?.action).toBe("list_workers");
      expect(entry?.region).toBe("eu-west-1");
      expect(typeof entry?.metadata?.durationMs).toBe("number");
    });
  });
});

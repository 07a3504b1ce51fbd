/**
 * EC2 Action Dispatcher
 *
 * Entry point of the CPI: validates a request, runs the EC2 calls behind the
 * action in order, maps the records it gets back and turns every failure
 * into a classified error. `dispatch` resolves exactly once per request and
 * never rejects.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Instance } from "@aws-sdk/client-ec2";

import type { CpiAwsConfig } from "../config.js";
import { isInstanceType, isVolumeType, type EC2Backend } from "../ec2/facade.js";
import { createCpiLogger, type CpiLogger } from "../logging/logger.js";
import { buildActionDefinition, validateParameters, type ActionParams } from "./actions.js";
import { CpiError, classifyError, isNotFound } from "./errors.js";
import { mapSnapshot, mapVolume, mapVolumeFromAttachment, mapWorker, mapWorkerFromStateChange } from "./mapper.js";
import {
  ACTION_NAMES,
  isActionName,
  type ActionDefinition,
  type ActionName,
  type ActionParameters,
  type ActionPayload,
  type ActionResult,
  type ActionWarning,
  type CpiProvider,
  type Volume,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type DispatcherOptions = {
  config: CpiAwsConfig;
  backend: EC2Backend;
  logger?: CpiLogger;
  /** Delay between wait-for-running polls */
  sleep?: (ms: number) => Promise<unknown>;
};

type Outcome = {
  payload: ActionPayload;
  warnings: ActionWarning[];
};

type RegionRef = { region?: string };

const NAME_TAG = "Name";

function ok(payload: ActionPayload, warnings: ActionWarning[] = []): Outcome {
  return { payload, warnings };
}

function toWarning(step: string, err: unknown): ActionWarning {
  return { step, ...classifyError(err) };
}

function withName(tags: Record<string, string> | undefined, name: string | undefined): Record<string, string> {
  return { ...tags, ...(name !== undefined ? { [NAME_TAG]: name } : {}) };
}

// =============================================================================
// AWS CPI Dispatcher
// =============================================================================

export class AWSCpiDispatcher implements CpiProvider {
  readonly name = "ec2";
  readonly providerType = "cloud";

  private config: CpiAwsConfig;
  private backend: EC2Backend;
  private logger: CpiLogger;
  private sleep: (ms: number) => Promise<unknown>;

  constructor(options: DispatcherOptions) {
    this.config = options.config;
    this.backend = options.backend;
    this.logger = options.logger ?? createCpiLogger("dispatcher", { level: options.config.logLevel });
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  listActions(): ActionName[] {
    return [...ACTION_NAMES];
  }

  getActionDefinition(action: string): ActionDefinition | undefined {
    if (!isActionName(action)) return undefined;
    return buildActionDefinition(action, {
      region: this.config.defaultRegion,
      image_id: this.config.defaults.imageId,
      instance_type: this.config.defaults.instanceType,
      availability_zone: this.config.defaults.availabilityZone,
      volume_type: action === "create_volume" ? this.config.defaults.volumeType : undefined,
      wait_for_running: action === "create_worker" ? this.config.waitForRunning : undefined,
    });
  }

  async dispatch(action: string, parameters: ActionParameters = {}): Promise<ActionResult> {
    const started = Date.now();
    const ref: RegionRef = {};
    const log = this.logger.withContext({ action });

    if (!isActionName(action)) {
      log.warn("Unsupported action");
      return {
        status: "failure",
        action,
        error: { kind: "UnsupportedAction", message: `Unsupported action: ${action}` },
      };
    }

    log.debug("Dispatching action");

    let result: ActionResult;
    try {
      const { payload, warnings } = await this.run(action, parameters, ref);
      const region = ref.region ?? this.config.defaultRegion;
      result =
        warnings.length > 0
          ? { status: "partial", action, region, payload, warnings }
          : { status: "success", action, region, payload };
    } catch (err) {
      result = {
        status: "failure",
        action,
        ...(ref.region !== undefined ? { region: ref.region } : {}),
        error: classifyError(err),
      };
    }

    const durationMs = Date.now() - started;
    const done = log.withContext({ region: ref.region });
    switch (result.status) {
      case "success":
        done.info("Action succeeded", { durationMs });
        break;
      case "partial":
        done.warn("Action partially succeeded", {
          durationMs,
          warnings: result.warnings.map((w) => `${w.step}: ${w.kind}`),
        });
        break;
      case "failure":
        done.warn("Action failed", { durationMs, kind: result.error.kind, code: result.error.code });
        break;
    }
    return result;
  }

  private regionOf(params: { region?: string }, ref: RegionRef): string {
    ref.region = params.region ?? this.config.defaultRegion;
    return ref.region;
  }

  private run(action: ActionName, parameters: ActionParameters, ref: RegionRef): Promise<Outcome> {
    switch (action) {
      case "test_install":
        return this.testInstall(validateParameters(action, parameters), ref);
      case "list_workers":
        return this.listWorkers(validateParameters(action, parameters), ref);
      case "create_worker":
        return this.createWorker(validateParameters(action, parameters), ref);
      case "delete_worker":
        return this.deleteWorker(validateParameters(action, parameters), ref);
      case "get_worker":
        return this.getWorker(validateParameters(action, parameters), ref);
      case "has_worker":
        return this.hasWorker(validateParameters(action, parameters), ref);
      case "start_worker":
        return this.startWorker(validateParameters(action, parameters), ref);
      case "reboot_worker":
        return this.rebootWorker(validateParameters(action, parameters), ref);
      case "get_volumes":
        return this.getVolumes(validateParameters(action, parameters), ref);
      case "has_volume":
        return this.hasVolume(validateParameters(action, parameters), ref);
      case "create_volume":
        return this.createVolume(validateParameters(action, parameters), ref);
      case "delete_volume":
        return this.deleteVolume(validateParameters(action, parameters), ref);
      case "attach_volume":
        return this.attachVolume(validateParameters(action, parameters), ref);
      case "detach_volume":
        return this.detachVolume(validateParameters(action, parameters), ref);
      case "snapshot_volume": {
        const p = validateParameters(action, parameters);
        return this.snapshot(
          {
            volume_id: p.source_volume_id ?? p.volume_id ?? "",
            snapshot_name: p.snapshot_name,
            description: p.description,
            region: p.region,
          },
          ref,
        );
      }
      case "create_snapshot":
        return this.snapshot(validateParameters(action, parameters), ref);
      case "delete_snapshot":
        return this.deleteSnapshot(validateParameters(action, parameters), ref);
      case "has_snapshot":
        return this.hasSnapshot(validateParameters(action, parameters), ref);
      case "set_worker_metadata":
        return this.setWorkerMetadata(validateParameters(action, parameters), ref);
    }
  }

  // ---------------------------------------------------------------------------
  // Install check
  // ---------------------------------------------------------------------------

  private async testInstall(p: ActionParams<"test_install">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    try {
      const regions = await this.backend.describeRegions(region);
      return ok({
        type: "install",
        regions: regions.flatMap((r) => (r.RegionName ? [r.RegionName] : [])),
      });
    } catch (err) {
      const cause = classifyError(err);
      throw new CpiError("AuthenticationError", `Unable to reach EC2 in ${region}: ${cause.message}`, {
        code: cause.code,
        statusCode: cause.statusCode,
        cause: err,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Workers
  // ---------------------------------------------------------------------------

  private async listWorkers(p: ActionParams<"list_workers">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const instances = await this.backend.describeInstances(region);
    return ok({ type: "workers", workers: instances.map((i) => mapWorker(i, region)) });
  }

  private async createWorker(p: ActionParams<"create_worker">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);

    const imageId = p.image_id ?? p.ami ?? this.config.defaults.imageId;
    if (imageId === undefined) {
      throw new CpiError("InvalidParameters", "Invalid parameters for create_worker: image_id is required");
    }
    const instanceType = p.instance_type ?? this.config.defaults.instanceType;
    if (instanceType === undefined) {
      throw new CpiError("InvalidParameters", "Invalid parameters for create_worker: instance_type is required");
    }
    if (!isInstanceType(instanceType)) {
      throw new CpiError("InvalidParameters", `Invalid parameters for create_worker: unknown instance type ${instanceType}`);
    }

    const instance = await this.backend.runInstance(region, {
      imageId,
      instanceType,
      availabilityZone: p.availability_zone ?? this.config.defaults.availabilityZone,
    });
    let worker = mapWorker(instance, region);
    const warnings: ActionWarning[] = [];

    if (p.wait_for_running ?? this.config.waitForRunning) {
      try {
        worker = mapWorker(await this.waitForRunning(region, worker.id), region);
      } catch (err) {
        warnings.push(toWarning("wait_for_running", err));
      }
    }

    const tags = withName(p.tags, p.worker_name);
    if (Object.keys(tags).length > 0) {
      try {
        await this.backend.createTags(region, [worker.id], tags);
        const merged = { ...worker.tags, ...tags };
        worker = { ...worker, tags: merged, name: merged[NAME_TAG] };
      } catch (err) {
        warnings.push(toWarning("create_tags", err));
      }
    }

    return ok({ type: "worker", worker }, warnings);
  }

  /**
   * Poll until the instance is running. A freshly launched instance may not
   * be visible yet, so NotFound keeps polling until the deadline.
   */
  private async waitForRunning(region: string, instanceId: string): Promise<Instance> {
    const deadline = Date.now() + this.config.waitTimeoutMs;

    for (;;) {
      try {
        const [instance] = await this.backend.describeInstances(region, [instanceId]);
        const state = instance?.State?.Name;
        if (instance && state === "running") return instance;
        if (state === "shutting-down" || state === "terminated" || state === "stopping" || state === "stopped") {
          throw new CpiError("Conflict", `Worker ${instanceId} entered state ${state} while waiting for running`);
        }
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }

      if (Date.now() >= deadline) {
        throw new CpiError(
          "UnknownBackendError",
          `Timed out after ${this.config.waitTimeoutMs}ms waiting for worker ${instanceId} to reach running`,
        );
      }
      await this.sleep(this.config.pollIntervalMs);
    }
  }

  private async deleteWorker(p: ActionParams<"delete_worker">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    await this.backend.terminateInstance(region, p.worker_id);
    return ok({ type: "ack", resourceId: p.worker_id });
  }

  private async getWorker(p: ActionParams<"get_worker">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const [instance] = await this.backend.describeInstances(region, [p.worker_id]);
    if (!instance) {
      throw new CpiError("NotFound", `Worker ${p.worker_id} not found`);
    }
    return ok({ type: "worker", worker: mapWorker(instance, region) });
  }

  private async hasWorker(p: ActionParams<"has_worker">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    return this.exists(() => this.backend.describeInstances(region, [p.worker_id]));
  }

  private async startWorker(p: ActionParams<"start_worker">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const change = await this.backend.startInstance(region, p.worker_id);

    try {
      const [instance] = await this.backend.describeInstances(region, [p.worker_id]);
      if (!instance) {
        throw new CpiError("NotFound", `Worker ${p.worker_id} not visible after start`);
      }
      return ok({ type: "worker", worker: mapWorker(instance, region) });
    } catch (err) {
      return ok({ type: "worker", worker: mapWorkerFromStateChange(change, region) }, [
        toWarning("describe_worker", err),
      ]);
    }
  }

  private async rebootWorker(p: ActionParams<"reboot_worker">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    await this.backend.rebootInstance(region, p.worker_id);
    return ok({ type: "ack", resourceId: p.worker_id });
  }

  private async setWorkerMetadata(p: ActionParams<"set_worker_metadata">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const tags = { ...p.tags, ...(p.key !== undefined ? { [p.key]: p.value ?? "" } : {}) };
    await this.backend.createTags(region, [p.worker_id], tags);
    return ok({ type: "ack", resourceId: p.worker_id });
  }

  // ---------------------------------------------------------------------------
  // Volumes
  // ---------------------------------------------------------------------------

  private async getVolumes(p: ActionParams<"get_volumes">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const volumes = await this.backend.describeVolumes(region);
    return ok({ type: "volumes", volumes: volumes.map((v) => mapVolume(v, region)) });
  }

  private async hasVolume(p: ActionParams<"has_volume">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    return this.exists(() => this.backend.describeVolumes(region, [p.volume_id]));
  }

  private async createVolume(p: ActionParams<"create_volume">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);

    const availabilityZone = p.availability_zone ?? this.config.defaults.availabilityZone;
    if (availabilityZone === undefined) {
      throw new CpiError("InvalidParameters", "Invalid parameters for create_volume: availability_zone is required");
    }
    const volumeType = p.volume_type ?? this.config.defaults.volumeType;
    if (!isVolumeType(volumeType)) {
      throw new CpiError("InvalidParameters", `Invalid parameters for create_volume: unknown volume type ${volumeType}`);
    }

    const volume = await this.backend.createVolume(region, {
      sizeGb: p.size_gb,
      availabilityZone,
      volumeType,
      tags: withName(p.tags, p.volume_name),
    });
    return ok({ type: "volume", volume: mapVolume(volume, region) });
  }

  private async deleteVolume(p: ActionParams<"delete_volume">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    await this.backend.deleteVolume(region, p.volume_id);
    return ok({ type: "ack", resourceId: p.volume_id });
  }

  private async attachVolume(p: ActionParams<"attach_volume">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const attachment = await this.backend.attachVolume(region, {
      volumeId: p.volume_id,
      instanceId: p.worker_id,
      device: p.device_name,
    });
    return this.describeVolumeAfter(region, p.volume_id, () => mapVolumeFromAttachment(attachment, region));
  }

  private async detachVolume(p: ActionParams<"detach_volume">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const attachment = await this.backend.detachVolume(region, {
      volumeId: p.volume_id,
      instanceId: p.worker_id,
      force: p.force,
    });
    return this.describeVolumeAfter(region, p.volume_id, () => mapVolumeFromAttachment(attachment, region));
  }

  private async describeVolumeAfter(
    region: string,
    volumeId: string,
    fallback: () => Volume,
  ): Promise<Outcome> {
    try {
      const [volume] = await this.backend.describeVolumes(region, [volumeId]);
      if (!volume) {
        throw new CpiError("NotFound", `Volume ${volumeId} not visible after attachment change`);
      }
      return ok({ type: "volume", volume: mapVolume(volume, region) });
    } catch (err) {
      return ok({ type: "volume", volume: fallback() }, [toWarning("describe_volume", err)]);
    }
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  private async snapshot(p: ActionParams<"create_snapshot">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    const snapshot = await this.backend.createSnapshot(region, {
      volumeId: p.volume_id,
      description: p.description ?? `Snapshot of ${p.volume_id}`,
      tags: withName(undefined, p.snapshot_name),
    });
    return ok({ type: "snapshot", snapshot: mapSnapshot(snapshot, region) });
  }

  private async deleteSnapshot(p: ActionParams<"delete_snapshot">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    await this.backend.deleteSnapshot(region, p.snapshot_id);
    return ok({ type: "ack", resourceId: p.snapshot_id });
  }

  private async hasSnapshot(p: ActionParams<"has_snapshot">, ref: RegionRef): Promise<Outcome> {
    const region = this.regionOf(p, ref);
    return this.exists(() => this.backend.describeSnapshots(region, [p.snapshot_id]));
  }

  // ---------------------------------------------------------------------------
  // Shared
  // ---------------------------------------------------------------------------

  /**
   * Existence check: NotFound and an empty describe both mean "absent"
   */
  private async exists(describe: () => Promise<unknown[]>): Promise<Outcome> {
    try {
      const found = await describe();
      return ok({ type: "exists", exists: found.length > 0 });
    } catch (err) {
      if (isNotFound(err)) {
        return ok({ type: "exists", exists: false });
      }
      throw err;
    }
  }
}

export function createDispatcher(options: DispatcherOptions): AWSCpiDispatcher {
  return new AWSCpiDispatcher(options);
}

/**
 * EC2 Resource Mapper
 *
 * Pure conversions from EC2 records to canonical CPI entities. Unknown or
 * missing fields fall back to defaults; every other EC2 field is dropped.
 */

import type {
  Instance,
  InstanceStateChange,
  Snapshot as EC2Snapshot,
  Tag,
  Volume as EC2Volume,
  VolumeAttachment,
} from "@aws-sdk/client-ec2";

import type { Snapshot, SnapshotState, Volume, VolumeState, Worker, WorkerState } from "./types.js";

const NAME_TAG = "Name";

const WORKER_STATES: Readonly<Record<string, WorkerState>> = {
  pending: "Pending",
  running: "Running",
  "shutting-down": "Stopping",
  stopping: "Stopping",
  stopped: "Stopped",
  terminated: "Terminated",
};

const VOLUME_STATES: Readonly<Record<string, VolumeState>> = {
  creating: "Creating",
  available: "Available",
  "in-use": "InUse",
  deleting: "Deleting",
};

const SNAPSHOT_STATES: Readonly<Record<string, SnapshotState>> = {
  pending: "Pending",
  completed: "Completed",
  error: "Error",
  recoverable: "Error",
  recovering: "Pending",
};

const ACTIVE_ATTACHMENT_STATES = new Set(["attaching", "attached", "busy"]);

// =============================================================================
// Helpers
// =============================================================================

export function mapTags(tags?: Tag[]): Record<string, string> {
  const result: Record<string, string> = {};
  if (tags) {
    for (const tag of tags) {
      if (tag.Key && tag.Value !== undefined) {
        result[tag.Key] = tag.Value;
      }
    }
  }
  return result;
}

export function mapWorkerState(state?: string): WorkerState {
  return (state !== undefined ? WORKER_STATES[state] : undefined) ?? "Unknown";
}

export function mapVolumeState(state?: string): VolumeState {
  return (state !== undefined ? VOLUME_STATES[state] : undefined) ?? "Unknown";
}

export function mapSnapshotState(state?: string): SnapshotState {
  return (state !== undefined ? SNAPSHOT_STATES[state] : undefined) ?? "Pending";
}

function toIsoString(value?: Date): string | undefined {
  return value instanceof Date && !Number.isNaN(value.getTime()) ? value.toISOString() : undefined;
}

// =============================================================================
// Workers
// =============================================================================

export function mapWorker(instance: Instance, region: string): Worker {
  const tags = mapTags(instance.Tags);
  return {
    id: instance.InstanceId ?? "",
    state: mapWorkerState(instance.State?.Name),
    region,
    tags,
    name: tags[NAME_TAG],
    instanceType: instance.InstanceType,
    imageId: instance.ImageId,
    availabilityZone: instance.Placement?.AvailabilityZone,
    publicIp: instance.PublicIpAddress,
    privateIp: instance.PrivateIpAddress,
    launchedAt: toIsoString(instance.LaunchTime),
  };
}

/**
 * Worker view built from a start/stop/terminate state change, used when the
 * follow-up describe is unavailable
 */
export function mapWorkerFromStateChange(change: InstanceStateChange, region: string): Worker {
  return {
    id: change.InstanceId ?? "",
    state: mapWorkerState(change.CurrentState?.Name),
    region,
    tags: {},
  };
}

// =============================================================================
// Volumes
// =============================================================================

export function mapVolume(volume: EC2Volume, region: string): Volume {
  const nativeState = mapVolumeState(volume.State);
  const attachment = volume.Attachments?.find(
    (a) => a.InstanceId !== undefined && a.State !== undefined && ACTIVE_ATTACHMENT_STATES.has(a.State),
  );

  // attachedTo and InUse travel together
  let state: VolumeState = nativeState;
  if (nativeState === "InUse" && !attachment) state = "Unknown";

  const tags = mapTags(volume.Tags);
  return {
    id: volume.VolumeId ?? "",
    sizeGb: volume.Size ?? 0,
    state,
    attachedTo: state === "InUse" ? attachment?.InstanceId : undefined,
    region,
    availabilityZone: volume.AvailabilityZone,
    volumeType: volume.VolumeType,
    device: state === "InUse" ? attachment?.Device : undefined,
    tags,
  };
}

/**
 * Volume view built from an attach/detach response, used when the
 * follow-up describe is unavailable
 */
export function mapVolumeFromAttachment(attachment: VolumeAttachment, region: string): Volume {
  const attached =
    attachment.InstanceId !== undefined &&
    attachment.State !== undefined &&
    ACTIVE_ATTACHMENT_STATES.has(attachment.State);

  return {
    id: attachment.VolumeId ?? "",
    sizeGb: 0,
    state: attached ? "InUse" : "Unknown",
    attachedTo: attached ? attachment.InstanceId : undefined,
    region,
    device: attached ? attachment.Device : undefined,
    tags: {},
  };
}

// =============================================================================
// Snapshots
// =============================================================================

export function mapSnapshot(snapshot: EC2Snapshot, region: string): Snapshot {
  const tags = mapTags(snapshot.Tags);
  return {
    id: snapshot.SnapshotId ?? "",
    sourceVolumeId: snapshot.VolumeId ?? "",
    state: mapSnapshotState(snapshot.State),
    region,
    name: tags[NAME_TAG],
    sizeGb: snapshot.VolumeSize,
    progress: snapshot.Progress,
    startedAt: toIsoString(snapshot.StartTime),
    tags,
  };
}

/**
 * EC2 Backend Facade
 *
 * Thin async wrapper over the EC2 API: one method per operation the CPI
 * needs. Methods return EC2 records as-is and let EC2 errors propagate;
 * mapping and classification happen in the dispatcher.
 */

import {
  DescribeRegionsCommand,
  DescribeInstancesCommand,
  RunInstancesCommand,
  TerminateInstancesCommand,
  StartInstancesCommand,
  RebootInstancesCommand,
  DescribeVolumesCommand,
  CreateVolumeCommand,
  DeleteVolumeCommand,
  AttachVolumeCommand,
  DetachVolumeCommand,
  CreateSnapshotCommand,
  DeleteSnapshotCommand,
  DescribeSnapshotsCommand,
  CreateTagsCommand,
  VolumeType,
  _InstanceType,
  type EC2Client,
  type Instance,
  type InstanceStateChange,
  type Region,
  type ResourceType,
  type Snapshot,
  type TagSpecification,
  type Volume,
  type VolumeAttachment,
} from "@aws-sdk/client-ec2";

import type { AWSClientPoolManager } from "../client-pool/manager.js";
import type { CpiLogger } from "../logging/logger.js";

// =============================================================================
// Inputs
// =============================================================================

export type RunInstanceInput = {
  imageId: string;
  instanceType: _InstanceType;
  availabilityZone?: string;
};

export type CreateVolumeInput = {
  sizeGb: number;
  availabilityZone: string;
  volumeType: VolumeType;
  tags?: Record<string, string>;
};

export type AttachVolumeInput = {
  volumeId: string;
  instanceId: string;
  device: string;
};

export type DetachVolumeInput = {
  volumeId: string;
  instanceId?: string;
  force?: boolean;
};

export type CreateSnapshotInput = {
  volumeId: string;
  description: string;
  tags?: Record<string, string>;
};

// =============================================================================
// Backend Interface
// =============================================================================

/**
 * EC2 operations used by the dispatcher. Every method takes the region whose
 * session it runs against.
 */
export interface EC2Backend {
  describeRegions(region: string): Promise<Region[]>;
  describeInstances(region: string, instanceIds?: string[]): Promise<Instance[]>;
  runInstance(region: string, input: RunInstanceInput): Promise<Instance>;
  terminateInstance(region: string, instanceId: string): Promise<InstanceStateChange>;
  startInstance(region: string, instanceId: string): Promise<InstanceStateChange>;
  rebootInstance(region: string, instanceId: string): Promise<void>;
  describeVolumes(region: string, volumeIds?: string[]): Promise<Volume[]>;
  createVolume(region: string, input: CreateVolumeInput): Promise<Volume>;
  deleteVolume(region: string, volumeId: string): Promise<void>;
  attachVolume(region: string, input: AttachVolumeInput): Promise<VolumeAttachment>;
  detachVolume(region: string, input: DetachVolumeInput): Promise<VolumeAttachment>;
  createSnapshot(region: string, input: CreateSnapshotInput): Promise<Snapshot>;
  deleteSnapshot(region: string, snapshotId: string): Promise<void>;
  describeSnapshots(region: string, snapshotIds: string[]): Promise<Snapshot[]>;
  createTags(region: string, resourceIds: string[], tags: Record<string, string>): Promise<void>;
}

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_MAX_RESULTS = 100;

const INSTANCE_TYPES: ReadonlySet<string> = new Set(Object.values(_InstanceType));
const VOLUME_TYPES: ReadonlySet<string> = new Set(Object.values(VolumeType));

export function isInstanceType(value: string): value is _InstanceType {
  return INSTANCE_TYPES.has(value);
}

export function isVolumeType(value: string): value is VolumeType {
  return VOLUME_TYPES.has(value);
}

function toTagSpecifications(
  resourceType: ResourceType,
  tags?: Record<string, string>,
): TagSpecification[] | undefined {
  if (!tags || Object.keys(tags).length === 0) return undefined;
  return [
    {
      ResourceType: resourceType,
      Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
    },
  ];
}

// =============================================================================
// AWS EC2 Facade
// =============================================================================

export class AWSEC2Facade implements EC2Backend {
  private pool: AWSClientPoolManager;
  private logger: CpiLogger;

  constructor(pool: AWSClientPoolManager, logger: CpiLogger) {
    this.pool = pool;
    this.logger = logger;
  }

  /**
   * Run one EC2 call against the region's session, logging its duration
   */
  private async call<T>(region: string, label: string, fn: (client: EC2Client) => Promise<T>): Promise<T> {
    const client = this.pool.getEC2Client(region);
    const started = Date.now();
    try {
      const result = await fn(client);
      this.logger.trace(`${label} ok`, { region, durationMs: Date.now() - started });
      return result;
    } catch (err) {
      this.logger.debug(`${label} failed`, {
        region,
        durationMs: Date.now() - started,
        error: err instanceof Error ? err.name : String(err),
      });
      throw err;
    }
  }

  async describeRegions(region: string): Promise<Region[]> {
    return this.call(region, "DescribeRegions", async (client) => {
      const response = await client.send(new DescribeRegionsCommand({}));
      return response.Regions ?? [];
    });
  }

  async describeInstances(region: string, instanceIds?: string[]): Promise<Instance[]> {
    return this.call(region, "DescribeInstances", async (client) => {
      const instances: Instance[] = [];
      let nextToken: string | undefined;

      do {
        const response = await client.send(
          new DescribeInstancesCommand({
            InstanceIds: instanceIds,
            // MaxResults cannot be combined with explicit instance ids
            MaxResults: instanceIds ? undefined : DEFAULT_MAX_RESULTS,
            NextToken: nextToken,
          }),
        );

        for (const reservation of response.Reservations ?? []) {
          instances.push(...(reservation.Instances ?? []));
        }
        nextToken = response.NextToken;
      } while (nextToken);

      return instances;
    });
  }

  async runInstance(region: string, input: RunInstanceInput): Promise<Instance> {
    return this.call(region, "RunInstances", async (client) => {
      const response = await client.send(
        new RunInstancesCommand({
          ImageId: input.imageId,
          InstanceType: input.instanceType,
          MinCount: 1,
          MaxCount: 1,
          Placement: input.availabilityZone ? { AvailabilityZone: input.availabilityZone } : undefined,
        }),
      );

      const instance = response.Instances?.[0];
      if (!instance?.InstanceId) {
        throw new Error("RunInstances returned no instance");
      }
      return instance;
    });
  }

  async terminateInstance(region: string, instanceId: string): Promise<InstanceStateChange> {
    return this.call(region, "TerminateInstances", async (client) => {
      const response = await client.send(new TerminateInstancesCommand({ InstanceIds: [instanceId] }));
      return response.TerminatingInstances?.[0] ?? { InstanceId: instanceId };
    });
  }

  async startInstance(region: string, instanceId: string): Promise<InstanceStateChange> {
    return this.call(region, "StartInstances", async (client) => {
      const response = await client.send(new StartInstancesCommand({ InstanceIds: [instanceId] }));
      return response.StartingInstances?.[0] ?? { InstanceId: instanceId };
    });
  }

  async rebootInstance(region: string, instanceId: string): Promise<void> {
    await this.call(region, "RebootInstances", (client) =>
      client.send(new RebootInstancesCommand({ InstanceIds: [instanceId] })),
    );
  }

  async describeVolumes(region: string, volumeIds?: string[]): Promise<Volume[]> {
    return this.call(region, "DescribeVolumes", async (client) => {
      const volumes: Volume[] = [];
      let nextToken: string | undefined;

      do {
        const response = await client.send(
          new DescribeVolumesCommand({
            VolumeIds: volumeIds,
            MaxResults: volumeIds ? undefined : DEFAULT_MAX_RESULTS,
            NextToken: nextToken,
          }),
        );
        volumes.push(...(response.Volumes ?? []));
        nextToken = response.NextToken;
      } while (nextToken);

      return volumes;
    });
  }

  async createVolume(region: string, input: CreateVolumeInput): Promise<Volume> {
    return this.call(region, "CreateVolume", (client) =>
      client.send(
        new CreateVolumeCommand({
          AvailabilityZone: input.availabilityZone,
          Size: input.sizeGb,
          VolumeType: input.volumeType,
          TagSpecifications: toTagSpecifications("volume", input.tags),
        }),
      ),
    );
  }

  async deleteVolume(region: string, volumeId: string): Promise<void> {
    await this.call(region, "DeleteVolume", (client) => client.send(new DeleteVolumeCommand({ VolumeId: volumeId })));
  }

  async attachVolume(region: string, input: AttachVolumeInput): Promise<VolumeAttachment> {
    return this.call(region, "AttachVolume", (client) =>
      client.send(
        new AttachVolumeCommand({
          VolumeId: input.volumeId,
          InstanceId: input.instanceId,
          Device: input.device,
        }),
      ),
    );
  }

  async detachVolume(region: string, input: DetachVolumeInput): Promise<VolumeAttachment> {
    return this.call(region, "DetachVolume", (client) =>
      client.send(
        new DetachVolumeCommand({
          VolumeId: input.volumeId,
          InstanceId: input.instanceId,
          Force: input.force,
        }),
      ),
    );
  }

  async createSnapshot(region: string, input: CreateSnapshotInput): Promise<Snapshot> {
    return this.call(region, "CreateSnapshot", (client) =>
      client.send(
        new CreateSnapshotCommand({
          VolumeId: input.volumeId,
          Description: input.description,
          TagSpecifications: toTagSpecifications("snapshot", input.tags),
        }),
      ),
    );
  }

  async deleteSnapshot(region: string, snapshotId: string): Promise<void> {
    await this.call(region, "DeleteSnapshot", (client) =>
      client.send(new DeleteSnapshotCommand({ SnapshotId: snapshotId })),
    );
  }

  async describeSnapshots(region: string, snapshotIds: string[]): Promise<Snapshot[]> {
    return this.call(region, "DescribeSnapshots", async (client) => {
      const response = await client.send(new DescribeSnapshotsCommand({ SnapshotIds: snapshotIds }));
      return response.Snapshots ?? [];
    });
  }

  async createTags(region: string, resourceIds: string[], tags: Record<string, string>): Promise<void> {
    await this.call(region, "CreateTags", (client) =>
      client.send(
        new CreateTagsCommand({
          Resources: resourceIds,
          Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
        }),
      ),
    );
  }
}

export function createEC2Facade(pool: AWSClientPoolManager, logger: CpiLogger): AWSEC2Facade {
  return new AWSEC2Facade(pool, logger);
}

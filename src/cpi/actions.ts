/**
 * Action parameter schemas
 *
 * One TypeBox schema per action. The dispatcher validates every request
 * against these before touching EC2, and the action catalogue is generated
 * from the same schemas.
 */

import { Type, type Static, type TObject, type TProperties } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

import { CpiError } from "./errors.js";
import type { ActionDefinition, ActionName, ParameterDefinition, ParameterType } from "./types.js";

// =============================================================================
// Field Schemas
// =============================================================================

export const WORKER_ID_PATTERN = "^i-[0-9a-f]{8,17}$";
export const VOLUME_ID_PATTERN = "^vol-[0-9a-f]{8,17}$";
export const SNAPSHOT_ID_PATTERN = "^snap-[0-9a-f]{8,17}$";
export const IMAGE_ID_PATTERN = "^ami-[0-9a-f]{8,17}$";
export const DEVICE_NAME_PATTERN = "^/dev/(?:sd|xvd|hd)[a-z][0-9]{0,2}$";
export const REGION_PATTERN = "^[a-z]{2}(?:-[a-z]+)+-[0-9]+$";

const MAX_TAG_KEY_LENGTH = 128;
const MAX_TAG_VALUE_LENGTH = 256;
const RESERVED_TAG_PREFIX = "aws:";

const Region = Type.String({ pattern: REGION_PATTERN, description: "Region to run the action in" });
const WorkerId = Type.String({ pattern: WORKER_ID_PATTERN, description: "EC2 instance id (i-...)" });
const VolumeId = Type.String({ pattern: VOLUME_ID_PATTERN, description: "EBS volume id (vol-...)" });
const SnapshotId = Type.String({ pattern: SNAPSHOT_ID_PATTERN, description: "EBS snapshot id (snap-...)" });
const ImageId = Type.String({ pattern: IMAGE_ID_PATTERN, description: "AMI id (ami-...)" });
const Tags = Type.Record(Type.String(), Type.String(), { description: "Tags to apply, key to value" });
const NameTag = (what: string) =>
  Type.String({ minLength: 1, maxLength: MAX_TAG_VALUE_LENGTH, description: `Name tag for the ${what}` });

function action<T extends TProperties>(description: string, properties: T) {
  return Type.Object(
    { ...properties, region: Type.Optional(Region) },
    { description, additionalProperties: false },
  );
}

// =============================================================================
// Action Schemas
// =============================================================================

export const ACTION_SCHEMAS = {
  test_install: action("Check that credentials can reach EC2", {}),
  list_workers: action("List all workers in the region", {}),
  create_worker: action("Launch a new worker", {
    image_id: Type.Optional(ImageId),
    ami: Type.Optional(ImageId),
    instance_type: Type.Optional(Type.String({ minLength: 1, description: "EC2 instance type" })),
    worker_name: Type.Optional(NameTag("worker")),
    tags: Type.Optional(Tags),
    availability_zone: Type.Optional(Type.String({ minLength: 1, description: "Availability zone to launch in" })),
    wait_for_running: Type.Optional(Type.Boolean({ description: "Wait for the worker to reach running" })),
  }),
  delete_worker: action("Terminate a worker", { worker_id: WorkerId }),
  get_worker: action("Get a worker by id", { worker_id: WorkerId }),
  has_worker: action("Check whether a worker exists", { worker_id: WorkerId }),
  start_worker: action("Start a stopped worker", { worker_id: WorkerId }),
  reboot_worker: action("Reboot a worker", { worker_id: WorkerId }),
  get_volumes: action("List all volumes in the region", {}),
  has_volume: action("Check whether a volume exists", { volume_id: VolumeId }),
  create_volume: action("Create a block volume", {
    size_gb: Type.Integer({ minimum: 1, maximum: 65536, description: "Volume size in GiB" }),
    availability_zone: Type.Optional(Type.String({ minLength: 1, description: "Availability zone for the volume" })),
    volume_type: Type.Optional(Type.String({ minLength: 1, description: "EBS volume type" })),
    volume_name: Type.Optional(NameTag("volume")),
    tags: Type.Optional(Tags),
  }),
  delete_volume: action("Delete a volume", { volume_id: VolumeId }),
  attach_volume: action("Attach a volume to a worker", {
    volume_id: VolumeId,
    worker_id: WorkerId,
    device_name: Type.String({ pattern: DEVICE_NAME_PATTERN, description: "Device path, e.g. /dev/sdf" }),
  }),
  detach_volume: action("Detach a volume from its worker", {
    volume_id: VolumeId,
    worker_id: Type.Optional(WorkerId),
    force: Type.Optional(Type.Boolean({ description: "Force the detachment" })),
  }),
  snapshot_volume: action("Snapshot a volume", {
    source_volume_id: Type.Optional(VolumeId),
    volume_id: Type.Optional(VolumeId),
    snapshot_name: Type.Optional(NameTag("snapshot")),
    description: Type.Optional(Type.String({ maxLength: 255, description: "Snapshot description" })),
  }),
  create_snapshot: action("Create a snapshot of a volume", {
    volume_id: VolumeId,
    snapshot_name: Type.Optional(NameTag("snapshot")),
    description: Type.Optional(Type.String({ maxLength: 255, description: "Snapshot description" })),
  }),
  delete_snapshot: action("Delete a snapshot", { snapshot_id: SnapshotId }),
  has_snapshot: action("Check whether a snapshot exists", { snapshot_id: SnapshotId }),
  set_worker_metadata: action("Set tags on a worker", {
    worker_id: WorkerId,
    tags: Type.Optional(Tags),
    key: Type.Optional(Type.String({ description: "Single tag key" })),
    value: Type.Optional(Type.String({ maxLength: MAX_TAG_VALUE_LENGTH, description: "Single tag value" })),
  }),
} satisfies Record<ActionName, TObject>;

export type ActionParams<A extends ActionName> = Static<(typeof ACTION_SCHEMAS)[A]>;

// =============================================================================
// Cross-field Rules
// =============================================================================

/**
 * Problems with a tag key or value, empty when the tag is acceptable
 */
export function tagIssues(key: string, value: string): string[] {
  const issues: string[] = [];
  if (key.length === 0) issues.push("tag key must not be empty");
  if (key.length > MAX_TAG_KEY_LENGTH) issues.push(`tag key "${key}" exceeds ${MAX_TAG_KEY_LENGTH} characters`);
  if (key.toLowerCase().startsWith(RESERVED_TAG_PREFIX)) issues.push(`tag key "${key}" uses the reserved aws: prefix`);
  if (value.length > MAX_TAG_VALUE_LENGTH) {
    issues.push(`tag value for "${key}" exceeds ${MAX_TAG_VALUE_LENGTH} characters`);
  }
  return issues;
}

function tagMapIssues(tags: Record<string, string> | undefined): string[] {
  return Object.entries(tags ?? {}).flatMap(([key, value]) => tagIssues(key, value));
}

type Refinements = { [A in ActionName]?: (params: ActionParams<A>) => string[] };

const REFINEMENTS: Refinements = {
  create_worker: (p) => [
    ...tagMapIssues(p.tags),
    ...(p.image_id !== undefined && p.ami !== undefined && p.image_id !== p.ami
      ? ["image_id and ami name different images"]
      : []),
  ],
  create_volume: (p) => tagMapIssues(p.tags),
  snapshot_volume: (p) => [
    ...(p.source_volume_id === undefined && p.volume_id === undefined ? ["source_volume_id is required"] : []),
    ...(p.source_volume_id !== undefined && p.volume_id !== undefined && p.source_volume_id !== p.volume_id
      ? ["source_volume_id and volume_id name different volumes"]
      : []),
  ],
  set_worker_metadata: (p) => {
    if (p.tags === undefined && p.key === undefined) return ["tags or key is required"];
    if (p.key === undefined && p.value !== undefined) return ["value requires key"];
    if (p.key !== undefined && p.value === undefined) return ["key requires value"];
    if (p.key === undefined && Object.keys(p.tags ?? {}).length === 0) return ["at least one tag is required"];
    return [...tagMapIssues(p.tags), ...(p.key !== undefined ? tagIssues(p.key, p.value ?? "") : [])];
  },
};

function refine<A extends ActionName>(action: A, params: ActionParams<A>): string[] {
  const rule: ((params: ActionParams<A>) => string[]) | undefined = REFINEMENTS[action];
  return rule ? rule(params) : [];
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate raw parameters for an action. Throws an InvalidParameters
 * CpiError listing every problem found.
 */
export function validateParameters<A extends ActionName>(action: A, parameters: unknown): ActionParams<A> {
  const schema: (typeof ACTION_SCHEMAS)[A] = ACTION_SCHEMAS[action];
  const input = parameters ?? {};

  if (!Check(schema, input)) {
    const issues: string[] = [];
    for (const error of Errors(schema, input)) {
      issues.push(`${error.path || "(root)"}: ${error.message}`);
    }
    throw invalid(action, issues);
  }

  const issues = refine(action, input);
  if (issues.length > 0) {
    throw invalid(action, issues);
  }
  return input;
}

function invalid(action: string, issues: string[]): CpiError {
  return new CpiError("InvalidParameters", `Invalid parameters for ${action}: ${issues.join("; ")}`);
}

// =============================================================================
// Catalogue
// =============================================================================

const PARAMETER_TYPES: ReadonlySet<string> = new Set<ParameterType>(["string", "integer", "boolean", "object"]);

function isParameterType(value: unknown): value is ParameterType {
  return typeof value === "string" && PARAMETER_TYPES.has(value);
}

/**
 * Describe an action from its schema. `defaults` supplies the effective
 * default for parameters that fall back to configuration.
 */
export function buildActionDefinition(
  action: ActionName,
  defaults: Record<string, unknown> = {},
): ActionDefinition {
  const schema: TObject = ACTION_SCHEMAS[action];
  const required = new Set(schema.required ?? []);

  const parameters: ParameterDefinition[] = Object.entries(schema.properties).map(([name, property]) => {
    const type: unknown = property.type;
    const description: unknown = property.description;
    const definition: ParameterDefinition = {
      name,
      description: typeof description === "string" ? description : "",
      type: isParameterType(type) ? type : "string",
      required: required.has(name),
    };
    if (defaults[name] !== undefined) {
      definition.default = defaults[name];
    }
    return definition;
  });

  const description: unknown = schema.description;
  return {
    name: action,
    description: typeof description === "string" ? description : action,
    parameters,
  };
}

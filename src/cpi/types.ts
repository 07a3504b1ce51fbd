/**
 * Compute Provider Interface - Type Definitions
 *
 * Provider-agnostic shapes shared by every CPI backend: canonical entities,
 * the action vocabulary, the error taxonomy and the tagged action result.
 */

// =============================================================================
// Canonical Entities
// =============================================================================

export type WorkerState = "Pending" | "Running" | "Stopping" | "Stopped" | "Terminated" | "Unknown";

export type VolumeState = "Creating" | "Available" | "InUse" | "Deleting" | "Unknown";

export type SnapshotState = "Pending" | "Completed" | "Error";

/**
 * Canonical view of a backend compute instance
 */
export type Worker = {
  id: string;
  state: WorkerState;
  region: string;
  tags: Record<string, string>;
  name?: string;
  instanceType?: string;
  imageId?: string;
  availabilityZone?: string;
  publicIp?: string;
  privateIp?: string;
  launchedAt?: string;
};

/**
 * Canonical view of a block-storage volume.
 * `attachedTo` is present exactly when `state` is "InUse".
 */
export type Volume = {
  id: string;
  sizeGb: number;
  state: VolumeState;
  attachedTo?: string;
  region: string;
  availabilityZone?: string;
  volumeType?: string;
  device?: string;
  tags: Record<string, string>;
};

export type Snapshot = {
  id: string;
  sourceVolumeId: string;
  state: SnapshotState;
  region: string;
  name?: string;
  sizeGb?: number;
  progress?: string;
  startedAt?: string;
  tags: Record<string, string>;
};

// =============================================================================
// Action Vocabulary
// =============================================================================

export const ACTION_NAMES = [
  "test_install",
  "list_workers",
  "create_worker",
  "delete_worker",
  "get_worker",
  "has_worker",
  "start_worker",
  "reboot_worker",
  "get_volumes",
  "has_volume",
  "create_volume",
  "delete_volume",
  "attach_volume",
  "detach_volume",
  "snapshot_volume",
  "create_snapshot",
  "delete_snapshot",
  "has_snapshot",
  "set_worker_metadata",
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export function isActionName(value: string): value is ActionName {
  return ACTION_NAMES.some((name) => name === value);
}

export type ActionParameters = Record<string, unknown>;

export type ActionRequest = {
  action: string;
  parameters?: ActionParameters;
};

// =============================================================================
// Errors
// =============================================================================

export type ErrorKind =
  | "UnsupportedAction"
  | "InvalidParameters"
  | "NotFound"
  | "AuthenticationError"
  | "RateLimited"
  | "Conflict"
  | "UnknownBackendError";

export type ActionError = {
  kind: ErrorKind;
  message: string;
  code?: string;
  statusCode?: number;
};

/**
 * Failure of a follow-up step in a composite action
 */
export type ActionWarning = ActionError & {
  step: string;
};

// =============================================================================
// Results
// =============================================================================

export type ActionPayload =
  | { type: "worker"; worker: Worker }
  | { type: "workers"; workers: Worker[] }
  | { type: "volume"; volume: Volume }
  | { type: "volumes"; volumes: Volume[] }
  | { type: "snapshot"; snapshot: Snapshot }
  | { type: "exists"; exists: boolean }
  | { type: "ack"; resourceId: string }
  | { type: "install"; regions: string[] };

export type ActionResult =
  | { status: "success"; action: string; region: string; payload: ActionPayload }
  | {
      status: "partial";
      action: string;
      region: string;
      payload: ActionPayload;
      warnings: ActionWarning[];
    }
  | { status: "failure"; action: string; region?: string; error: ActionError };

// =============================================================================
// Action Catalogue
// =============================================================================

export type ParameterType = "string" | "integer" | "boolean" | "object";

export type ParameterDefinition = {
  name: string;
  description: string;
  type: ParameterType;
  required: boolean;
  default?: unknown;
};

export type ActionDefinition = {
  name: ActionName;
  description: string;
  parameters: ParameterDefinition[];
};

// =============================================================================
// Provider Capability
// =============================================================================

/**
 * Capability every CPI backend implements. Hosts pick an implementation at
 * load time and talk to it only through this interface.
 */
export interface CpiProvider {
  readonly name: string;
  readonly providerType: string;

  listActions(): ActionName[];
  getActionDefinition(action: string): ActionDefinition | undefined;
  dispatch(action: string, parameters?: ActionParameters): Promise<ActionResult>;
}

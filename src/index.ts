/**
 * EC2 Compute Provider
 *
 * Compute provider interface (CPI) over AWS EC2:
 * - Action dispatcher with per-action parameter validation
 * - Canonical Worker / Volume / Snapshot mapping
 * - Closed error taxonomy for EC2 and credential failures
 * - Region-keyed EC2 session pool over a pluggable credential provider
 * - JSON-lines stdio host and CLI driver
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  // CPI
  ActionDefinition,
  ActionError,
  ActionName,
  ActionParameters,
  ActionPayload,
  ActionRequest,
  ActionResult,
  ActionWarning,
  CpiProvider,
  ErrorKind,
  ParameterDefinition,
  ParameterType,
  Snapshot,
  SnapshotState,
  Volume,
  VolumeState,
  Worker,
  WorkerState,
} from "./cpi/types.js";

export type {
  // Credentials
  AWSCredentials,
  AWSCredentialSource,
  AWSProfile,
  CredentialProvider,
  CredentialsManagerOptions,

  // Client Pool
  ClientPoolConfig,
  ClientPoolStats,
} from "./types.js";

// =============================================================================
// CPI
// =============================================================================

export { ACTION_NAMES, isActionName } from "./cpi/types.js";
export { ACTION_SCHEMAS, buildActionDefinition, validateParameters, type ActionParams } from "./cpi/actions.js";
export { AWSCpiDispatcher, createDispatcher, type DispatcherOptions } from "./cpi/dispatcher.js";
export { CpiError, classifyError, isNotFound, EC2_ERROR_KINDS, type ClassifiedError } from "./cpi/errors.js";
export {
  mapSnapshot,
  mapVolume,
  mapVolumeFromAttachment,
  mapWorker,
  mapWorkerFromStateChange,
} from "./cpi/mapper.js";

// =============================================================================
// Backend
// =============================================================================

export { AWSEC2Facade, createEC2Facade, type EC2Backend } from "./ec2/facade.js";
export { AWSClientPoolManager, createClientPool } from "./client-pool/manager.js";
export {
  AWSCredentialsManager,
  CredentialsError,
  StaticCredentialProvider,
  createCredentialsManager,
} from "./credentials/manager.js";

// =============================================================================
// Configuration, Logging, Hosts
// =============================================================================

export {
  ConfigError,
  CpiAwsConfigSchema,
  cpiAwsConfigSchema,
  loadConfig,
  type CpiAwsConfig,
  type CpiAwsConfigInput,
} from "./config.js";
export {
  ConsoleTransport,
  MemoryTransport,
  createCpiLogger,
  type CpiLogger,
  type LogLevel,
  type LogTransport,
} from "./logging/logger.js";
export { CpiHostShim, createHostShim, type HostRequest, type HostResponse } from "./host/shim.js";
export {
  createAwsCpiProvider,
  createAwsCpiRuntime,
  type AwsCpiRuntime,
  type AwsCpiRuntimeOptions,
} from "./provider.js";

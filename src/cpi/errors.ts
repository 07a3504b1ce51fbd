/**
 * CPI Error Taxonomy
 *
 * Classifies anything thrown by the EC2 SDK, the credential chain or the
 * dispatcher itself into the closed set of CPI error kinds.
 */

import type { ActionError, ErrorKind } from "./types.js";

// =============================================================================
// CPI Error
// =============================================================================

export class CpiError extends Error {
  readonly kind: ErrorKind;
  readonly code?: string;
  readonly statusCode?: number;

  constructor(kind: ErrorKind, message: string, options: { code?: string; statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "CpiError";
    this.kind = kind;
    this.code = options.code;
    this.statusCode = options.statusCode;
  }

  toActionError(): ActionError {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.code !== undefined ? { code: this.code } : {}),
      ...(this.statusCode !== undefined ? { statusCode: this.statusCode } : {}),
    };
  }
}

// =============================================================================
// Error Inspection
// =============================================================================

/**
 * Extract the backend error code from an SDK error or error-like object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  for (const field of ["code", "Code"] as const) {
    const value: unknown = Reflect.get(err, field);
    if (typeof value === "string" && value.length > 0) return value;
    if (typeof value === "number") return String(value);
  }
  // SDK v3 service exceptions carry the error code as their name
  if (err instanceof Error && err.name && err.name !== "Error") return err.name;
  return undefined;
}

/**
 * Extract the HTTP status code from SDK response metadata
 */
export function extractStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const metadata: unknown = Reflect.get(err, "$metadata");
  if (metadata && typeof metadata === "object") {
    const status: unknown = Reflect.get(metadata, "httpStatusCode");
    if (typeof status === "number") return status;
  }
  const statusCode: unknown = Reflect.get(err, "statusCode");
  return typeof statusCode === "number" ? statusCode : undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

// =============================================================================
// Classification Tables
// =============================================================================

/**
 * EC2 error codes with a known kind. Extend as new codes are observed;
 * anything absent falls through to the suffix, status and name rules.
 */
export const EC2_ERROR_KINDS: ReadonlyMap<string, ErrorKind> = new Map<string, ErrorKind>([
  // Not found
  ["InvalidInstanceID.NotFound", "NotFound"],
  ["InvalidVolume.NotFound", "NotFound"],
  ["InvalidSnapshot.NotFound", "NotFound"],
  ["InvalidAMIID.NotFound", "NotFound"],
  ["InvalidAMIID.Unavailable", "NotFound"],
  ["InvalidAttachment.NotFound", "NotFound"],
  ["InvalidZone.NotFound", "NotFound"],

  // Authentication / authorization
  ["AuthFailure", "AuthenticationError"],
  ["UnauthorizedOperation", "AuthenticationError"],
  ["InvalidClientTokenId", "AuthenticationError"],
  ["SignatureDoesNotMatch", "AuthenticationError"],
  ["IncompleteSignature", "AuthenticationError"],
  ["MissingAuthenticationToken", "AuthenticationError"],
  ["ExpiredToken", "AuthenticationError"],
  ["ExpiredTokenException", "AuthenticationError"],
  ["RequestExpired", "AuthenticationError"],
  ["AccessDenied", "AuthenticationError"],
  ["AccessDeniedException", "AuthenticationError"],
  ["UnrecognizedClientException", "AuthenticationError"],
  ["OptInRequired", "AuthenticationError"],
  ["Blocked", "AuthenticationError"],

  // Invalid parameters
  ["InvalidParameter", "InvalidParameters"],
  ["InvalidParameterValue", "InvalidParameters"],
  ["InvalidParameterCombination", "InvalidParameters"],
  ["MissingParameter", "InvalidParameters"],
  ["UnknownParameter", "InvalidParameters"],
  ["InvalidID", "InvalidParameters"],
  ["InvalidRequest", "InvalidParameters"],
  ["ValidationError", "InvalidParameters"],
  ["InvalidVolume.ZoneMismatch", "InvalidParameters"],
  ["InvalidBlockDeviceMapping", "InvalidParameters"],
  ["InvalidInstanceType", "InvalidParameters"],

  // Throttling
  ["RequestLimitExceeded", "RateLimited"],
  ["Throttling", "RateLimited"],
  ["ThrottlingException", "RateLimited"],
  ["TooManyRequestsException", "RateLimited"],
  ["RequestThrottled", "RateLimited"],
  ["EC2ThrottledException", "RateLimited"],
  ["SlowDown", "RateLimited"],

  // State conflicts
  ["IncorrectState", "Conflict"],
  ["IncorrectInstanceState", "Conflict"],
  ["InvalidState", "Conflict"],
  ["VolumeInUse", "Conflict"],
  ["OperationNotPermitted", "Conflict"],
  ["IdempotentParameterMismatch", "Conflict"],
  ["ConcurrentTagAccess", "Conflict"],
]);

const SUFFIX_RULES: ReadonlyArray<readonly [string, ErrorKind]> = [
  [".NotFound", "NotFound"],
  [".Malformed", "InvalidParameters"],
  [".InUse", "Conflict"],
  [".Duplicate", "Conflict"],
  [".AlreadyExists", "Conflict"],
];

const ERROR_NAME_KINDS: ReadonlyMap<string, ErrorKind> = new Map<string, ErrorKind>([
  ["CredentialsError", "AuthenticationError"],
  ["CredentialsProviderError", "AuthenticationError"],
  ["TokenProviderError", "AuthenticationError"],
  ["TimeoutError", "UnknownBackendError"],
]);

function kindFromStatus(status: number | undefined): ErrorKind | undefined {
  switch (status) {
    case 401:
    case 403:
      return "AuthenticationError";
    case 404:
      return "NotFound";
    case 409:
      return "Conflict";
    case 429:
      return "RateLimited";
    default:
      return undefined;
  }
}

// =============================================================================
// Classifier
// =============================================================================

export type ClassifiedError = ActionError;

/**
 * Classify any thrown value into a CPI error. Never throws; anything that
 * matches no rule is an UnknownBackendError carrying the raw message.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof CpiError) {
    return err.toActionError();
  }

  const code = extractErrorCode(err);
  const statusCode = extractStatusCode(err);
  const message = formatErrorMessage(err);
  const name = err instanceof Error ? err.name : undefined;

  const kind =
    (code !== undefined ? EC2_ERROR_KINDS.get(code) : undefined) ??
    (code !== undefined ? SUFFIX_RULES.find(([suffix]) => code.endsWith(suffix))?.[1] : undefined) ??
    kindFromStatus(statusCode) ??
    (name !== undefined ? ERROR_NAME_KINDS.get(name) : undefined) ??
    "UnknownBackendError";

  return {
    kind,
    message,
    ...(code !== undefined ? { code } : {}),
    ...(statusCode !== undefined ? { statusCode } : {}),
  };
}

/**
 * True when the error classifies as a missing resource
 */
export function isNotFound(err: unknown): boolean {
  return classifyError(err).kind === "NotFound";
}

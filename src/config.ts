/**
 * Adapter configuration: a TypeBox schema with defaults, merged from explicit
 * input over the process environment.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

import { REGION_PATTERN } from "./cpi/actions.js";
import { LOG_LEVELS } from "./logging/logger.js";

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_VOLUME_TYPE = "gp2";
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_WAIT_TIMEOUT_MS = 300000; // 5 minutes
export const DEFAULT_POLL_INTERVAL_MS = 5000;

const LogLevelSchema = Type.Union(LOG_LEVELS.map((level) => Type.Literal(level)));

export const CpiAwsConfigSchema = Type.Object(
  {
    defaultRegion: Type.String({
      pattern: REGION_PATTERN,
      default: DEFAULT_REGION,
      description: "Region used when an action names none",
    }),
    profile: Type.Optional(Type.String({ minLength: 1, description: "Shared config profile to read credentials from" })),
    endpoint: Type.Optional(Type.String({ minLength: 1, description: "Custom EC2 endpoint URL" })),
    maxAttempts: Type.Integer({
      minimum: 1,
      maximum: 10,
      default: DEFAULT_MAX_ATTEMPTS,
      description: "SDK-level attempts per request",
    }),
    defaults: Type.Object(
      {
        instanceType: Type.Optional(Type.String({ minLength: 1 })),
        imageId: Type.Optional(Type.String({ pattern: "^ami-[0-9a-f]{8,17}$" })),
        availabilityZone: Type.Optional(Type.String({ minLength: 1 })),
        volumeType: Type.String({ minLength: 1, default: DEFAULT_VOLUME_TYPE }),
      },
      { additionalProperties: false, description: "Fallbacks for omitted action parameters" },
    ),
    waitForRunning: Type.Boolean({
      default: false,
      description: "Wait for new workers to reach running before tagging",
    }),
    waitTimeoutMs: Type.Integer({ minimum: 0, default: DEFAULT_WAIT_TIMEOUT_MS }),
    pollIntervalMs: Type.Integer({ minimum: 0, default: DEFAULT_POLL_INTERVAL_MS }),
    logLevel: LogLevelSchema,
  },
  { additionalProperties: false },
);

export type CpiAwsConfig = Static<typeof CpiAwsConfigSchema>;

export type CpiAwsConfigInput = Partial<Omit<CpiAwsConfig, "defaults">> & {
  defaults?: Partial<CpiAwsConfig["defaults"]>;
};

/**
 * Configuration failed schema validation
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid cpi-aws configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function definedEntries(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

function parseEnvBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  // Left as a string so validation reports it
  return value;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return definedEntries({
    defaultRegion: env.AWS_REGION || env.AWS_DEFAULT_REGION || undefined,
    profile: env.AWS_PROFILE || undefined,
    endpoint: env.CPI_AWS_ENDPOINT || undefined,
    logLevel: env.CPI_AWS_LOG_LEVEL || undefined,
    waitForRunning: parseEnvBoolean(env.CPI_AWS_WAIT_FOR_RUNNING),
  });
}

function validationIssues(value: unknown): string[] {
  const issues: string[] = [];
  for (const error of Errors(CpiAwsConfigSchema, value)) {
    issues.push(`${error.path || "(root)"}: ${error.message}`);
  }
  return issues.length > 0 ? issues : ["configuration does not match schema"];
}

/**
 * Build the effective configuration. Explicit input wins over the
 * environment, which wins over built-in defaults.
 */
export function loadConfig(input?: unknown, env: NodeJS.ProcessEnv = process.env): CpiAwsConfig {
  if (input !== undefined && input !== null && !isRecord(input)) {
    throw new ConfigError(["(root): expected config object"]);
  }

  const explicit = isRecord(input) ? definedEntries(input) : {};
  const explicitDefaults = explicit.defaults;

  const candidate: Record<string, unknown> = {
    defaultRegion: DEFAULT_REGION,
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    waitForRunning: false,
    waitTimeoutMs: DEFAULT_WAIT_TIMEOUT_MS,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    logLevel: "info",
    ...fromEnv(env),
    ...explicit,
    defaults: isRecord(explicitDefaults)
      ? { volumeType: DEFAULT_VOLUME_TYPE, ...definedEntries(explicitDefaults) }
      : (explicitDefaults ?? { volumeType: DEFAULT_VOLUME_TYPE }),
  };

  if (Check(CpiAwsConfigSchema, candidate)) {
    return candidate;
  }
  throw new ConfigError(validationIssues(candidate));
}

type SafeParseResult =
  | { success: true; data: CpiAwsConfig }
  | { success: false; error: { issues: Array<{ path: string[]; message: string }> } };

/**
 * Config schema in the shape hosts use to validate adapter settings
 */
export const cpiAwsConfigSchema = {
  safeParse(value: unknown): SafeParseResult {
    try {
      return { success: true, data: loadConfig(value, {}) };
    } catch (err) {
      if (err instanceof ConfigError) {
        return { success: false, error: { issues: err.issues.map((message) => ({ path: [], message })) } };
      }
      throw err;
    }
  },
  jsonSchema: CpiAwsConfigSchema,
};

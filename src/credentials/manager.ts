/**
 * AWS Credentials Manager
 *
 * Default credential provider for the adapter. Walks the usual AWS sources
 * in order and caches the result until shortly before it expires:
 * - Environment variables
 * - SSO profiles
 * - Assumed-role profiles
 * - Static profiles
 * - Web identity tokens
 * - Container and instance metadata
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseIni } from "ini";
import {
  fromEnv,
  fromIni,
  fromSSO,
  fromInstanceMetadata,
  fromContainerMetadata,
  fromTokenFile,
} from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from "@smithy/types";

import { formatErrorMessage } from "../cpi/errors.js";
import type {
  AWSCredentials,
  AWSCredentialSource,
  AWSProfile,
  CredentialProvider,
  CredentialsManagerOptions,
} from "../types.js";

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_CREDENTIALS_FILE = join(homedir(), ".aws", "credentials");
const DEFAULT_CONFIG_FILE = join(homedir(), ".aws", "config");
const DEFAULT_REFRESH_THRESHOLD = 300000; // 5 minutes

// =============================================================================
// Errors
// =============================================================================

/**
 * No credential source produced usable credentials
 */
export class CredentialsError extends Error {
  readonly profile: string;

  constructor(profile: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialsError";
    this.profile = profile;
  }
}

// =============================================================================
// Profile Loading
// =============================================================================

function readSection(values: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof values !== "object" || values === null) return result;
  for (const [key, value] of Object.entries(values)) {
    if (typeof value === "string") result[key] = value;
  }
  return result;
}

async function readIniFile(path: string): Promise<Record<string, unknown> | undefined> {
  try {
    return parseIni(await readFile(path, "utf-8"));
  } catch (err) {
    const code = err && typeof err === "object" ? Reflect.get(err, "code") : undefined;
    if (code === "ENOENT") return undefined;
    throw err;
  }
}

// =============================================================================
// AWS Credentials Manager
// =============================================================================

export class AWSCredentialsManager implements CredentialProvider {
  private options: Required<CredentialsManagerOptions>;
  private profiles: Map<string, AWSProfile> = new Map();
  private profilesLoaded = false;
  private cached: AWSCredentials | null = null;
  private pending: Promise<AWSCredentials> | null = null;

  constructor(options: CredentialsManagerOptions = {}) {
    this.options = {
      profile: options.profile ?? process.env.AWS_PROFILE ?? "default",
      credentialsFile: options.credentialsFile ?? process.env.AWS_SHARED_CREDENTIALS_FILE ?? DEFAULT_CREDENTIALS_FILE,
      configFile: options.configFile ?? process.env.AWS_CONFIG_FILE ?? DEFAULT_CONFIG_FILE,
      cacheCredentials: options.cacheCredentials ?? true,
      refreshThresholdMs: options.refreshThresholdMs ?? DEFAULT_REFRESH_THRESHOLD,
    };
  }

  /**
   * Load AWS profiles from the shared credentials and config files
   */
  async loadProfiles(): Promise<void> {
    this.profiles.clear();

    const credentials = await readIniFile(this.options.credentialsFile);
    for (const [name, values] of Object.entries(credentials ?? {})) {
      if (typeof values !== "object" || values === null) continue;
      this.profiles.set(name, { ...(this.profiles.get(name) ?? { name }), name });
    }

    const config = await readIniFile(this.options.configFile);
    for (const [section, values] of Object.entries(config ?? {})) {
      if (typeof values !== "object" || values === null) continue;
      if (section.startsWith("sso-session ")) continue;

      const profileName = section.startsWith("profile ") ? section.slice("profile ".length) : section;
      const existing = this.profiles.get(profileName) ?? { name: profileName };
      const v = readSection(values);

      this.profiles.set(profileName, {
        ...existing,
        name: profileName,
        region: v.region ?? existing.region,
        roleArn: v.role_arn ?? existing.roleArn,
        sourceProfile: v.source_profile ?? existing.sourceProfile,
        ssoStartUrl: v.sso_start_url ?? existing.ssoStartUrl,
        ssoSession: v.sso_session ?? existing.ssoSession,
        ssoAccountId: v.sso_account_id ?? existing.ssoAccountId,
        ssoRoleName: v.sso_role_name ?? existing.ssoRoleName,
      });
    }

    this.profilesLoaded = true;
  }

  /**
   * Get credentials, resolving the chain when nothing fresh is cached.
   * Concurrent callers share one resolution.
   */
  async getCredentials(): Promise<AWSCredentials> {
    if (this.options.cacheCredentials && this.cached && !this.isExpiring(this.cached)) {
      return this.cached;
    }

    if (!this.pending) {
      this.pending = this.resolveCredentials().finally(() => {
        this.pending = null;
      });
    }

    const credentials = await this.pending;
    if (this.options.cacheCredentials) {
      this.cached = credentials;
    }
    return credentials;
  }

  /**
   * Resolve credentials based on profile configuration
   */
  private async resolveCredentials(): Promise<AWSCredentials> {
    if (!this.profilesLoaded) {
      await this.loadProfiles();
    }

    const profile = this.options.profile;
    const profileConfig = this.profiles.get(profile);

    const sources: Array<{
      source: AWSCredentialSource;
      provider: () => AwsCredentialIdentityProvider;
      condition: () => boolean;
    }> = [
      {
        source: "environment",
        provider: () => fromEnv(),
        condition: () => !!process.env.AWS_ACCESS_KEY_ID,
      },
      {
        source: "sso",
        provider: () => fromSSO({ profile }),
        condition: () => !!profileConfig?.ssoStartUrl || !!profileConfig?.ssoSession,
      },
      {
        source: "assumed-role",
        provider: () => fromIni({ profile }),
        condition: () => !!profileConfig?.roleArn,
      },
      {
        source: "profile",
        provider: () => fromIni({ profile }),
        condition: () => this.profiles.has(profile),
      },
      {
        source: "web-identity",
        provider: () => fromTokenFile(),
        condition: () => !!process.env.AWS_WEB_IDENTITY_TOKEN_FILE,
      },
      {
        source: "container-credentials",
        provider: () => fromContainerMetadata(),
        condition: () =>
          !!process.env.AWS_CONTAINER_CREDENTIALS_RELATIVE_URI || !!process.env.AWS_CONTAINER_CREDENTIALS_FULL_URI,
      },
      {
        source: "instance-metadata",
        provider: () => fromInstanceMetadata(),
        condition: () => process.env.AWS_EC2_METADATA_DISABLED !== "true",
      },
    ];

    const failures: string[] = [];

    for (const { source, provider, condition } of sources) {
      if (!condition()) continue;

      try {
        const credentials = await provider()();
        return this.toAWSCredentials(credentials, source);
      } catch (error) {
        failures.push(`${source}: ${formatErrorMessage(error)}`);
      }
    }

    throw new CredentialsError(
      profile,
      `Failed to resolve credentials for profile "${profile}": ${
        failures.length > 0 ? failures.join("; ") : "No credential source available"
      }`,
    );
  }

  private toAWSCredentials(credentials: AwsCredentialIdentity, source: AWSCredentialSource): AWSCredentials {
    return {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
      expiration: credentials.expiration,
      source,
    };
  }

  private isExpiring(credentials: AWSCredentials): boolean {
    if (!credentials.expiration) return false;
    return credentials.expiration.getTime() - Date.now() <= this.options.refreshThresholdMs;
  }

  getProfile(name: string): AWSProfile | undefined {
    return this.profiles.get(name);
  }

  listProfiles(): string[] {
    return Array.from(this.profiles.keys());
  }

  /**
   * Drop cached credentials so the next call resolves the chain again
   */
  invalidateCache(): void {
    this.cached = null;
  }
}

// =============================================================================
// Static Credentials
// =============================================================================

/**
 * Fixed credentials, for hosts that resolve credentials themselves
 */
export class StaticCredentialProvider implements CredentialProvider {
  private credentials: AWSCredentials;

  constructor(credentials: Omit<AWSCredentials, "source">) {
    this.credentials = { ...credentials, source: "static" };
  }

  async getCredentials(): Promise<AWSCredentials> {
    return this.credentials;
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AWSCredentialsManager {
  return new AWSCredentialsManager(options);
}

/**
 * AWS CPI Adapter - Type Definitions
 *
 * Credential and session types shared by the credential chain, the EC2
 * client pool and the backend facade.
 */

// =============================================================================
// Credentials Types
// =============================================================================

export type AWSCredentialSource =
  | "environment"
  | "profile"
  | "sso"
  | "instance-metadata"
  | "container-credentials"
  | "web-identity"
  | "assumed-role"
  | "static";

export type AWSCredentials = {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
  source: AWSCredentialSource;
};

/**
 * Anything that can hand out valid credentials on demand. Implementations
 * throw a `CredentialsError` when no credentials are available.
 */
export interface CredentialProvider {
  getCredentials(): Promise<AWSCredentials>;
}

export type AWSProfile = {
  name: string;
  region?: string;
  roleArn?: string;
  sourceProfile?: string;
  ssoStartUrl?: string;
  ssoSession?: string;
  ssoAccountId?: string;
  ssoRoleName?: string;
};

export type CredentialsManagerOptions = {
  profile?: string;
  credentialsFile?: string;
  configFile?: string;
  cacheCredentials?: boolean;
  /** Refresh cached credentials this long before they expire */
  refreshThresholdMs?: number;
};

// =============================================================================
// Client Pool Types
// =============================================================================

export type ClientPoolConfig = {
  /** Custom EC2 endpoint, e.g. a local emulator */
  endpoint?: string;
  /** SDK-level attempts per request */
  maxAttempts?: number;
};

export type ClientPoolStats = {
  totalClients: number;
  regions: string[];
  cacheHits: number;
  cacheMisses: number;
};

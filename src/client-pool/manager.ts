/**
 * EC2 Client Pool
 *
 * One EC2 client per region, created on first use and kept for the life of
 * the adapter. A client never changes after construction; credentials are
 * pulled from the credential provider on each request, so cached clients
 * stay valid across credential refreshes.
 */

import { EC2Client } from "@aws-sdk/client-ec2";
import type { AwsCredentialIdentity } from "@smithy/types";

import type { ClientPoolConfig, ClientPoolStats, CredentialProvider } from "../types.js";

const DEFAULT_MAX_ATTEMPTS = 3;

export class AWSClientPoolManager {
  private config: ClientPoolConfig & { maxAttempts: number };
  private credentialProvider: CredentialProvider;
  private clients: Map<string, EC2Client> = new Map();
  private stats = {
    cacheHits: 0,
    cacheMisses: 0,
  };

  constructor(credentialProvider: CredentialProvider, config: ClientPoolConfig = {}) {
    this.credentialProvider = credentialProvider;
    this.config = {
      endpoint: config.endpoint,
      maxAttempts: config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    };
  }

  /**
   * Get or create the EC2 client bound to a region
   */
  getEC2Client(region: string): EC2Client {
    const cached = this.clients.get(region);
    if (cached) {
      this.stats.cacheHits++;
      return cached;
    }

    this.stats.cacheMisses++;
    const client = new EC2Client({
      region,
      endpoint: this.config.endpoint,
      maxAttempts: this.config.maxAttempts,
      credentials: () => this.resolveIdentity(),
    });
    this.clients.set(region, client);
    return client;
  }

  private async resolveIdentity(): Promise<AwsCredentialIdentity> {
    const credentials = await this.credentialProvider.getCredentials();
    return {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
      expiration: credentials.expiration,
    };
  }

  getStats(): ClientPoolStats {
    return {
      totalClients: this.clients.size,
      regions: Array.from(this.clients.keys()),
      cacheHits: this.stats.cacheHits,
      cacheMisses: this.stats.cacheMisses,
    };
  }

  /**
   * Destroy every client; the pool rebuilds them on next use
   */
  destroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }
}

export function createClientPool(credentialProvider: CredentialProvider, config?: ClientPoolConfig): AWSClientPoolManager {
  return new AWSClientPoolManager(credentialProvider, config);
}

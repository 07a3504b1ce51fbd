/**
 * Wires configuration, credentials, the session pool, the EC2 facade and the
 * dispatcher into a ready-to-use provider.
 */

import { AWSClientPoolManager } from "./client-pool/manager.js";
import { loadConfig, type CpiAwsConfig } from "./config.js";
import { AWSCpiDispatcher } from "./cpi/dispatcher.js";
import { AWSCredentialsManager } from "./credentials/manager.js";
import { AWSEC2Facade } from "./ec2/facade.js";
import { CpiHostShim } from "./host/shim.js";
import { createCpiLogger, type CpiLogger, type LogTransport } from "./logging/logger.js";
import type { CredentialProvider } from "./types.js";

export type AwsCpiRuntimeOptions = {
  /** Raw configuration, validated by `loadConfig` */
  config?: unknown;
  env?: NodeJS.ProcessEnv;
  /** Overrides the default credential chain */
  credentialProvider?: CredentialProvider;
  logTransports?: LogTransport[];
};

export type AwsCpiRuntime = {
  config: CpiAwsConfig;
  logger: CpiLogger;
  pool: AWSClientPoolManager;
  backend: AWSEC2Facade;
  provider: AWSCpiDispatcher;
  shim: CpiHostShim;
  close(): void;
};

export function createAwsCpiRuntime(options: AwsCpiRuntimeOptions = {}): AwsCpiRuntime {
  const config = loadConfig(options.config, options.env);
  const logger = createCpiLogger("ec2", { level: config.logLevel, transports: options.logTransports });

  const credentialProvider = options.credentialProvider ?? new AWSCredentialsManager({ profile: config.profile });
  const pool = new AWSClientPoolManager(credentialProvider, {
    endpoint: config.endpoint,
    maxAttempts: config.maxAttempts,
  });
  const backend = new AWSEC2Facade(pool, logger.child("facade"));
  const provider = new AWSCpiDispatcher({ config, backend, logger: logger.child("dispatcher") });
  const shim = new CpiHostShim(provider, logger.child("host"));

  logger.debug("Provider ready", { defaultRegion: config.defaultRegion, endpoint: config.endpoint });

  return {
    config,
    logger,
    pool,
    backend,
    provider,
    shim,
    close: () => pool.destroy(),
  };
}

/**
 * Create the EC2 CPI provider from raw configuration
 */
export function createAwsCpiProvider(
  config?: unknown,
  options: Omit<AwsCpiRuntimeOptions, "config"> = {},
): AWSCpiDispatcher {
  return createAwsCpiRuntime({ ...options, config }).provider;
}

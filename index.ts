/**
 * EC2 Compute Provider - host entry point
 *
 * Hosts load this module, validate their settings with `configSchema` and
 * ask for a provider. Everything else is re-exported from ./src.
 */

import { cpiAwsConfigSchema } from "./src/config.js";
import type { CpiProvider } from "./src/cpi/types.js";
import { createAwsCpiProvider, type AwsCpiRuntimeOptions } from "./src/provider.js";
import { VERSION } from "./src/version.js";

export * from "./src/index.js";

const provider = {
  id: "ec2",
  name: "AWS EC2 Compute Provider",
  description: "Workers, volumes and snapshots on AWS EC2",
  providerType: "cloud",
  version: VERSION,
  configSchema: cpiAwsConfigSchema,

  create(config?: unknown, options?: Omit<AwsCpiRuntimeOptions, "config">): CpiProvider {
    return createAwsCpiProvider(config, options);
  },
};

export default provider;

import { readFile } from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import { Command, InvalidArgumentError } from "commander";

import { isLogLevel } from "../logging/logger.js";
import { createAwsCpiRuntime, type AwsCpiRuntime, type AwsCpiRuntimeOptions } from "../provider.js";
import { VERSION } from "../version.js";

export type CliIO = {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  setExitCode(code: number): void;
};

export type RuntimeFactory = (options: AwsCpiRuntimeOptions) => AwsCpiRuntime;

type GlobalOptions = {
  config?: string;
  region?: string;
  profile?: string;
  endpoint?: string;
  logLevel?: string;
};

const defaultIO: CliIO = {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function parseParams(value: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError("Expected a JSON object.");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError("Expected a JSON object.");
  }
  return Object.fromEntries(Object.entries(parsed));
}

function parseLogLevel(value: string): string {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Expected one of trace, debug, info, warn, error, fatal.");
  }
  return value;
}

async function readConfigFile(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf-8"));
}

/**
 * Build the `cpi-aws` command line. Results go to stdout as JSON; logs go to
 * stderr.
 */
export function buildProgram(io: CliIO = defaultIO, createRuntime: RuntimeFactory = createAwsCpiRuntime): Command {
  const program = new Command();

  const write = (value: unknown) => {
    io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
  };

  const runtimeFor = async (): Promise<AwsCpiRuntime> => {
    const opts = program.opts<GlobalOptions>();
    const fileConfig = opts.config ? await readConfigFile(opts.config) : {};
    const base = typeof fileConfig === "object" && fileConfig !== null ? fileConfig : {};
    return createRuntime({
      config: {
        ...base,
        ...(opts.region ? { defaultRegion: opts.region } : {}),
        ...(opts.profile ? { profile: opts.profile } : {}),
        ...(opts.endpoint ? { endpoint: opts.endpoint } : {}),
        ...(opts.logLevel ? { logLevel: opts.logLevel } : {}),
      },
    });
  };

  program
    .name("cpi-aws")
    .description("EC2 compute provider: run CPI actions against AWS")
    .version(VERSION)
    .option("--config <file>", "JSON configuration file")
    .option("--region <region>", "Default region")
    .option("--profile <name>", "Shared config profile for credentials")
    .option("--endpoint <url>", "Custom EC2 endpoint")
    .option("--log-level <level>", "Log level (written to stderr)", parseLogLevel);

  program
    .command("actions")
    .description("List supported actions")
    .action(async () => {
      const runtime = await runtimeFor();
      try {
        write(
          runtime.provider.listActions().map((name) => ({
            name,
            description: runtime.provider.getActionDefinition(name)?.description ?? "",
          })),
        );
      } finally {
        runtime.close();
      }
    });

  program
    .command("describe")
    .description("Show the parameters an action accepts")
    .argument("<action>", "Action name")
    .action(async (action: string) => {
      const runtime = await runtimeFor();
      try {
        const definition = runtime.provider.getActionDefinition(action);
        if (!definition) {
          io.stderr.write(`Unknown action: ${action}\n`);
          io.setExitCode(2);
          return;
        }
        write(definition);
      } finally {
        runtime.close();
      }
    });

  program
    .command("run")
    .description("Run one action and print its result")
    .argument("<action>", "Action name")
    .option("--params <json>", "Action parameters as a JSON object", parseParams)
    .action(async (action: string, opts: { params?: Record<string, unknown> }) => {
      const runtime = await runtimeFor();
      try {
        const result = await runtime.shim.execute(action, opts.params ?? {});
        write(result);
        if (result.status === "failure") {
          io.setExitCode(1);
        }
      } finally {
        runtime.close();
      }
    });

  program
    .command("serve")
    .description("Serve JSON-lines requests on stdin, one response line per request on stdout")
    .action(async () => {
      const runtime = await runtimeFor();
      try {
        await runtime.shim.serve(io.stdin, io.stdout);
      } finally {
        runtime.close();
      }
    });

  return program;
}

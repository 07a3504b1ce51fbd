/**
 * Runtime Host Shim
 *
 * Bridges hosts that make one call per action onto the async provider: a
 * generic `execute`, one method per action, and a JSON-lines loop over a
 * pair of streams. Requests on a stream are handled one at a time, in the
 * order they arrive.
 */

import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";

import type {
  ActionDefinition,
  ActionName,
  ActionParameters,
  ActionResult,
  CpiProvider,
} from "../cpi/types.js";
import type { CpiLogger } from "../logging/logger.js";

// =============================================================================
// Wire Types
// =============================================================================

const HostRequestSchema = Type.Object({
  id: Type.Optional(Type.Union([Type.String(), Type.Number()])),
  action: Type.String({ minLength: 1 }),
  parameters: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export type HostRequest = Static<typeof HostRequestSchema>;

export type HostResponse =
  | { id?: string | number; result: ActionResult }
  | { id?: string | number; actions: ActionName[] }
  | { id?: string | number; definition: ActionDefinition | null };

/** Catalogue requests answered by the shim itself */
export const LIST_ACTIONS = "list_actions";
export const GET_ACTION_DEFINITION = "get_action_definition";

// =============================================================================
// Host Shim
// =============================================================================

export class CpiHostShim {
  private provider: CpiProvider;
  private logger: CpiLogger;

  constructor(provider: CpiProvider, logger: CpiLogger) {
    this.provider = provider;
    this.logger = logger;
  }

  execute(action: string, parameters: ActionParameters = {}): Promise<ActionResult> {
    return this.provider.dispatch(action, parameters);
  }

  testInstall(parameters?: ActionParameters): Promise<ActionResult> {
    return this.execute("test_install", parameters);
  }

  listWorkers(parameters?: ActionParameters): Promise<ActionResult> {
    return this.execute("list_workers", parameters);
  }

  createWorker(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("create_worker", parameters);
  }

  deleteWorker(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("delete_worker", parameters);
  }

  getWorker(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("get_worker", parameters);
  }

  hasWorker(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("has_worker", parameters);
  }

  startWorker(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("start_worker", parameters);
  }

  rebootWorker(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("reboot_worker", parameters);
  }

  getVolumes(parameters?: ActionParameters): Promise<ActionResult> {
    return this.execute("get_volumes", parameters);
  }

  hasVolume(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("has_volume", parameters);
  }

  createVolume(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("create_volume", parameters);
  }

  deleteVolume(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("delete_volume", parameters);
  }

  attachVolume(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("attach_volume", parameters);
  }

  detachVolume(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("detach_volume", parameters);
  }

  snapshotVolume(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("snapshot_volume", parameters);
  }

  createSnapshot(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("create_snapshot", parameters);
  }

  deleteSnapshot(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("delete_snapshot", parameters);
  }

  hasSnapshot(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("has_snapshot", parameters);
  }

  setWorkerMetadata(parameters: ActionParameters): Promise<ActionResult> {
    return this.execute("set_worker_metadata", parameters);
  }

  /**
   * Handle one JSON request line and produce the response line
   */
  async handleLine(line: string): Promise<string> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      return JSON.stringify(this.badRequest(undefined, `Malformed request: ${err instanceof Error ? err.message : String(err)}`));
    }

    if (!Check(HostRequestSchema, raw)) {
      const id = typeof raw === "object" && raw !== null ? Reflect.get(raw, "id") : undefined;
      return JSON.stringify(
        this.badRequest(typeof id === "string" || typeof id === "number" ? id : undefined, "Request must be an object with an action name"),
      );
    }

    return JSON.stringify(await this.handleRequest(raw));
  }

  async handleRequest(request: HostRequest): Promise<HostResponse> {
    const { id, action, parameters } = request;

    if (action === LIST_ACTIONS) {
      return { id, actions: this.provider.listActions() };
    }
    if (action === GET_ACTION_DEFINITION) {
      const name = parameters?.action;
      return { id, definition: typeof name === "string" ? (this.provider.getActionDefinition(name) ?? null) : null };
    }
    return { id, result: await this.execute(action, parameters) };
  }

  /**
   * Serve JSON-lines requests from `input`, writing one response line per
   * request to `output`. Resolves when the input ends or the output fails;
   * a slow reader pauses the loop until `output` drains.
   */
  async serve(input: Readable, output: Writable): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Infinity });
    let handled = 0;
    const failures: Error[] = [];

    const onError = (err: Error) => {
      failures.push(err);
      lines.close();
    };
    output.on("error", onError);

    try {
      for await (const line of lines) {
        if (failures.length > 0) break;
        if (line.trim().length === 0) continue;
        const response = await this.handleLine(line);
        if (failures.length > 0) break;
        handled++;
        if (!output.write(`${response}\n`)) {
          await once(output, "drain").catch((err: unknown) =>
            onError(err instanceof Error ? err : new Error(String(err))),
          );
        }
      }
    } finally {
      output.off("error", onError);
      lines.close();
    }

    const failure = failures.at(0);
    if (failure) {
      this.logger.warn("Output failed, stopped serving", { handled, error: failure.message });
      return;
    }
    this.logger.debug("Input closed", { handled });
  }

  private badRequest(id: string | number | undefined, message: string): HostResponse {
    return {
      id,
      result: { status: "failure", action: "", error: { kind: "InvalidParameters", message } },
    };
  }
}

export function createHostShim(provider: CpiProvider, logger: CpiLogger): CpiHostShim {
  return new CpiHostShim(provider, logger);
}

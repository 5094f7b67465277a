/**
 * Executor capabilities and the registry that resolves them by name.
 *
 * Node configs carry a capability, not a name: names are resolved once,
 * when a graph is built from a definition or an exported document.
 */

import type {
  ExecutorCapability, CustomExecutor, PassThroughExecutor,
  PhaseExecutorFn, PhaseConfig, PhaseContext,
} from "./types.js";
import { UnknownExecutorError } from "./errors.js";

export const PASSTHROUGH: PassThroughExecutor = { kind: "passthrough" };

export function customExecutor(name: string, run: PhaseExecutorFn): CustomExecutor {
  return { kind: "custom", name, run };
}

/** A missing capability behaves as passthrough. */
export function isPassthrough(capability: ExecutorCapability | undefined): boolean {
  return capability === undefined || capability.kind === "passthrough";
}

/** Name a capability is exported under. */
export function executorName(capability: ExecutorCapability | undefined): string {
  return capability?.kind === "custom" ? capability.name : "passthrough";
}

/** Runs a capability; a missing capability behaves as passthrough. */
export async function invokeExecutor(
  capability: ExecutorCapability | undefined,
  input: unknown,
  config: PhaseConfig,
  context: PhaseContext,
): Promise<unknown> {
  if (capability === undefined || capability.kind === "passthrough") {
    return input;
  }
  return capability.run(input, config, context);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Shallow-merge every object-valued stream of a stream-keyed input into one
 * object. Later streams win on key collisions; non-object streams are kept
 * under their stream name.
 */
export const mergeStreams: PhaseExecutorFn = (input) => {
  if (!isPlainObject(input)) return input;
  const merged: Record<string, unknown> = {};
  for (const [stream, value] of Object.entries(input)) {
    if (isPlainObject(value)) {
      Object.assign(merged, value);
    } else {
      merged[stream] = value;
    }
  }
  return merged;
};

export class ExecutorRegistry {
  private _executors = new Map<string, ExecutorCapability>();

  constructor() {
    this._executors.set("passthrough", PASSTHROUGH);
    this.register("merge", mergeStreams);
  }

  register(name: string, run: PhaseExecutorFn): CustomExecutor {
    const capability = customExecutor(name, run);
    this._executors.set(name, capability);
    return capability;
  }

  has(name: string): boolean {
    return this._executors.has(name);
  }

  names(): string[] {
    return [...this._executors.keys()].sort();
  }

  resolve(name: string): ExecutorCapability {
    const capability = this._executors.get(name);
    if (!capability) {
      throw new UnknownExecutorError(name, this.names());
    }
    return capability;
  }
}

/**
 * Built-in defaults and config resolution.
 */

import type { EdgeConfig, EdgeConfigInput, PhaseConfig } from "./types.js";

/** Stream name used when an edge does not name one. */
export const DEFAULT_STREAM = "data";

/** Reserved dataFlow key holding the run's initial input. */
export const INPUT_KEY = "__input__";

export const DEFAULT_PHASE_CONFIG = {
  retries: 3,
  restart_delay: 1000,
} as const;

export const DEFAULT_EDGE_CONFIG: Pick<EdgeConfig, "buffer_size" | "backpressure" | "multiplex"> = {
  buffer_size: 1024,
  backpressure: "drop_oldest",
  multiplex: false,
};

export const DEFAULT_MONITOR_CONFIG = {
  failureThreshold: 3,
  maxRestarts: 5,
  historyLimit: 100,
  pollInterval: 50,
} as const;

/** Run-wide overrides for the per-phase defaults. */
export type PhaseDefaults = {
  retries?: number;
  restart_delay?: number;
  timeout?: number;
};

export type ResolvedPhaseConfig = {
  retries: number;
  restart_delay: number;
  timeout?: number;
  continue_on_error: boolean;
};

function nonNegative(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) return undefined;
  return value;
}

/**
 * Node config wins over run overrides, which win over built-in defaults.
 * `retries` is clamped to at least one attempt.
 */
export function resolvePhaseConfig(config: PhaseConfig, overrides: PhaseDefaults = {}): ResolvedPhaseConfig {
  const retries = nonNegative(config.retries) ?? nonNegative(overrides.retries) ?? DEFAULT_PHASE_CONFIG.retries;
  const timeout = nonNegative(config.timeout) ?? nonNegative(overrides.timeout);
  return {
    retries: Math.max(1, Math.floor(retries)),
    restart_delay: nonNegative(config.restart_delay) ?? nonNegative(overrides.restart_delay) ?? DEFAULT_PHASE_CONFIG.restart_delay,
    ...(timeout !== undefined && timeout > 0 ? { timeout } : {}),
    continue_on_error: config.continue_on_error === true,
  };
}

export function resolveEdgeConfig(config: EdgeConfigInput = {}): EdgeConfig {
  return {
    ...DEFAULT_EDGE_CONFIG,
    ...config,
    stream: config.stream || DEFAULT_STREAM,
  };
}

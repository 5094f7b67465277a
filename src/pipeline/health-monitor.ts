/**
 * Periodic health checks over one job in a JobRegistry, with bounded
 * automatic restarts. The loop is owned by an AbortController so `stop()`
 * (or the caller's signal) ends it at the next tick.
 */

import type { EventListener } from "./types.js";
import { emitEvent } from "./types.js";
import type { JobRegistry, JobSnapshot } from "./job-registry.js";
import { DEFAULT_MONITOR_CONFIG } from "./config.js";
import { toError } from "./errors.js";
import { sleep } from "./timing.js";

/** Decides whether a job is healthy. Throwing counts as unhealthy. */
export type HealthProbe = (snapshot: JobSnapshot | undefined) => boolean | Promise<boolean>;

export type MonitorOptions = {
  /** Milliseconds between checks. */
  interval: number;
  /** Restart the job once `failureThreshold` consecutive checks fail. */
  restart?: boolean;
  probe?: HealthProbe;
  failureThreshold?: number;
  maxRestarts?: number;
  signal?: AbortSignal;
  onEvent?: EventListener;
};

export type MonitorSummary = {
  checks: number;
  failures: number;
  restarts: number;
  reason: "stopped" | "exhausted" | "restart_failed";
  /** Why the last restart could not be made, when `reason` is "restart_failed". */
  error?: string;
};

export type PhaseMonitor = {
  stop(): void;
  done: Promise<MonitorSummary>;
};

export const defaultProbe: HealthProbe = (snapshot) =>
  snapshot?.status === "running" || snapshot?.status === "completed";

type ProbeOutcome = { healthy: boolean; detail?: string };

async function runProbe(probe: HealthProbe, snapshot: JobSnapshot | undefined): Promise<ProbeOutcome> {
  try {
    return { healthy: (await probe(snapshot)) === true };
  } catch (err) {
    return { healthy: false, detail: toError(err).message };
  }
}

export function monitorPhase(registry: JobRegistry, name: string, options: MonitorOptions): PhaseMonitor {
  const controller = new AbortController();
  const onOuterAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener("abort", onOuterAbort, { once: true });
  }

  const probe = options.probe ?? defaultProbe;
  const threshold = Math.max(1, options.failureThreshold ?? DEFAULT_MONITOR_CONFIG.failureThreshold);
  const maxRestarts = options.maxRestarts ?? DEFAULT_MONITOR_CONFIG.maxRestarts;
  const { onEvent } = options;
  const signal = controller.signal;

  async function loop(): Promise<MonitorSummary> {
    let checks = 0;
    let failures = 0;
    let restarts = 0;
    let consecutive = 0;

    while (!signal.aborted) {
      const ticked = await sleep(options.interval, signal).then(() => true, () => false);
      if (!ticked) break;

      const outcome = await runProbe(probe, registry.status(name));
      if (signal.aborted) break;

      checks++;
      if (registry.status(name)) {
        registry.recordHealth(name, outcome.healthy, outcome.detail);
      }
      if (outcome.healthy) {
        consecutive = 0;
      } else {
        failures++;
        consecutive++;
      }
      emitEvent(onEvent, "health_check", {
        name,
        healthy: outcome.healthy,
        consecutiveFailures: consecutive,
        ...(outcome.detail !== undefined ? { detail: outcome.detail } : {}),
      });

      if (consecutive < threshold || !options.restart) continue;
      consecutive = 0;
      if (restarts >= maxRestarts) {
        emitEvent(onEvent, "health_exhausted", { name, restarts });
        return { checks, failures, restarts, reason: "exhausted" };
      }
      try {
        registry.restart(name);
      } catch (err) {
        const error = toError(err).message;
        emitEvent(onEvent, "health_restart_failed", { name, error });
        return { checks, failures, restarts, reason: "restart_failed", error };
      }
      restarts++;
      emitEvent(onEvent, "health_restart", { name, restarts });
    }

    return { checks, failures, restarts, reason: "stopped" };
  }

  const done = loop().finally(() => {
    options.signal?.removeEventListener("abort", onOuterAbort);
  });

  return {
    stop: () => controller.abort(),
    done,
  };
}

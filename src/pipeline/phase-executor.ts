/**
 * Phase Executor — runs one phase with bounded retries and a fixed delay.
 *
 *   pending → running → completed
 *                     ↘ failed   (after `retries` attempts)
 */

import type { PhaseNode, PhaseRunRecord, PhaseContext, EventListener } from "./types.js";
import { emitEvent } from "./types.js";
import { resolvePhaseConfig, type PhaseDefaults } from "./config.js";
import { invokeExecutor } from "./executors.js";
import { PhaseExecutionError, PhaseTimeoutError, toError } from "./errors.js";
import { sleep, withDeadline } from "./timing.js";

export type PhaseExecutionOptions = {
  graphId: string;
  /** Shared context merged into every attempt's PhaseContext. */
  context?: Record<string, unknown>;
  phaseDefaults?: PhaseDefaults;
  /** Stops further attempts and the retry sleep. */
  signal?: AbortSignal;
  onEvent?: EventListener;
};

async function attemptOnce(
  node: PhaseNode,
  input: unknown,
  attempt: number,
  timeout: number | undefined,
  options: PhaseExecutionOptions,
): Promise<unknown> {
  const controller = new AbortController();
  const onOuterAbort = () => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", onOuterAbort, { once: true });

  const context: PhaseContext = {
    ...options.context,
    phase: node.id,
    attempt,
    graphId: options.graphId,
    signal: controller.signal,
  };

  try {
    const work = invokeExecutor(node.config.executor, input, node.config, context);
    const result = timeout !== undefined
      ? await withDeadline(work, timeout, controller, () => new PhaseTimeoutError(node.id, timeout))
      : await work;
    if (result === null || result === undefined) {
      throw new Error("executor returned no result");
    }
    return result;
  } finally {
    options.signal?.removeEventListener("abort", onOuterAbort);
  }
}

/**
 * Run `node`'s executor until it produces a non-null result or attempts
 * run out. Throws PhaseExecutionError carrying the last error.
 */
export async function executePhase(
  node: PhaseNode,
  input: unknown,
  options: PhaseExecutionOptions,
): Promise<PhaseRunRecord> {
  const resolved = resolvePhaseConfig(node.config, options.phaseDefaults);
  const startedAt = Date.now();
  let lastError: Error = new Error("phase was not attempted");
  let attempts = 0;

  for (let attempt = 1; attempt <= resolved.retries; attempt++) {
    if (options.signal?.aborted) break;
    attempts = attempt;
    try {
      const result = await attemptOnce(node, input, attempt, resolved.timeout, options);
      return {
        phase: node.id,
        result,
        durationMs: Date.now() - startedAt,
        attempts,
        completedAt: Date.now(),
      };
    } catch (err) {
      lastError = toError(err);
    }

    if (attempt < resolved.retries) {
      emitEvent(options.onEvent, "phase_retrying", {
        name: node.id,
        attempt,
        delay: resolved.restart_delay,
        error: lastError.message,
      });
      try {
        await sleep(resolved.restart_delay, options.signal);
      } catch {
        // Aborted during the delay; no further attempts.
        break;
      }
    }
  }

  throw new PhaseExecutionError(node.id, attempts, lastError);
}

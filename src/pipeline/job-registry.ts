/**
 * Job Registry — long-running phase invocations tracked outside one-shot
 * pipeline runs. Each job runs a node through the phase executor with its
 * own abort controller, so stop/restart are deterministic.
 */

import type { EventListener, PhaseRunRecord } from "./types.js";
import { emitEvent } from "./types.js";
import type { Hypergraph } from "./hypergraph.js";
import { executePhase } from "./phase-executor.js";
import { DEFAULT_MONITOR_CONFIG, type PhaseDefaults } from "./config.js";
import { JobStateError, PhaseExecutionError, UnknownNodeError, toError } from "./errors.js";
import { sleep } from "./timing.js";

export type JobStatus = "pending" | "running" | "completed" | "failed" | "stopped";

export type JobTransition = {
  from: JobStatus;
  to: JobStatus;
  at: number;
  error?: string;
};

export type HealthCheckRecord = {
  at: number;
  healthy: boolean;
  detail?: string;
};

export type JobSnapshot = {
  name: string;
  status: JobStatus;
  startedAt: number;
  completedAt?: number;
  uptimeMs?: number;
  attempts: number;
  restartCount: number;
  result?: unknown;
  error?: string;
};

export type JobWaitResult = { status: JobStatus | "timeout" };

export type JobRegistryOptions = {
  onEvent?: EventListener;
  phaseDefaults?: PhaseDefaults;
  context?: Record<string, unknown>;
};

type JobHandle = {
  name: string;
  status: JobStatus;
  input: unknown;
  startedAt: number;
  completedAt?: number;
  attempts: number;
  restartCount: number;
  result?: unknown;
  error?: string;
  /** Bumped on every (re)start; settlements from older generations are dropped. */
  generation: number;
  controller: AbortController;
  settled: Promise<void>;
  transitions: JobTransition[];
  health: HealthCheckRecord[];
};

export class JobRegistry {
  private _jobs = new Map<string, JobHandle>();
  private _graph: Hypergraph;
  private _opts: JobRegistryOptions;

  constructor(graph: Hypergraph, opts: JobRegistryOptions = {}) {
    this._graph = graph;
    this._opts = opts;
  }

  /** Start node `name` as a long-running job. */
  run(name: string, input?: unknown): JobSnapshot {
    const existing = this._jobs.get(name);
    if (existing?.status === "running") {
      throw new JobStateError(name, `Phase "${name}" is already running`, "phase-run");
    }
    const handle = this.start(name, input, existing);
    return this.snapshot(handle);
  }

  /** Abort a running job. Returns false when there was nothing to stop. */
  stop(name: string): boolean {
    const handle = this._jobs.get(name);
    if (!handle || handle.status !== "running") return false;
    handle.generation++;
    handle.controller.abort(new JobStateError(name, `Phase "${name}" was stopped`, "phase-stop"));
    handle.completedAt = Date.now();
    this.transition(handle, "stopped");
    emitEvent(this._opts.onEvent, "job_stopped", { name });
    return true;
  }

  /**
   * Stop (if running) and start again with the previous input. A job that
   * was never started is started with no input and does not count a restart.
   */
  restart(name: string): JobSnapshot {
    const handle = this._jobs.get(name);
    if (!handle) {
      return this.run(name);
    }
    this.stop(name);
    handle.restartCount++;
    this.start(name, handle.input, handle);
    emitEvent(this._opts.onEvent, "job_restarted", { name, restartCount: handle.restartCount });
    return this.snapshot(handle);
  }

  status(name: string): JobSnapshot | undefined {
    const handle = this._jobs.get(name);
    return handle ? this.snapshot(handle) : undefined;
  }

  list(): JobSnapshot[] {
    return [...this._jobs.values()].map((h) => this.snapshot(h));
  }

  transitions(name: string): JobTransition[] {
    return [...(this._jobs.get(name)?.transitions ?? [])];
  }

  /**
   * Poll until the job leaves `running`, or report a timeout. Nothing
   * guarantees a job ever finishes; this only observes.
   */
  async wait(name: string, timeoutMs: number, pollMs: number = DEFAULT_MONITOR_CONFIG.pollInterval): Promise<JobWaitResult> {
    const deadline = Date.now() + timeoutMs;
    while (true) {
      const handle = this._jobs.get(name);
      if (handle && handle.status !== "running" && handle.status !== "pending") {
        return { status: handle.status };
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) return { status: "timeout" };
      await sleep(Math.min(pollMs, remaining));
    }
  }

  /** Resolves once the current invocation of `name` has settled. */
  async settled(name: string): Promise<void> {
    await this._jobs.get(name)?.settled;
  }

  recordHealth(name: string, healthy: boolean, detail?: string): void {
    const handle = this._jobs.get(name);
    if (!handle) throw new JobStateError(name, `Phase "${name}" has never been started`, "health-check");
    handle.health.push({ at: Date.now(), healthy, ...(detail !== undefined ? { detail } : {}) });
    if (handle.health.length > DEFAULT_MONITOR_CONFIG.historyLimit) {
      handle.health.splice(0, handle.health.length - DEFAULT_MONITOR_CONFIG.historyLimit);
    }
  }

  healthHistory(name: string): HealthCheckRecord[] {
    return [...(this._jobs.get(name)?.health ?? [])];
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private start(name: string, input: unknown, previous: JobHandle | undefined): JobHandle {
    const node = this._graph.getNode(name);
    if (!node) throw new UnknownNodeError(name, "phase-run");

    const controller = new AbortController();
    const handle: JobHandle = previous ?? {
      name,
      status: "pending",
      input,
      startedAt: Date.now(),
      attempts: 0,
      restartCount: 0,
      generation: 0,
      controller,
      settled: Promise.resolve(),
      transitions: [],
      health: [],
    };
    handle.generation++;
    handle.input = input;
    handle.controller = controller;
    handle.startedAt = Date.now();
    handle.completedAt = undefined;
    handle.attempts = 0;
    handle.result = undefined;
    handle.error = undefined;
    this._jobs.set(name, handle);
    this.transition(handle, "running");
    emitEvent(this._opts.onEvent, "job_started", { name, generation: handle.generation });

    const generation = handle.generation;
    handle.settled = executePhase(node, input, {
      graphId: this._graph.id,
      context: this._opts.context,
      phaseDefaults: this._opts.phaseDefaults,
      signal: controller.signal,
      onEvent: this._opts.onEvent,
    }).then(
      (record) => this.complete(handle, generation, record),
      (err: unknown) => this.fail(handle, generation, err),
    );
    return handle;
  }

  private complete(handle: JobHandle, generation: number, record: PhaseRunRecord): void {
    if (handle.generation !== generation) return;
    handle.attempts = record.attempts;
    handle.result = record.result;
    handle.completedAt = record.completedAt;
    this.transition(handle, "completed");
    emitEvent(this._opts.onEvent, "job_completed", { name: handle.name, attempts: record.attempts });
  }

  private fail(handle: JobHandle, generation: number, err: unknown): void {
    if (handle.generation !== generation) return;
    const error = toError(err);
    handle.attempts = err instanceof PhaseExecutionError ? err.attempts : handle.attempts;
    handle.error = error.message;
    handle.completedAt = Date.now();
    this.transition(handle, "failed", error.message);
    emitEvent(this._opts.onEvent, "job_failed", { name: handle.name, error: error.message });
  }

  private transition(handle: JobHandle, to: JobStatus, error?: string): void {
    handle.transitions.push({
      from: handle.status,
      to,
      at: Date.now(),
      ...(error !== undefined ? { error } : {}),
    });
    handle.status = to;
  }

  private snapshot(handle: JobHandle): JobSnapshot {
    return {
      name: handle.name,
      status: handle.status,
      startedAt: handle.startedAt,
      ...(handle.completedAt !== undefined ? { completedAt: handle.completedAt } : {}),
      ...(handle.status === "running" ? { uptimeMs: Date.now() - handle.startedAt } : {}),
      attempts: handle.attempts,
      restartCount: handle.restartCount,
      ...(handle.result !== undefined ? { result: handle.result } : {}),
      ...(handle.error !== undefined ? { error: handle.error } : {}),
    };
  }
}

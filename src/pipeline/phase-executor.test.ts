import { describe, it, expect, vi, afterEach } from "vitest";
import { executePhase } from "./phase-executor.js";
import { Hypergraph } from "./hypergraph.js";
import { customExecutor } from "./executors.js";
import { PhaseExecutionError, PhaseTimeoutError } from "./errors.js";
import type { PhaseConfig, PhaseExecutorFn, PhaseNode, PipelineEvent } from "./types.js";

function node(run: PhaseExecutorFn, config: PhaseConfig = {}): PhaseNode {
  const g = new Hypergraph();
  return g.addNode("p", "analysis", { restart_delay: 0, ...config, executor: customExecutor("test", run) });
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

describe("executePhase", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("completes on the first non-null result", async () => {
    const record = await executePhase(node(() => ({ psd: [1, 2] })), {}, { graphId: "g" });
    expect(record.phase).toBe("p");
    expect(record.result).toEqual({ psd: [1, 2] });
    expect(record.attempts).toBe(1);
    expect(record.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("passes input, config and context to the executor", async () => {
    const seen: unknown[] = [];
    const run: PhaseExecutorFn = (input, config, ctx) => {
      seen.push(input, config.channel, ctx.phase, ctx.attempt, ctx.graphId, ctx.session);
      return true;
    };
    await executePhase(node(run, { channel: 4 }), "raw", { graphId: "g-7", context: { session: "s1" } });
    expect(seen).toEqual(["raw", 4, "p", 1, "g-7", "s1"]);
  });

  it("retries until an attempt succeeds", async () => {
    let calls = 0;
    const events: PipelineEvent[] = [];
    const record = await executePhase(
      node(() => {
        calls++;
        if (calls < 3) throw new Error(`flake ${calls}`);
        return "ok";
      }),
      null,
      { graphId: "g", onEvent: (e) => events.push(e) },
    );
    expect(record.attempts).toBe(3);
    expect(record.result).toBe("ok");
    expect(events.map((e) => e.data)).toEqual([
      { name: "p", attempt: 1, delay: 0, error: "flake 1" },
      { name: "p", attempt: 2, delay: 0, error: "flake 2" },
    ]);
    expect(events.every((e) => e.kind === "phase_retrying")).toBe(true);
  });

  it("throws PhaseExecutionError with the last error after exhausting attempts", async () => {
    let calls = 0;
    const err = await rejection(
      executePhase(node(() => { calls++; throw new Error(`bad ${calls}`); }, { retries: 2 }), {}, { graphId: "g" }),
    );
    expect(calls).toBe(2);
    expect(err).toBeInstanceOf(PhaseExecutionError);
    if (!(err instanceof PhaseExecutionError)) return;
    expect(err.phase).toBe("p");
    expect(err.attempts).toBe(2);
    expect(err.lastError.message).toBe("bad 2");
    expect(err.message).toBe('Phase "p" failed after 2 attempt(s): bad 2');
  });

  it("uses three attempts by default", async () => {
    const run = vi.fn(() => { throw new Error("nope"); });
    await rejection(executePhase(node(run), {}, { graphId: "g" }));
    expect(run).toHaveBeenCalledTimes(3);
  });

  it("counts a null or undefined result as a failed attempt", async () => {
    const results: unknown[] = [null, undefined, 0];
    const record = await executePhase(node(() => results.shift()), {}, { graphId: "g" });
    expect(record.attempts).toBe(3);
    expect(record.result).toBe(0);

    const err = await rejection(executePhase(node(() => null, { retries: 1 }), {}, { graphId: "g" }));
    expect(err instanceof PhaseExecutionError && err.lastError.message).toBe("executor returned no result");
  });

  it("applies run-wide retry overrides below node config", async () => {
    const run = vi.fn(() => { throw new Error("x"); });
    await rejection(executePhase(node(run), {}, { graphId: "g", phaseDefaults: { retries: 1 } }));
    expect(run).toHaveBeenCalledTimes(1);

    const pinned = vi.fn(() => { throw new Error("x"); });
    await rejection(executePhase(node(pinned, { retries: 2 }), {}, { graphId: "g", phaseDefaults: { retries: 5 } }));
    expect(pinned).toHaveBeenCalledTimes(2);
  });

  it("fails an attempt that outlives its timeout and aborts its signal", async () => {
    let signal: AbortSignal | undefined;
    const run: PhaseExecutorFn = (_input, _config, ctx) => {
      signal = ctx.signal;
      return new Promise(() => undefined);
    };
    const err = await rejection(executePhase(node(run, { retries: 1, timeout: 20 }), {}, { graphId: "g" }));
    expect(err instanceof PhaseExecutionError && err.lastError).toBeInstanceOf(PhaseTimeoutError);
    expect(err instanceof PhaseExecutionError && err.message).toBe(
      'Phase "p" failed after 1 attempt(s): Phase "p" timed out after 20ms',
    );
    expect(signal?.aborted).toBe(true);
  });

  it("waits restart_delay between attempts", async () => {
    vi.useFakeTimers();
    const run = vi.fn(() => { throw new Error("down"); });
    const outcome = rejection(executePhase(node(run, { restart_delay: 1000 }), {}, { graphId: "g" }));

    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(999);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(3);

    expect(await outcome).toBeInstanceOf(PhaseExecutionError);
  });

  it("stops retrying once the caller's signal aborts", async () => {
    const controller = new AbortController();
    const run = vi.fn(() => {
      controller.abort();
      throw new Error("stopping");
    });
    const err = await rejection(
      executePhase(node(run, { restart_delay: 60_000 }), {}, { graphId: "g", signal: controller.signal }),
    );
    expect(run).toHaveBeenCalledTimes(1);
    expect(err instanceof PhaseExecutionError && err.attempts).toBe(1);
  });

  it("makes no attempt when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const run = vi.fn(() => "never");
    const err = await rejection(executePhase(node(run), {}, { graphId: "g", signal: controller.signal }));
    expect(run).not.toHaveBeenCalled();
    expect(err instanceof PhaseExecutionError && err.message).toBe(
      'Phase "p" failed after 0 attempt(s): phase was not attempted',
    );
  });
});

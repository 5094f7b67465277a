/**
 * Pipeline Orchestrator — drives a hypergraph to completion level by level.
 *
 * Levels run strictly one after another. Inside a parallel level every node
 * gets its own job and the level only ends once all of them have settled.
 * dataFlow is written once per node, by the job that ran it.
 */

import type {
  PipelineResult, PhaseRunRecord, PhaseFailure, LevelReport,
  EventListener, PhaseConfig, PhaseNode,
} from "./types.js";
import { emitEvent } from "./types.js";
import { Hypergraph } from "./hypergraph.js";
import { planExecution, type ExecutionPlan } from "./scheduler.js";
import { executePhase } from "./phase-executor.js";
import { INPUT_KEY, resolvePhaseConfig, type PhaseDefaults } from "./config.js";
import { PhaseExecutionError, UnknownNodeError, toError } from "./errors.js";
import { isPassthrough } from "./executors.js";

export type PipelineOptions = {
  /** Initial input; delivered to every node without incoming edges. */
  input?: unknown;
  /** Run each level's nodes concurrently. */
  parallel?: boolean;
  /** Collect per-level timings into `result.levels`. */
  monitor?: boolean;
  phaseDefaults?: PhaseDefaults;
  /** Shared context handed to every executor. */
  context?: Record<string, unknown>;
  onEvent?: EventListener;
};

export type BatchPhaseSpec = {
  name: string;
  phase: string;
  config?: PhaseConfig;
  /** Upstream phase names; each becomes an edge on a stream named after it. */
  dependencies?: string[];
};

export type BatchOptions = PipelineOptions & {
  name?: string;
};

export type BatchResult = PipelineResult & {
  graph: Hypergraph;
};

type PhaseOutcome =
  | { ok: true; record: PhaseRunRecord }
  | { ok: false; failure: PhaseFailure; error: Error; tolerated: boolean };

/** Serialized size of an output, or 0 when it has no JSON form. */
function payloadSize(value: unknown): number {
  try {
    const json = JSON.stringify(value);
    return json === undefined ? 0 : Buffer.byteLength(json, "utf-8");
  } catch {
    return 0;
  }
}

/**
 * Input for one node: each incoming edge contributes its source's output
 * under the edge's stream name. Nodes without incoming edges receive the
 * initial input when one was supplied. A passthrough node fed by a single
 * edge receives that edge's payload unwrapped, so identity chains hand
 * their data straight through.
 */
function buildInput(graph: Hypergraph, node: PhaseNode, dataFlow: Record<string, unknown>): unknown {
  const incoming = graph.incoming(node.id);
  if (incoming.length === 0) {
    return Object.hasOwn(dataFlow, INPUT_KEY) ? dataFlow[INPUT_KEY] : {};
  }
  if (incoming.length === 1 && isPassthrough(node.config.executor)) {
    const [sole] = incoming;
    return Object.hasOwn(dataFlow, sole.source) ? dataFlow[sole.source] : {};
  }
  const input: Record<string, unknown> = {};
  for (const edge of incoming) {
    if (Object.hasOwn(dataFlow, edge.source)) {
      input[edge.stream] = dataFlow[edge.source];
    }
  }
  return input;
}

/**
 * Run a hypergraph. A cycle aborts before any phase starts; a failing phase
 * without `continue_on_error` rethrows its PhaseExecutionError once its
 * level has settled.
 */
export async function runPipeline(graph: Hypergraph, options: PipelineOptions = {}): Promise<PipelineResult> {
  const parallel = options.parallel === true;
  const { onEvent } = options;

  let plan: ExecutionPlan;
  try {
    plan = planExecution(graph, parallel);
  } catch (err) {
    const error = toError(err);
    graph.state.lastError = error.message;
    emitEvent(onEvent, "pipeline_failed", { error: error.message });
    throw error;
  }

  const dataFlow: Record<string, unknown> = {};
  if (options.input !== undefined) {
    dataFlow[INPUT_KEY] = options.input;
  }

  const completed: string[] = [];
  const failed: PhaseFailure[] = [];
  const records: PhaseRunRecord[] = [];
  const levelReports: LevelReport[] = [];
  const startedAt = Date.now();

  graph.beginRun(plan.order);
  emitEvent(onEvent, "pipeline_started", {
    name: graph.metadata.name,
    nodeCount: plan.order.length,
    levelCount: plan.levels.length,
    parallel,
  });

  async function runNode(nodeId: string): Promise<PhaseOutcome> {
    const node = graph.getNode(nodeId);
    if (!node) {
      // Removed after planning; the run cannot continue on a stale plan.
      const error = new UnknownNodeError(nodeId, "run-pipeline");
      return { ok: false, failure: { phase: nodeId, attempts: 0, error: error.message }, error, tolerated: false };
    }
    const input = buildInput(graph, node, dataFlow);
    graph.markRunning(nodeId);
    emitEvent(onEvent, "phase_started", { name: nodeId, phase: node.phase });

    try {
      const record = await executePhase(node, input, {
        graphId: graph.id,
        context: options.context,
        phaseDefaults: options.phaseDefaults,
        onEvent,
      });
      dataFlow[nodeId] = record.result;
      graph.recordSuccess(nodeId, payloadSize(record.result));
      emitEvent(onEvent, "phase_completed", {
        name: nodeId,
        attempts: record.attempts,
        durationMs: record.durationMs,
      });
      return { ok: true, record };
    } catch (err) {
      const error = toError(err);
      const attempts = err instanceof PhaseExecutionError ? err.attempts : 1;
      graph.recordFailure(nodeId, error.message);
      const tolerated = resolvePhaseConfig(node.config).continue_on_error;
      emitEvent(onEvent, "phase_failed", { name: nodeId, error: error.message, attempts, tolerated });
      return { ok: false, failure: { phase: nodeId, attempts, error: error.message }, error, tolerated };
    }
  }

  function settle(outcome: PhaseOutcome): Error | undefined {
    if (outcome.ok) {
      completed.push(outcome.record.phase);
      records.push(outcome.record);
      return undefined;
    }
    if (outcome.tolerated) {
      failed.push(outcome.failure);
      return undefined;
    }
    return outcome.error;
  }

  function abort(error: Error): never {
    graph.endRun(error.message);
    emitEvent(onEvent, "pipeline_failed", { error: error.message, completed: [...completed] });
    throw error;
  }

  for (const [index, level] of plan.levels.entries()) {
    const levelStart = Date.now();
    emitEvent(onEvent, "level_started", { index, nodes: level });

    if (parallel && level.length > 1) {
      // Barrier: every job in the level settles before the next level starts.
      const outcomes = await Promise.all(level.map((id) => runNode(id)));
      let fatal: Error | undefined;
      for (const outcome of outcomes) {
        const error = settle(outcome);
        if (error && !fatal) fatal = error;
      }
      if (fatal) abort(fatal);
    } else {
      for (const id of level) {
        const fatal = settle(await runNode(id));
        if (fatal) abort(fatal);
      }
    }

    const durationMs = Date.now() - levelStart;
    levelReports.push({ index, nodes: [...level], durationMs });
    emitEvent(onEvent, "level_completed", { index, durationMs });
  }

  graph.endRun();
  const last = completed[completed.length - 1];
  const result: PipelineResult = {
    status: failed.length === 0 ? "success" : "partial_failure",
    completed,
    failed,
    dataFlow,
    finalOutput: last !== undefined ? dataFlow[last] : undefined,
    records,
    durationMs: Date.now() - startedAt,
    ...(options.monitor ? { levels: levelReports } : {}),
  };

  emitEvent(onEvent, "pipeline_completed", {
    status: result.status,
    completed: completed.length,
    failed: failed.length,
    durationMs: result.durationMs,
  });
  return result;
}

/** Single-shot sequential run over `graph` with `input`. */
export function execute(graph: Hypergraph, input?: unknown, options: Omit<PipelineOptions, "input"> = {}): Promise<PipelineResult> {
  return runPipeline(graph, { ...options, input });
}

/** Same as runPipeline, with the parallel/monitor flags spelled out. */
export function pipeline(
  graph: Hypergraph,
  options: PipelineOptions & { parallel: boolean; monitor: boolean },
): Promise<PipelineResult> {
  return runPipeline(graph, options);
}

/** Build a hypergraph from a flat phase list. Dependencies must name phases in the list. */
export function buildBatchGraph(specs: BatchPhaseSpec[], name?: string): Hypergraph {
  const graph = new Hypergraph({ name });
  for (const spec of specs) {
    graph.addNode(spec.name, spec.phase, spec.config ?? {});
  }
  for (const spec of specs) {
    for (const dep of spec.dependencies ?? []) {
      graph.addEdge(dep, spec.name, { stream: dep });
    }
  }
  return graph;
}

/** Build a hypergraph from `specs` and run it. */
export async function batch(specs: BatchPhaseSpec[], options: BatchOptions = {}): Promise<BatchResult> {
  const { name, ...runOptions } = options;
  const graph = buildBatchGraph(specs, name);
  const result = await runPipeline(graph, runOptions);
  return { ...result, graph };
}

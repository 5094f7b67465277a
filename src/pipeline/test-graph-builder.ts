/**
 * Test-only helper for building hypergraphs inline.
 */

import { Hypergraph } from "./hypergraph.js";
import { customExecutor } from "./executors.js";
import type { PhaseConfig, PhaseExecutorFn, EdgeConfigInput } from "./types.js";

export type NodeSpec = {
  id: string;
  /** Defaults to "task". */
  phase?: string;
  /** Wrapped as a custom executor named after the node. */
  run?: PhaseExecutorFn;
  continue_on_error?: boolean;
  retries?: number;
  restart_delay?: number;
  timeout?: number;
};

export type EdgeSpec = {
  from: string;
  to: string;
} & EdgeConfigInput;

export type GraphSpec = {
  name?: string;
  nodes: NodeSpec[];
  edges?: EdgeSpec[];
};

/**
 * Build a Hypergraph from a concise spec. Nodes without `run` pass their
 * input through; `restart_delay` defaults to 0 so retries don't sleep.
 *
 * ```ts
 * const g = graph({
 *   nodes: [{ id: "a" }, { id: "b", run: (input) => ({ seen: input }) }],
 *   edges: [{ from: "a", to: "b", stream: "raw" }],
 * });
 * ```
 */
export function graph(spec: GraphSpec): Hypergraph {
  const g = new Hypergraph({ name: spec.name ?? "test" });
  for (const { id, phase, run, ...config } of spec.nodes) {
    const nodeConfig: PhaseConfig = { restart_delay: 0, ...config };
    if (run) nodeConfig.executor = customExecutor(id, run);
    g.addNode(id, phase ?? "task", nodeConfig);
  }
  for (const { from, to, ...config } of spec.edges ?? []) {
    g.addEdge(from, to, config);
  }
  return g;
}

/** Executor that always throws `message`. */
export function failing(message = "boom"): PhaseExecutorFn {
  return () => {
    throw new Error(message);
  };
}

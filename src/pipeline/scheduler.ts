/**
 * Topological scheduling: a total order for sequential runs and
 * parallel-safe levels for concurrent ones.
 */

import type { Hypergraph } from "./hypergraph.js";
import { CycleError } from "./errors.js";

export type ExecutionPlan = {
  order: string[];
  levels: string[][];
};

/** Insert keeping `queue` sorted by id. */
function enqueue(queue: string[], id: string): void {
  let i = queue.length;
  while (i > 0 && queue[i - 1] > id) i--;
  queue.splice(i, 0, id);
}

/**
 * Kahn's algorithm over edge in-degrees. Among nodes that are ready at the
 * same time the smallest id goes first, so the order does not depend on
 * insertion order. Throws CycleError instead of returning a partial order.
 */
export function topoSort(graph: Hypergraph): string[] {
  const inDegree = new Map<string, number>();
  for (const node of graph.listNodes()) {
    inDegree.set(node.id, 0);
  }
  const edges = graph.listEdges();
  for (const edge of edges) {
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
  }

  const queue: string[] = [];
  for (const [id, degree] of inDegree) {
    if (degree === 0) enqueue(queue, id);
  }

  const order: string[] = [];
  let next = queue.shift();
  while (next !== undefined) {
    order.push(next);
    for (const edge of edges) {
      if (edge.source !== next) continue;
      const remaining = (inDegree.get(edge.target) ?? 0) - 1;
      inDegree.set(edge.target, remaining);
      if (remaining === 0) enqueue(queue, edge.target);
    }
    next = queue.shift();
  }

  if (order.length < inDegree.size) {
    const placed = new Set(order);
    const remaining = [...inDegree.keys()].filter((id) => !placed.has(id)).sort();
    throw new CycleError(remaining);
  }

  return order;
}

/**
 * level(n) = 0 without incoming edges, else 1 + max(level of predecessors).
 * `order` must be topological; each level keeps the relative order of `order`.
 */
export function computeExecutionLevels(graph: Hypergraph, order: string[]): string[][] {
  const levelOf = new Map<string, number>();
  const levels: string[][] = [];

  for (const id of order) {
    let level = 0;
    for (const pred of graph.predecessors(id)) {
      level = Math.max(level, (levelOf.get(pred) ?? 0) + 1);
    }
    levelOf.set(id, level);
    while (levels.length <= level) levels.push([]);
    levels[level].push(id);
  }

  return levels;
}

/** Parallel runs get real levels; sequential runs get one node per level in topological order. */
export function planExecution(graph: Hypergraph, parallel: boolean): ExecutionPlan {
  const order = topoSort(graph);
  const levels = parallel
    ? computeExecutionLevels(graph, order)
    : order.map((id) => [id]);
  return { order, levels };
}

/** Reverse topological order: consumers stop before their producers. */
export function shutdownOrder(graph: Hypergraph): string[] {
  return topoSort(graph).reverse();
}

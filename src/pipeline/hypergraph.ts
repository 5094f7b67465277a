/**
 * Hypergraph — owns phase nodes and named-stream edges.
 *
 * A single owned mutable structure. Callers build it with addNode/addEdge;
 * the orchestrator is the only writer of node status and edge counters
 * while a run is in progress.
 */

import { randomUUID } from "node:crypto";
import type {
  PhaseNode, PhaseConfig, StreamEdge, EdgeConfig, EdgeConfigInput,
  HypergraphMetadata, ExecutionState, HypergraphStats,
} from "./types.js";
import { resolveEdgeConfig } from "./config.js";
import { DuplicateNodeError, UnknownNodeError } from "./errors.js";

export const HYPERGRAPH_VERSION = "1.0.0";

export type HypergraphOptions = {
  id?: string;
  name?: string;
  version?: string;
  createdAt?: number;
};

export function edgeId(source: string, target: string, stream: string): string {
  return `${source}->${target}:${stream}`;
}

/** Deep copy of plain objects and arrays; anything else (functions included) is shared. */
function copyData(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(copyData);
  if (value !== null && typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) out[key] = copyData(v);
    return out;
  }
  return value;
}

function copyNode(node: PhaseNode): PhaseNode {
  const config: PhaseConfig = { ...node.config };
  for (const [key, value] of Object.entries(config)) {
    if (key !== "executor") config[key] = copyData(value);
  }
  return { ...node, config };
}

function copyEdge(edge: StreamEdge): StreamEdge {
  const config: EdgeConfig = { ...edge.config };
  for (const [key, value] of Object.entries(config)) config[key] = copyData(value);
  return { ...edge, config };
}

export class Hypergraph {
  readonly id: string;
  readonly metadata: HypergraphMetadata;
  readonly state: ExecutionState = { running: false, lastOrder: [] };

  private _nodes = new Map<string, PhaseNode>();
  private _edges = new Map<string, StreamEdge>();

  constructor(opts: HypergraphOptions = {}) {
    this.id = opts.id ?? randomUUID();
    this.metadata = {
      name: opts.name ?? "pipeline",
      version: opts.version ?? HYPERGRAPH_VERSION,
      createdAt: opts.createdAt ?? Date.now(),
    };
  }

  // -------------------------------------------------------------------------
  // Build
  // -------------------------------------------------------------------------

  addNode(id: string, phase: string, config: PhaseConfig = {}): PhaseNode {
    if (this._nodes.has(id)) {
      throw new DuplicateNodeError(id);
    }
    const node: PhaseNode = {
      id,
      phase,
      config: { ...config },
      status: "idle",
      createdAt: Date.now(),
      runCount: 0,
      errorCount: 0,
    };
    this._nodes.set(id, node);
    return node;
  }

  /** Re-adding the same (source, target, stream) replaces the earlier edge. */
  addEdge(source: string, target: string, config: EdgeConfigInput = {}): StreamEdge {
    if (!this._nodes.has(source)) throw new UnknownNodeError(source, "add-edge");
    if (!this._nodes.has(target)) throw new UnknownNodeError(target, "add-edge");

    const resolved = resolveEdgeConfig(config);
    const edge: StreamEdge = {
      id: edgeId(source, target, resolved.stream),
      source,
      target,
      stream: resolved.stream,
      config: resolved,
      active: true,
      messagesPassed: 0,
      bytesTransferred: 0,
      createdAt: Date.now(),
    };
    this._edges.set(edge.id, edge);
    return edge;
  }

  /** Removes the node and every edge that starts or ends at it. */
  removeNode(id: string): boolean {
    if (!this._nodes.delete(id)) return false;
    for (const [key, edge] of this._edges) {
      if (edge.source === id || edge.target === id) {
        this._edges.delete(key);
      }
    }
    return true;
  }

  // -------------------------------------------------------------------------
  // Query
  // -------------------------------------------------------------------------

  getNode(id: string): PhaseNode | undefined {
    return this._nodes.get(id);
  }

  hasNode(id: string): boolean {
    return this._nodes.has(id);
  }

  getEdge(id: string): StreamEdge | undefined {
    return this._edges.get(id);
  }

  incoming(id: string): StreamEdge[] {
    return this.listEdges().filter((e) => e.target === id);
  }

  outgoing(id: string): StreamEdge[] {
    return this.listEdges().filter((e) => e.source === id);
  }

  predecessors(id: string): string[] {
    return [...new Set(this.incoming(id).map((e) => e.source))];
  }

  successors(id: string): string[] {
    return [...new Set(this.outgoing(id).map((e) => e.target))];
  }

  neighbors(id: string): string[] {
    return [...new Set([...this.predecessors(id), ...this.successors(id)])];
  }

  listNodes(): PhaseNode[] {
    return [...this._nodes.values()];
  }

  listEdges(): StreamEdge[] {
    return [...this._edges.values()];
  }

  stats(): HypergraphStats {
    const nodes = this.listNodes();
    const edges = this.listEdges();
    return {
      nodeCount: nodes.length,
      edgeCount: edges.length,
      activeEdges: edges.filter((e) => e.active).length,
      phases: [...new Set(nodes.map((n) => n.phase))].sort(),
      running: this.state.running,
      totalRuns: nodes.reduce((sum, n) => sum + n.runCount, 0),
      totalErrors: nodes.reduce((sum, n) => sum + n.errorCount, 0),
      messagesPassed: edges.reduce((sum, e) => sum + e.messagesPassed, 0),
    };
  }

  /** Deep, independent copy. Executor capabilities are shared; they are immutable. */
  clone(): Hypergraph {
    const copy = new Hypergraph({
      id: this.id,
      name: this.metadata.name,
      version: this.metadata.version,
      createdAt: this.metadata.createdAt,
    });
    for (const node of this._nodes.values()) {
      copy._nodes.set(node.id, copyNode(node));
    }
    for (const edge of this._edges.values()) {
      copy._edges.set(edge.id, copyEdge(edge));
    }
    Object.assign(copy.state, { ...this.state, lastOrder: [...this.state.lastOrder] });
    return copy;
  }

  // -------------------------------------------------------------------------
  // Execution bookkeeping (orchestrator only)
  // -------------------------------------------------------------------------

  private requireNode(id: string, operation: string): PhaseNode {
    const node = this._nodes.get(id);
    if (!node) throw new UnknownNodeError(id, operation);
    return node;
  }

  beginRun(order: string[]): void {
    this.state.running = true;
    this.state.lastOrder = [...order];
    this.state.currentPhase = undefined;
    this.state.lastError = undefined;
  }

  endRun(error?: string): void {
    this.state.running = false;
    if (error !== undefined) this.state.lastError = error;
  }

  markRunning(id: string): void {
    const node = this.requireNode(id, "mark-running");
    node.status = "running";
    this.state.currentPhase = id;
  }

  recordSuccess(id: string, payloadBytes: number): void {
    const node = this.requireNode(id, "record-success");
    node.status = "completed";
    node.lastRun = Date.now();
    node.runCount++;
    for (const edge of this.outgoing(id)) {
      edge.messagesPassed++;
      edge.bytesTransferred += payloadBytes;
    }
  }

  recordFailure(id: string, message: string): void {
    const node = this.requireNode(id, "record-failure");
    node.status = "error";
    node.lastRun = Date.now();
    node.errorCount++;
    node.lastError = message;
  }
}

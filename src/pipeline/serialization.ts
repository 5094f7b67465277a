/**
 * JSON export/import of a hypergraph, counters and execution state included.
 *
 * Executor capabilities are functions, so documents carry references
 * (`{ kind, name? }`) that are resolved against an ExecutorRegistry on import.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ExecutorCapability, PhaseConfig } from "./types.js";
import { Hypergraph } from "./hypergraph.js";
import { ExecutorRegistry, PASSTHROUGH } from "./executors.js";
import { DocumentError } from "./errors.js";

export const DOCUMENT_FORMAT = "phaseflow.hypergraph";
export const DOCUMENT_FORMAT_VERSION = 1;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const ExecutorRefSchema = Type.Object({
  kind: Type.Union([Type.Literal("passthrough"), Type.Literal("custom")]),
  name: Type.Optional(Type.String({ minLength: 1 })),
});

/**
 * Well-known phase config keys; anything else is carried through untouched.
 * `executor` is a capability, never data: documents name it beside the config.
 */
export const PhaseConfigSchema = Type.Object(
  {
    executor: Type.Optional(Type.Never()),
    continue_on_error: Type.Optional(Type.Boolean()),
    retries: Type.Optional(Type.Number({ minimum: 0 })),
    restart_delay: Type.Optional(Type.Number({ minimum: 0 })),
    timeout: Type.Optional(Type.Number({ minimum: 0 })),
  },
  { additionalProperties: true },
);

const NodeSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  phase: Type.String({ minLength: 1 }),
  executor: Type.Optional(ExecutorRefSchema),
  config: PhaseConfigSchema,
  status: Type.Union([
    Type.Literal("idle"),
    Type.Literal("running"),
    Type.Literal("completed"),
    Type.Literal("error"),
  ]),
  createdAt: Type.Number(),
  lastRun: Type.Optional(Type.Number()),
  runCount: Type.Integer({ minimum: 0 }),
  errorCount: Type.Integer({ minimum: 0 }),
  lastError: Type.Optional(Type.String()),
});

const EdgeSchema = Type.Object({
  id: Type.String(),
  source: Type.String({ minLength: 1 }),
  target: Type.String({ minLength: 1 }),
  stream: Type.String({ minLength: 1 }),
  config: Type.Object(
    {
      buffer_size: Type.Integer({ minimum: 0 }),
      backpressure: Type.Union([
        Type.Literal("drop_oldest"),
        Type.Literal("block"),
        Type.Literal("throttle"),
      ]),
      multiplex: Type.Boolean(),
    },
    { additionalProperties: true },
  ),
  active: Type.Boolean(),
  messagesPassed: Type.Integer({ minimum: 0 }),
  bytesTransferred: Type.Integer({ minimum: 0 }),
  createdAt: Type.Number(),
});

export const HypergraphDocumentSchema = Type.Object({
  format: Type.Literal(DOCUMENT_FORMAT),
  formatVersion: Type.Literal(DOCUMENT_FORMAT_VERSION),
  id: Type.String({ minLength: 1 }),
  metadata: Type.Object({
    name: Type.String(),
    version: Type.String(),
    createdAt: Type.Number(),
  }),
  state: Type.Object({
    running: Type.Boolean(),
    currentPhase: Type.Optional(Type.String()),
    lastOrder: Type.Array(Type.String()),
    lastError: Type.Optional(Type.String()),
  }),
  nodes: Type.Array(NodeSchema),
  edges: Type.Array(EdgeSchema),
});

export type ExecutorRef = Static<typeof ExecutorRefSchema>;
export type HypergraphDocument = Static<typeof HypergraphDocumentSchema>;

/** Flatten TypeBox errors into `path: message` lines. */
export function schemaIssues(schema: TSchema, value: unknown): string[] {
  return [...Value.Errors(schema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
}

export function parseJson(text: string, operation: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DocumentError(`Invalid JSON: ${message}`, operation);
  }
}

// ---------------------------------------------------------------------------
// Executor references
// ---------------------------------------------------------------------------

export function executorRef(capability: ExecutorCapability): ExecutorRef {
  return capability.kind === "custom"
    ? { kind: "custom", name: capability.name }
    : { kind: "passthrough" };
}

export function resolveExecutorRef(ref: ExecutorRef, registry: ExecutorRegistry, where: string): ExecutorCapability {
  if (ref.kind === "passthrough") return PASSTHROUGH;
  if (ref.name === undefined) {
    throw new DocumentError(`Custom executor on ${where} has no name`, "import-hypergraph");
  }
  return registry.resolve(ref.name);
}

// ---------------------------------------------------------------------------
// Export / import
// ---------------------------------------------------------------------------

export function toDocument(graph: Hypergraph): HypergraphDocument {
  return {
    format: DOCUMENT_FORMAT,
    formatVersion: DOCUMENT_FORMAT_VERSION,
    id: graph.id,
    metadata: { ...graph.metadata },
    state: {
      running: graph.state.running,
      ...(graph.state.currentPhase !== undefined ? { currentPhase: graph.state.currentPhase } : {}),
      lastOrder: [...graph.state.lastOrder],
      ...(graph.state.lastError !== undefined ? { lastError: graph.state.lastError } : {}),
    },
    nodes: graph.listNodes().map((node) => {
      const { executor, ...config } = node.config;
      return {
        id: node.id,
        phase: node.phase,
        ...(executor ? { executor: executorRef(executor) } : {}),
        config,
        status: node.status,
        createdAt: node.createdAt,
        ...(node.lastRun !== undefined ? { lastRun: node.lastRun } : {}),
        runCount: node.runCount,
        errorCount: node.errorCount,
        ...(node.lastError !== undefined ? { lastError: node.lastError } : {}),
      };
    }),
    edges: graph.listEdges().map((edge) => ({
      id: edge.id,
      source: edge.source,
      target: edge.target,
      stream: edge.stream,
      config: { ...edge.config },
      active: edge.active,
      messagesPassed: edge.messagesPassed,
      bytesTransferred: edge.bytesTransferred,
      createdAt: edge.createdAt,
    })),
  };
}

export function exportHypergraph(graph: Hypergraph): string {
  return JSON.stringify(toDocument(graph), null, 2);
}

export function isHypergraphDocument(value: unknown): value is HypergraphDocument {
  return Value.Check(HypergraphDocumentSchema, value);
}

/**
 * Rebuild a hypergraph from an exported document. Custom executors are
 * looked up by name in `registry`.
 */
export function importHypergraph(text: string, registry: ExecutorRegistry = new ExecutorRegistry()): Hypergraph {
  const data = parseJson(text, "import-hypergraph");
  if (!isHypergraphDocument(data)) {
    throw new DocumentError(
      "Not a valid hypergraph document",
      "import-hypergraph",
      schemaIssues(HypergraphDocumentSchema, data),
    );
  }
  return fromDocument(data, registry);
}

export function fromDocument(doc: HypergraphDocument, registry: ExecutorRegistry): Hypergraph {
  const graph = new Hypergraph({
    id: doc.id,
    name: doc.metadata.name,
    version: doc.metadata.version,
    createdAt: doc.metadata.createdAt,
  });

  for (const n of doc.nodes) {
    const config: PhaseConfig = { ...n.config };
    if (n.executor) {
      config.executor = resolveExecutorRef(n.executor, registry, `node "${n.id}"`);
    }
    const node = graph.addNode(n.id, n.phase, config);
    node.status = n.status;
    node.createdAt = n.createdAt;
    node.runCount = n.runCount;
    node.errorCount = n.errorCount;
    if (n.lastRun !== undefined) node.lastRun = n.lastRun;
    if (n.lastError !== undefined) node.lastError = n.lastError;
  }

  const dangling = doc.edges
    .flatMap((e) => [e.source, e.target])
    .filter((id) => !graph.hasNode(id));
  if (dangling.length > 0) {
    throw new DocumentError(
      "Edges reference nodes that are not in the document",
      "import-hypergraph",
      [...new Set(dangling)].map((id) => `unknown node "${id}"`),
    );
  }

  for (const e of doc.edges) {
    const edge = graph.addEdge(e.source, e.target, { ...e.config, stream: e.stream });
    edge.active = e.active;
    edge.messagesPassed = e.messagesPassed;
    edge.bytesTransferred = e.bytesTransferred;
    edge.createdAt = e.createdAt;
  }

  graph.state.running = doc.state.running;
  graph.state.lastOrder = [...doc.state.lastOrder];
  if (doc.state.currentPhase !== undefined) graph.state.currentPhase = doc.state.currentPhase;
  if (doc.state.lastError !== undefined) graph.state.lastError = doc.state.lastError;
  return graph;
}

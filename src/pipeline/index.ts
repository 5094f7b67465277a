/**
 * Phaseflow pipeline engine — public API.
 */

// Types
export type {
  PhaseContext, PhaseExecutorFn, PassThroughExecutor, CustomExecutor, ExecutorCapability,
  PhaseStatus, PhaseConfig, PhaseNode,
  BackpressurePolicy, EdgeConfig, EdgeConfigInput, StreamEdge,
  HypergraphMetadata, ExecutionState, HypergraphStats,
  PhaseRunRecord, PhaseFailure, LevelReport, PipelineStatus, PipelineResult,
  PipelineEvent, PipelineEventKind, EventListener,
} from "./types.js";

// Errors
export {
  HypergraphError, DuplicateNodeError, UnknownNodeError, CycleError,
  PhaseExecutionError, PhaseTimeoutError, UnknownExecutorError,
  DocumentError, JobStateError,
} from "./errors.js";

// Config
export {
  DEFAULT_STREAM, INPUT_KEY,
  DEFAULT_PHASE_CONFIG, DEFAULT_EDGE_CONFIG, DEFAULT_MONITOR_CONFIG,
  resolvePhaseConfig, resolveEdgeConfig,
} from "./config.js";
export type { PhaseDefaults, ResolvedPhaseConfig } from "./config.js";

// Hypergraph
export { Hypergraph, HYPERGRAPH_VERSION, edgeId } from "./hypergraph.js";
export type { HypergraphOptions } from "./hypergraph.js";

// Scheduler
export { topoSort, computeExecutionLevels, planExecution, shutdownOrder } from "./scheduler.js";
export type { ExecutionPlan } from "./scheduler.js";

// Executors
export { ExecutorRegistry, PASSTHROUGH, customExecutor, executorName, mergeStreams } from "./executors.js";
export { executePhase } from "./phase-executor.js";
export type { PhaseExecutionOptions } from "./phase-executor.js";

// Orchestrator
export { runPipeline, execute, pipeline, batch, buildBatchGraph } from "./orchestrator.js";
export type { PipelineOptions, BatchPhaseSpec, BatchOptions, BatchResult } from "./orchestrator.js";

// Jobs and health
export { JobRegistry } from "./job-registry.js";
export type {
  JobStatus, JobSnapshot, JobTransition, JobWaitResult,
  HealthCheckRecord, JobRegistryOptions,
} from "./job-registry.js";
export { monitorPhase, defaultProbe } from "./health-monitor.js";
export type { HealthProbe, MonitorOptions, MonitorSummary, PhaseMonitor } from "./health-monitor.js";

// Documents
export {
  exportHypergraph, importHypergraph, toDocument, fromDocument, isHypergraphDocument,
  HypergraphDocumentSchema, DOCUMENT_FORMAT, DOCUMENT_FORMAT_VERSION,
} from "./serialization.js";
export type { HypergraphDocument, ExecutorRef } from "./serialization.js";
export { parseDefinition, definitionToSpecs, PipelineDefinitionSchema } from "./definition.js";
export type { PipelineDefinition, PhaseDefinition } from "./definition.js";

// Rendering
export { graphToDot } from "./graph-to-dot.js";
export { describeHypergraph } from "./graph-report.js";

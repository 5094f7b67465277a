/**
 * Phaseflow — Core types.
 *
 * A hypergraph here is a graph of phase nodes joined by named-stream edges.
 * Edges stay binary (source → target); the "hyper" part is that one source
 * may fan its output out over several named streams.
 */

// ---------------------------------------------------------------------------
// Executor capabilities
// ---------------------------------------------------------------------------

/** Context handed to an executor on every attempt. */
export type PhaseContext = {
  /** Node id of the phase being run. */
  phase: string;
  /** 1-based attempt number. */
  attempt: number;
  graphId: string;
  /** Fires when the attempt times out or the owning job is stopped. */
  signal?: AbortSignal;
  [key: string]: unknown;
};

/**
 * The code a phase runs. May return a value or a promise of one; a null or
 * undefined result counts as a failed attempt.
 */
export type PhaseExecutorFn = (
  input: unknown,
  config: PhaseConfig,
  context: PhaseContext,
) => unknown;

export type PassThroughExecutor = { kind: "passthrough" };

export type CustomExecutor = {
  kind: "custom";
  /** Registry name, written out on export so the capability can be re-resolved. */
  name: string;
  run: PhaseExecutorFn;
};

export type ExecutorCapability = PassThroughExecutor | CustomExecutor;

// ---------------------------------------------------------------------------
// Graph model
// ---------------------------------------------------------------------------

export type PhaseStatus = "idle" | "running" | "completed" | "error";

export type PhaseConfig = {
  executor?: ExecutorCapability;
  /** Record a failure and keep going instead of aborting the run. */
  continue_on_error?: boolean;
  /** Total attempts, not additional ones. */
  retries?: number;
  /** Fixed delay between attempts, in ms. */
  restart_delay?: number;
  /** Per-attempt deadline, in ms. */
  timeout?: number;
  [key: string]: unknown;
};

export type PhaseNode = {
  id: string;
  /** Open category: acquisition, preprocessing, analysis, output, … */
  phase: string;
  config: PhaseConfig;
  status: PhaseStatus;
  createdAt: number;
  lastRun?: number;
  runCount: number;
  errorCount: number;
  lastError?: string;
};

export type BackpressurePolicy = "drop_oldest" | "block" | "throttle";

/**
 * Transport settings carried on an edge. Enforced by whatever routes the
 * stream, not by this package.
 */
export type EdgeConfig = {
  stream: string;
  buffer_size: number;
  backpressure: BackpressurePolicy;
  multiplex: boolean;
  [key: string]: unknown;
};

export type EdgeConfigInput = Partial<EdgeConfig>;

export type StreamEdge = {
  /** `${source}->${target}:${stream}` */
  id: string;
  source: string;
  target: string;
  stream: string;
  config: EdgeConfig;
  active: boolean;
  messagesPassed: number;
  bytesTransferred: number;
  createdAt: number;
};

export type HypergraphMetadata = {
  name: string;
  version: string;
  createdAt: number;
};

export type ExecutionState = {
  running: boolean;
  currentPhase?: string;
  lastOrder: string[];
  lastError?: string;
};

export type HypergraphStats = {
  nodeCount: number;
  edgeCount: number;
  activeEdges: number;
  phases: string[];
  running: boolean;
  totalRuns: number;
  totalErrors: number;
  messagesPassed: number;
};

// ---------------------------------------------------------------------------
// Execution results
// ---------------------------------------------------------------------------

export type PhaseRunRecord = {
  phase: string;
  result: unknown;
  durationMs: number;
  attempts: number;
  completedAt: number;
};

export type PhaseFailure = {
  phase: string;
  attempts: number;
  error: string;
};

export type LevelReport = {
  index: number;
  nodes: string[];
  durationMs: number;
};

export type PipelineStatus = "success" | "partial_failure";

export type PipelineResult = {
  status: PipelineStatus;
  /** Node ids in dispatch order. */
  completed: string[];
  failed: PhaseFailure[];
  dataFlow: Record<string, unknown>;
  /** Output of the last completed node. */
  finalOutput: unknown;
  records: PhaseRunRecord[];
  durationMs: number;
  /** Present when the run was started with `monitor: true`. */
  levels?: LevelReport[];
};

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type PipelineEventKind =
  | "pipeline_started"
  | "pipeline_completed"
  | "pipeline_failed"
  | "level_started"
  | "level_completed"
  | "phase_started"
  | "phase_retrying"
  | "phase_completed"
  | "phase_failed"
  | "job_started"
  | "job_completed"
  | "job_failed"
  | "job_stopped"
  | "job_restarted"
  | "health_check"
  | "health_restart"
  | "health_restart_failed"
  | "health_exhausted";

export type PipelineEvent = {
  kind: PipelineEventKind;
  timestamp: string;
  data: Record<string, unknown>;
};

export type EventListener = (event: PipelineEvent) => void;

export function emitEvent(
  onEvent: EventListener | undefined,
  kind: PipelineEventKind,
  data: Record<string, unknown> = {},
): void {
  onEvent?.({
    kind,
    timestamp: new Date().toISOString(),
    data,
  });
}

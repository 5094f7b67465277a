/**
 * Error hierarchy. Every error carries the operation that raised it so
 * callers can log `[operation] message` without inspecting the class.
 */

export class HypergraphError extends Error {
  readonly operation: string;

  constructor(message: string, operation: string) {
    super(message);
    this.name = "HypergraphError";
    this.operation = operation;
  }
}

// ---------------------------------------------------------------------------
// Structural errors (never retried)
// ---------------------------------------------------------------------------

export class DuplicateNodeError extends HypergraphError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super(`Node "${nodeId}" already exists`, "add-node");
    this.name = "DuplicateNodeError";
    this.nodeId = nodeId;
  }
}

export class UnknownNodeError extends HypergraphError {
  readonly nodeId: string;

  constructor(nodeId: string, operation: string) {
    super(`Node "${nodeId}" does not exist`, operation);
    this.name = "UnknownNodeError";
    this.nodeId = nodeId;
  }
}

export class CycleError extends HypergraphError {
  /** Nodes that could not be placed in the order. */
  readonly remaining: string[];

  constructor(remaining: string[]) {
    super(`Hypergraph contains a cycle involving: ${remaining.join(", ")}`, "topo-sort");
    this.name = "CycleError";
    this.remaining = remaining;
  }
}

// ---------------------------------------------------------------------------
// Phase errors
// ---------------------------------------------------------------------------

export class PhaseExecutionError extends HypergraphError {
  readonly phase: string;
  readonly attempts: number;
  readonly lastError: Error;

  constructor(phase: string, attempts: number, lastError: Error) {
    super(
      `Phase "${phase}" failed after ${attempts} attempt(s): ${lastError.message}`,
      "execute-phase",
    );
    this.name = "PhaseExecutionError";
    this.phase = phase;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class PhaseTimeoutError extends HypergraphError {
  readonly phase: string;
  readonly timeoutMs: number;

  constructor(phase: string, timeoutMs: number) {
    super(`Phase "${phase}" timed out after ${timeoutMs}ms`, "execute-phase");
    this.name = "PhaseTimeoutError";
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

export class UnknownExecutorError extends HypergraphError {
  readonly executor: string;

  constructor(executor: string, known: string[]) {
    super(
      `Unknown executor "${executor}" (registered: ${known.join(", ") || "none"})`,
      "resolve-executor",
    );
    this.name = "UnknownExecutorError";
    this.executor = executor;
  }
}

// ---------------------------------------------------------------------------
// Documents and jobs
// ---------------------------------------------------------------------------

export class DocumentError extends HypergraphError {
  readonly issues: string[];

  constructor(message: string, operation: string, issues: string[] = []) {
    const detail = issues.length > 0 ? `\n${issues.map((i) => `  ${i}`).join("\n")}` : "";
    super(`${message}${detail}`, operation);
    this.name = "DocumentError";
    this.issues = issues;
  }
}

export class JobStateError extends HypergraphError {
  readonly job: string;

  constructor(job: string, message: string, operation: string) {
    super(message, operation);
    this.name = "JobStateError";
    this.job = job;
  }
}

/** Normalize anything thrown into an Error. */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}

/**
 * Phaseflow — runs phase pipelines laid out as a hypergraph of named
 * streams, with topological levels, per-phase retries and long-running
 * jobs under health monitoring.
 *
 * @module phaseflow
 */

export * from "./pipeline/index.js";

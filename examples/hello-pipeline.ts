/**
 * Minimal example: build a three-phase hypergraph, run it, and print the
 * resulting DOT graph.
 *
 *   npx tsx examples/hello-pipeline.ts
 */

import {
  Hypergraph,
  PASSTHROUGH,
  customExecutor,
  graphToDot,
  runPipeline,
} from "../src/pipeline/index.js";
import type { PhaseExecutorFn, PipelineEvent } from "../src/pipeline/index.js";

// -- 1. Executors -------------------------------------------------------

function samples(value: unknown): number[] {
  if (typeof value !== "object" || value === null || !("samples" in value)) return [];
  const list = value.samples;
  return Array.isArray(list) ? list.filter((v): v is number => typeof v === "number") : [];
}

const smooth: PhaseExecutorFn = async (input) => {
  const raw = typeof input === "object" && input !== null && "raw" in input ? input.raw : undefined;
  const values = samples(raw);
  // Simulate work
  await new Promise((r) => setTimeout(r, 50));
  return { samples: values.map((v, i) => (v + (values[i - 1] ?? v)) / 2) };
};

const summarize: PhaseExecutorFn = (input) => {
  const smoothed = typeof input === "object" && input !== null && "smoothed" in input ? input.smoothed : undefined;
  const values = samples(smoothed);
  return { count: values.length, peak: Math.max(...values) };
};

// -- 2. Graph -----------------------------------------------------------

const graph = new Hypergraph({ name: "hello-pipeline" });
graph.addNode("acquire", "acquisition", { executor: PASSTHROUGH });
graph.addNode("smooth", "preprocessing", { executor: customExecutor("smooth", smooth), retries: 2 });
graph.addNode("summarize", "analysis", { executor: customExecutor("summarize", summarize) });
graph.addEdge("acquire", "smooth", { stream: "raw" });
graph.addEdge("smooth", "summarize", { stream: "smoothed" });

// -- 3. Run -------------------------------------------------------------

const onEvent = (event: PipelineEvent) => {
  if (event.kind === "phase_completed") {
    console.log(`   ✔ ${String(event.data.name)}`);
  }
};

const result = await runPipeline(graph, { input: { samples: [2, 4, 8, 4] }, onEvent });
console.log();
console.log("Status:", result.status);
console.log("Output:", result.finalOutput);
console.log();
console.log(graphToDot(graph));

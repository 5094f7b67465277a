#!/usr/bin/env node
/**
 * Phaseflow CLI — run, validate and inspect pipeline definitions.
 *
 * Usage:
 *   phaseflow run <pipeline.json> [options]
 *   phaseflow validate <pipeline.json>
 *   phaseflow show <pipeline.json|export.json> [--format markdown|dot|json]
 */

import { readFile, writeFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import {
  ExecutorRegistry,
  PhaseExecutionError,
  HypergraphError,
  DOCUMENT_FORMAT,
  buildBatchGraph,
  definitionToSpecs,
  describeHypergraph,
  exportHypergraph,
  graphToDot,
  importHypergraph,
  parseDefinition,
  planExecution,
  runPipeline,
} from "./pipeline/index.js";
import type { Hypergraph, PhaseDefaults, PipelineEvent } from "./pipeline/index.js";
import {
  renderBanner,
  renderSummary,
  renderMarkdown,
  renderFailureSummary,
  formatDuration,
} from "./cli-renderer.js";

export type CliArgs = Record<string, string | boolean>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function usage(): never {
  console.log(`
phaseflow — hypergraph pipeline runner

Usage:
  phaseflow run <pipeline.json|export.json>      Run a pipeline or an exported graph
  phaseflow validate <pipeline.json>             Check phases, references and cycles
  phaseflow show <pipeline.json|export.json>     Describe a pipeline or an exported graph

Run options:
  --parallel             Run independent phases of a level concurrently
  --monitor              Report per-level timings
  --input <json>         Initial input handed to root phases
  --retries <n>          Default attempts per phase (default: 3)
  --restart-delay <ms>   Default delay between attempts (default: 1000)
  --timeout <ms>         Default per-attempt deadline
  --executors <module>   ES module exporting register(registry)
  --export <file>        Write the executed graph as JSON
  --allow-partial        Exit 0 when tolerated phases failed
  --verbose              Show every event with its data

Show options:
  --format <fmt>         markdown | dot | json (default: markdown)
`.trim());
  process.exit(1);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        args[key] = next;
        i++;
      } else {
        args[key] = true;
      }
    } else {
      positional.push(arg);
    }
  }

  if (positional[0]) args._command = positional[0];
  if (positional[1]) args._file = positional[1];

  return args;
}

function stringOption(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function numberOption(args: CliArgs, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  const value = typeof raw === "string" ? Number(raw) : Number.NaN;
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`--${key} expects a non-negative number`);
  }
  return value;
}

function phaseDefaultsFrom(args: CliArgs): PhaseDefaults {
  const defaults: PhaseDefaults = {};
  const retries = numberOption(args, "retries");
  const restartDelay = numberOption(args, "restart-delay");
  const timeout = numberOption(args, "timeout");
  if (retries !== undefined) defaults.retries = retries;
  if (restartDelay !== undefined) defaults.restart_delay = restartDelay;
  if (timeout !== undefined) defaults.timeout = timeout;
  return defaults;
}

function inputFrom(args: CliArgs): unknown {
  const raw = stringOption(args, "input");
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid --input JSON: ${message}`);
  }
}

/** Build a registry, extended by an `--executors` module when given. */
async function loadRegistry(args: CliArgs): Promise<ExecutorRegistry> {
  const registry = new ExecutorRegistry();
  const modulePath = stringOption(args, "executors");
  if (modulePath === undefined) return registry;

  const mod: unknown = await import(pathToFileURL(resolve(modulePath)).href);
  if (typeof mod !== "object" || mod === null || !("register" in mod) || typeof mod.register !== "function") {
    throw new Error(`${modulePath} does not export a register(registry) function`);
  }
  await mod.register(registry);
  return registry;
}

function pipelineName(filePath: string, declared: string | undefined): string {
  return declared ?? basename(filePath).replace(/\.json$/i, "");
}

function declaredFormat(text: string): unknown {
  try {
    const data: unknown = JSON.parse(text);
    return typeof data === "object" && data !== null && "format" in data ? data.format : undefined;
  } catch {
    // Not JSON; parseDefinition reports it.
    return undefined;
  }
}

interface LoadedPipeline {
  graph: Hypergraph;
  /** Set by a definition's `parallel` field; exported documents carry none. */
  parallel: boolean;
}

/** A pipeline definition or an exported hypergraph document, by its `format` field. */
async function loadPipeline(filePath: string, registry: ExecutorRegistry): Promise<LoadedPipeline> {
  const text = await readFile(resolve(filePath), "utf-8");
  if (declaredFormat(text) === DOCUMENT_FORMAT) {
    return { graph: importHypergraph(text, registry), parallel: false };
  }
  const def = parseDefinition(text);
  return {
    graph: buildBatchGraph(definitionToSpecs(def, registry), pipelineName(filePath, def.name)),
    parallel: def.parallel === true,
  };
}

async function loadGraph(filePath: string, registry: ExecutorRegistry): Promise<Hypergraph> {
  return (await loadPipeline(filePath, registry)).graph;
}

function eventIcon(kind: PipelineEvent["kind"]): string {
  const icons: Partial<Record<PipelineEvent["kind"], string>> = {
    pipeline_started: "🚀",
    level_started: "▸",
    phase_started: "▶️ ",
    phase_retrying: "🔄",
    phase_completed: "✅",
    phase_failed: "💥",
    pipeline_completed: "🏁",
    pipeline_failed: "❌",
  };
  return icons[kind] ?? "·";
}

function printEvent(event: PipelineEvent, verbose: boolean): void {
  const d = event.data;
  if (verbose) {
    console.log(`  ${eventIcon(event.kind)} ${event.kind.padEnd(20)} ${JSON.stringify(d)}`);
    return;
  }
  const ms = (value: unknown) => formatDuration(typeof value === "number" ? value : 0);

  switch (event.kind) {
    case "pipeline_started":
      console.log("  🚀 Pipeline started\n");
      break;
    case "phase_started":
      console.log(`  ▶ ${String(d.name)}`);
      break;
    case "phase_retrying":
      console.log(
        `  🔄 ${String(d.name)} attempt ${String(d.attempt)} failed: ${String(d.error)} (retrying in ${ms(d.delay)})`,
      );
      break;
    case "phase_completed": {
      const attempts = typeof d.attempts === "number" && d.attempts > 1 ? `, ${d.attempts} attempts` : "";
      console.log(`  ✔ ${String(d.name)} (${ms(d.durationMs)}${attempts})`);
      break;
    }
    case "phase_failed":
      console.log(`  ✘ ${String(d.name)} — ${String(d.error)}${d.tolerated === true ? " (continuing)" : ""}`);
      break;
    case "pipeline_completed":
      console.log(`\n  🏁 Pipeline completed (${ms(d.durationMs)})`);
      break;
    case "pipeline_failed":
      console.log(`\n  ❌ Pipeline failed: ${String(d.error)}`);
      break;
  }
}

async function writeExport(graph: Hypergraph, args: CliArgs): Promise<void> {
  const target = stringOption(args, "export");
  if (target === undefined) return;
  await writeFile(resolve(target), exportHypergraph(graph) + "\n", "utf-8");
  console.log(`  💾 Exported graph to ${target}`);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export async function cmdValidate(filePath: string, args: CliArgs = {}): Promise<void> {
  let graph: Hypergraph;
  let levels: string[][];
  try {
    graph = await loadGraph(filePath, await loadRegistry(args));
    levels = planExecution(graph, true).levels;
  } catch (err) {
    if (!(err instanceof HypergraphError)) throw err;
    console.log(`❌ ${filePath}: ${err.message}`);
    process.exit(1);
  }

  const stats = graph.stats();
  console.log(`✅ ${filePath}: valid (${stats.nodeCount} phases, ${levels.length} levels)`);
  levels.forEach((level, i) => {
    console.log(`   Level ${i + 1}: ${level.join(", ")}`);
  });
}

export async function cmdShow(filePath: string, args: CliArgs = {}): Promise<void> {
  const format = stringOption(args, "format") ?? "markdown";
  if (format !== "markdown" && format !== "dot" && format !== "json") {
    console.error(`Invalid --format value: "${format}". Must be one of: markdown, dot, json`);
    process.exit(1);
  }

  const graph = await loadGraph(filePath, await loadRegistry(args));
  switch (format) {
    case "dot":
      process.stdout.write(graphToDot(graph));
      break;
    case "json":
      process.stdout.write(exportHypergraph(graph) + "\n");
      break;
    case "markdown":
      console.log(renderMarkdown(describeHypergraph(graph)));
      break;
  }
}

export async function cmdRun(filePath: string, args: CliArgs = {}): Promise<void> {
  const loaded = await loadPipeline(filePath, await loadRegistry(args));
  const graph = loaded.graph;

  const parallel = args.parallel === true || loaded.parallel;
  const verbose = args.verbose === true;
  const plan = planExecution(graph, parallel);

  console.log(renderBanner({
    name: graph.metadata.name,
    nodeCount: plan.order.length,
    levelCount: plan.levels.length,
    parallel,
  }));

  try {
    const result = await runPipeline(graph, {
      input: inputFrom(args),
      parallel,
      monitor: args.monitor === true,
      phaseDefaults: phaseDefaultsFrom(args),
      onEvent: (event) => printEvent(event, verbose),
    });

    console.log(renderSummary(result));
    for (const failure of result.failed) {
      console.log(renderFailureSummary(failure));
    }
    await writeExport(graph, args);

    if (result.status === "partial_failure" && args["allow-partial"] !== true) {
      process.exit(1);
    }
  } catch (err) {
    if (!(err instanceof PhaseExecutionError)) throw err;
    console.log(renderFailureSummary({
      phase: err.phase,
      attempts: err.attempts,
      error: err.lastError.message,
    }));
    await writeExport(graph, args);
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const file = stringOption(args, "_file");

  switch (args._command) {
    case "run":
    case "validate":
    case "show": {
      if (file === undefined) {
        console.error(`Error: ${args._command} requires a pipeline file path`);
        usage();
      }
      if (args._command === "run") await cmdRun(file, args);
      else if (args._command === "validate") await cmdValidate(file, args);
      else await cmdShow(file, args);
      break;
    }
    default:
      usage();
  }
}

const isDirectRun = process.argv[1] != null
  && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  main().catch((err: unknown) => {
    console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}

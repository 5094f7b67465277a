/**
 * Markdown summary of a hypergraph: stats, execution levels, nodes, edges.
 * The CLI renders it through marked-terminal; it is plain markdown otherwise.
 */

import type { Hypergraph } from "./hypergraph.js";
import { topoSort, computeExecutionLevels } from "./scheduler.js";
import { executorName } from "./executors.js";
import { CycleError } from "./errors.js";

/** Escape pipes so values can sit in a table cell. */
function cell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

function levelSection(graph: Hypergraph): string[] {
  let order: string[];
  try {
    order = topoSort(graph);
  } catch (err) {
    if (err instanceof CycleError) {
      return [`_Cycle detected between: ${err.remaining.join(", ")}_`];
    }
    throw err;
  }
  if (order.length === 0) return ["_No phases._"];
  return computeExecutionLevels(graph, order).map(
    (level, i) => `${i + 1}. ${level.map((id) => `\`${id}\``).join(", ")}`,
  );
}

export function describeHypergraph(graph: Hypergraph): string {
  const stats = graph.stats();
  const lines: string[] = [];

  lines.push(`# ${graph.metadata.name}`);
  lines.push("");
  lines.push("| Stat | Value |");
  lines.push("| --- | --- |");
  lines.push(`| Nodes | ${stats.nodeCount} |`);
  lines.push(`| Edges | ${stats.edgeCount} (${stats.activeEdges} active) |`);
  lines.push(`| Phases | ${cell(stats.phases.join(", ") || "-")} |`);
  lines.push(`| Runs | ${stats.totalRuns} |`);
  lines.push(`| Errors | ${stats.totalErrors} |`);
  lines.push(`| Messages | ${stats.messagesPassed} |`);
  lines.push("");

  lines.push("## Levels");
  lines.push("");
  lines.push(...levelSection(graph));
  lines.push("");

  const nodes = graph.listNodes();
  if (nodes.length > 0) {
    lines.push("## Nodes");
    lines.push("");
    lines.push("| Node | Phase | Executor | Status | Runs | Errors |");
    lines.push("| --- | --- | --- | --- | --- | --- |");
    for (const node of nodes) {
      lines.push(
        `| ${cell(node.id)} | ${cell(node.phase)} | ${cell(executorName(node.config.executor))} | ` +
          `${node.status} | ${node.runCount} | ${node.errorCount} |`,
      );
    }
    lines.push("");
  }

  const edges = graph.listEdges();
  if (edges.length > 0) {
    lines.push("## Edges");
    lines.push("");
    lines.push("| From | To | Stream | Messages | Bytes |");
    lines.push("| --- | --- | --- | --- | --- |");
    for (const edge of edges) {
      lines.push(
        `| ${cell(edge.source)} | ${cell(edge.target)} | ${cell(edge.stream)} | ` +
          `${edge.messagesPassed} | ${edge.bytesTransferred} |`,
      );
    }
    lines.push("");
  }

  return lines.join("\n");
}

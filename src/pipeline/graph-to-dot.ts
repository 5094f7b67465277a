/**
 * Render a {@link Hypergraph} as Graphviz DOT, for `dot -Tsvg` and friends.
 */

import type { Hypergraph } from "./hypergraph.js";
import type { PhaseNode, StreamEdge } from "./types.js";

function dotEscape(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function formatAttr(key: string, value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  return `${key}=${dotEscape(String(value))}`;
}

/** `[key="value", ...]`, or nothing when every value is absent. */
function attrList(attrs: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(attrs)) {
    const formatted = formatAttr(key, value);
    if (formatted) parts.push(formatted);
  }
  return parts.length > 0 ? ` [${parts.join(", ")}]` : "";
}

const STATUS_COLORS: Record<PhaseNode["status"], string | undefined> = {
  idle: undefined,
  running: "lightblue",
  completed: "palegreen",
  error: "lightpink",
};

function nodeAttrs(node: PhaseNode): Record<string, unknown> {
  const color = STATUS_COLORS[node.status];
  return {
    label: `${node.id} (${node.phase})`,
    shape: "box",
    ...(color ? { style: "filled", fillcolor: color } : {}),
  };
}

function edgeAttrs(edge: StreamEdge): Record<string, unknown> {
  return {
    label: edge.stream,
    ...(edge.active ? {} : { style: "dashed" }),
  };
}

export function graphToDot(graph: Hypergraph): string {
  const indent = "  ";
  const lines: string[] = [];

  lines.push(`digraph ${dotEscape(graph.metadata.name)} {`);
  lines.push(`${indent}rankdir="LR";`);
  lines.push("");

  for (const node of graph.listNodes()) {
    lines.push(`${indent}${dotEscape(node.id)}${attrList(nodeAttrs(node))};`);
  }
  lines.push("");

  for (const edge of graph.listEdges()) {
    lines.push(
      `${indent}${dotEscape(edge.source)} -> ${dotEscape(edge.target)}${attrList(edgeAttrs(edge))};`,
    );
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}

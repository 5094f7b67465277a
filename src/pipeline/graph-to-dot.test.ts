import { describe, it, expect } from "vitest";
import { graphToDot } from "./graph-to-dot.js";
import { Hypergraph } from "./hypergraph.js";

describe("graphToDot", () => {
  it("serializes nodes with their phase and edges with their stream", () => {
    const graph = new Hypergraph({ name: "eeg" });
    graph.addNode("acquire", "acquisition");
    graph.addNode("filter", "preprocessing");
    graph.addEdge("acquire", "filter", { stream: "raw" });

    expect(graphToDot(graph)).toBe(
      [
        'digraph "eeg" {',
        '  rankdir="LR";',
        "",
        '  "acquire" [label="acquire (acquisition)", shape="box"];',
        '  "filter" [label="filter (preprocessing)", shape="box"];',
        "",
        '  "acquire" -> "filter" [label="raw"];',
        "}",
        "",
      ].join("\n"),
    );
  });

  it("escapes quotes and backslashes", () => {
    const graph = new Hypergraph({ name: 'say "hi"' });
    graph.addNode("a\\b", "x");

    const dot = graphToDot(graph);
    expect(dot.split("\n")[0]).toBe('digraph "say \\"hi\\"" {');
    expect(dot).toContain('  "a\\\\b" [label="a\\\\b (x)", shape="box"];');
  });

  it("fills nodes by status and dashes inactive edges", () => {
    const graph = new Hypergraph();
    graph.addNode("a", "x");
    graph.addNode("b", "x");
    const edge = graph.addEdge("a", "b");
    edge.active = false;
    graph.recordSuccess("a", 0);
    graph.recordFailure("b", "boom");

    const dot = graphToDot(graph);
    expect(dot).toContain('  "a" [label="a (x)", shape="box", style="filled", fillcolor="palegreen"];');
    expect(dot).toContain('  "b" [label="b (x)", shape="box", style="filled", fillcolor="lightpink"];');
    expect(dot).toContain('  "a" -> "b" [label="data", style="dashed"];');
  });

  it("renders one edge line per stream between the same pair", () => {
    const graph = new Hypergraph();
    graph.addNode("a", "x");
    graph.addNode("b", "x");
    graph.addEdge("a", "b", { stream: "left" });
    graph.addEdge("a", "b", { stream: "right" });

    const edgeLines = graphToDot(graph).split("\n").filter((l) => l.includes("->"));
    expect(edgeLines).toEqual([
      '  "a" -> "b" [label="left"];',
      '  "a" -> "b" [label="right"];',
    ]);
  });
});

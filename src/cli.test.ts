import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, writeFile, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

vi.mock("./cli-renderer.js", async () => {
  const actual = await vi.importActual<typeof import("./cli-renderer.js")>("./cli-renderer.js");
  return {
    ...actual,
    renderMarkdown: vi.fn((s: string) => s),
  };
});

import { parseArgs, cmdValidate, cmdShow, cmdRun } from "./cli.js";
import { importHypergraph } from "./pipeline/index.js";

const INGEST = {
  name: "ingest",
  phases: [
    { name: "fetch", phase: "acquisition" },
    { name: "clean", phase: "preprocessing", executor: "merge", dependencies: ["fetch"] },
    { name: "index", phase: "storage", dependencies: ["fetch"] },
  ],
};

const FAILING_EXECUTORS = `
export function register(registry) {
  registry.register("flaky", () => {
    throw new Error("sensor offline");
  });
}
`;

describe("parseArgs", () => {
  it("splits positionals from flags and keeps flag values as strings", () => {
    const args = parseArgs(["run", "p.json", "--parallel", "--retries", "2", "--input", '{"a":1}', "--verbose"]);
    expect(args).toEqual({
      _command: "run",
      _file: "p.json",
      parallel: true,
      retries: "2",
      input: '{"a":1}',
      verbose: true,
    });
  });
});

describe("commands", () => {
  let tempDir: string;
  let logs: string[];
  let errors: string[];
  let written: string[];

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "phaseflow-cli-"));
    logs = [];
    errors = [];
    written = [];
    vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
      logs.push(parts.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...parts: unknown[]) => {
      errors.push(parts.map(String).join(" "));
    });
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  async function file(name: string, content: unknown): Promise<string> {
    const path = join(tempDir, name);
    await writeFile(path, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
    return path;
  }

  // -------------------------------------------------------------------------
  // validate
  // -------------------------------------------------------------------------

  describe("cmdValidate", () => {
    it("prints the phase count and levels", async () => {
      const path = await file("ingest.json", INGEST);
      await cmdValidate(path);
      expect(logs).toEqual([
        `✅ ${path}: valid (3 phases, 2 levels)`,
        "   Level 1: fetch",
        "   Level 2: clean, index",
      ]);
    });

    it("reports a cycle and exits 1", async () => {
      const path = await file("loop.json", {
        phases: [
          { name: "a", phase: "x", dependencies: ["b"] },
          { name: "b", phase: "x", dependencies: ["a"] },
        ],
      });
      await expect(cmdValidate(path)).rejects.toThrow("exit 1");
      expect(logs).toEqual([`❌ ${path}: Hypergraph contains a cycle involving: a, b`]);
    });

    it("reports broken references", async () => {
      const path = await file("broken.json", { phases: [{ name: "a", phase: "x", dependencies: ["ghost"] }] });
      await expect(cmdValidate(path)).rejects.toThrow("exit 1");
      expect(logs).toEqual([
        `❌ ${path}: Pipeline definition has broken references\n  phase "a" depends on unknown phase "ghost"`,
      ]);
    });

    it("reports an executor the registry does not know", async () => {
      const path = await file("fft.json", { phases: [{ name: "a", phase: "x", executor: "fft" }] });
      await expect(cmdValidate(path)).rejects.toThrow("exit 1");
      expect(logs[0]).toMatch(new RegExp(`^❌ ${path}: `));
    });
  });

  // -------------------------------------------------------------------------
  // show
  // -------------------------------------------------------------------------

  describe("cmdShow", () => {
    it("rejects an unknown format", async () => {
      const path = await file("ingest.json", INGEST);
      await expect(cmdShow(path, { format: "svg" })).rejects.toThrow("exit 1");
      expect(errors).toEqual(['Invalid --format value: "svg". Must be one of: markdown, dot, json']);
    });

    it("writes DOT to stdout", async () => {
      const path = await file("ingest.json", INGEST);
      await cmdShow(path, { format: "dot" });
      const dot = written.join("");
      expect(dot.split("\n")[0]).toBe('digraph "ingest" {');
      expect(dot).toContain('  "fetch" -> "clean" [label="fetch"];');
    });

    it("names the graph after the file when the definition has no name", async () => {
      const path = await file("nightly.json", { phases: [{ name: "a", phase: "x" }] });
      await cmdShow(path, { format: "dot" });
      expect(written.join("").split("\n")[0]).toBe('digraph "nightly" {');
    });

    it("writes an exported document as JSON", async () => {
      const path = await file("ingest.json", INGEST);
      await cmdShow(path, { format: "json" });
      const doc: unknown = JSON.parse(written.join(""));
      expect(doc).toMatchObject({ format: "phaseflow.hypergraph", metadata: { name: "ingest" } });
    });

    it("describes an exported graph as markdown", async () => {
      const source = await file("ingest.json", INGEST);
      await cmdShow(source, { format: "json" });
      const exported = await file("export.json", written.join(""));

      await cmdShow(exported);
      expect(logs).toHaveLength(1);
      expect(logs[0].split("\n")[0]).toBe("# ingest");
      expect(logs[0]).toContain("1. `fetch`");
    });
  });

  // -------------------------------------------------------------------------
  // run
  // -------------------------------------------------------------------------

  describe("cmdRun", () => {
    it("runs a definition and exports the executed graph", async () => {
      const path = await file("ingest.json", INGEST);
      const out = join(tempDir, "out.json");

      await cmdRun(path, { input: '{"id":1}', export: out });

      expect(logs).toContain("  🚀 Pipeline started\n");
      expect(logs).toContain("  ▶ fetch");
      expect(logs.some((l) => /^  ✔ clean \(\d+ms\)$/.test(l))).toBe(true);
      expect(logs.some((l) => l.includes("✔ success"))).toBe(true);
      expect(logs.at(-1)).toBe(`  💾 Exported graph to ${out}`);

      const restored = importHypergraph(await readFile(out, "utf-8"));
      expect(restored.state.lastOrder).toEqual(["fetch", "clean", "index"]);
      expect(restored.getNode("clean")?.runCount).toBe(1);
      expect(restored.getNode("clean")?.errorCount).toBe(0);
    });

    it("runs an exported graph document", async () => {
      const source = await file("ingest.json", INGEST);
      await cmdShow(source, { format: "json" });
      const exported = await file("export.json", written.join(""));
      const out = join(tempDir, "out.json");

      logs = [];
      await cmdRun(exported, { input: '{"id":1}', export: out });

      expect(logs).toContain("  ▶ index");
      expect(logs.some((l) => l.includes("✔ success"))).toBe(true);
      const restored = importHypergraph(await readFile(out, "utf-8"));
      expect(restored.state.lastOrder).toEqual(["fetch", "clean", "index"]);
      expect(restored.getNode("index")?.runCount).toBe(1);
    });

    it("prints every event in verbose mode", async () => {
      const path = await file("single.json", { name: "single", phases: [{ name: "only", phase: "x" }] });
      await cmdRun(path, { verbose: true });
      expect(logs).toContain(`  ▸ ${"level_started".padEnd(20)} {"index":0,"nodes":["only"]}`);
    });

    it("exits 1 on a tolerated failure unless partial runs are allowed", async () => {
      const executors = await file("executors.mjs", FAILING_EXECUTORS);
      const path = await file("sensors.json", {
        phases: [
          { name: "read", phase: "acquisition", executor: "flaky", config: { continue_on_error: true } },
          { name: "note", phase: "logging" },
        ],
      });
      const args = { executors, retries: "2", "restart-delay": "0" };

      await expect(cmdRun(path, args)).rejects.toThrow("exit 1");
      expect(logs).toContain("  🔄 read attempt 1 failed: sensor offline (retrying in 0ms)");
      expect(logs).toContain('  ✘ read — Phase "read" failed after 2 attempt(s): sensor offline (continuing)');
      expect(logs).toContain("  ▶ note");

      logs = [];
      await cmdRun(path, { ...args, "allow-partial": true });
      expect(logs.some((l) => l.includes("⚠ partial failure"))).toBe(true);
    });

    it("prints a failure summary when a phase fails outright", async () => {
      const executors = await file("executors.mjs", FAILING_EXECUTORS);
      const path = await file("sensors.json", {
        phases: [
          { name: "read", phase: "acquisition", executor: "flaky" },
          { name: "store", phase: "storage", dependencies: ["read"] },
        ],
      });

      await expect(cmdRun(path, { executors, retries: "1" })).rejects.toThrow("exit 1");
      const summary = logs.find((l) => l.includes("Failure Summary"));
      expect(summary?.split("\n").slice(-2)).toEqual(["  Attempts: 1", "  Error:    sensor offline"]);
      expect(logs).not.toContain("  ▶ store");
    });

    it("rejects a malformed --retries value", async () => {
      const path = await file("ingest.json", INGEST);
      await expect(cmdRun(path, { retries: "many" })).rejects.toThrow("--retries expects a non-negative number");
    });
  });
});

/**
 * CLI Renderer — terminal output for phaseflow runs.
 *
 * Provides:
 * - Box-drawing banner with aligned rows
 * - Markdown rendering for graph reports
 * - Run, level and failure summaries
 */

import { marked } from "marked";
import { markedTerminal } from "marked-terminal";
import type { LevelReport, PhaseFailure, PipelineResult } from "./pipeline/types.js";

// ---------------------------------------------------------------------------
// ANSI helpers
// ---------------------------------------------------------------------------

export const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  gray: "\x1b[90m",
} as const;

// ---------------------------------------------------------------------------
// Markdown rendering
// ---------------------------------------------------------------------------

marked.use(markedTerminal());

/**
 * Render markdown to ANSI-formatted terminal output. Falls back to the raw
 * text if rendering fails.
 */
export function renderMarkdown(text: string): string {
  try {
    const rendered = marked.parse(text);
    if (typeof rendered === "string") {
      return rendered.replace(/\n{3,}/g, "\n\n").trimEnd();
    }
    return text;
  } catch (_err) {
    return text;
  }
}

// ---------------------------------------------------------------------------
// Banner
// ---------------------------------------------------------------------------

/** Startup banner; every row has the same visible width. */
export function renderBanner(opts: {
  name: string;
  nodeCount: number;
  levelCount: number;
  parallel: boolean;
}): string {
  const innerWidth = 44;

  const pad = (text: string): string => {
    const truncated = text.length > innerWidth
      ? text.slice(0, innerWidth - 1) + "…"
      : text;
    return truncated + " ".repeat(Math.max(0, innerWidth - truncated.length));
  };
  const row = (visible: string) => `  │ ${pad(visible)} │`;

  return [
    "",
    `  ┌${"─".repeat(innerWidth + 2)}┐`,
    row(`Phaseflow: ${opts.name}`),
    `  ├${"─".repeat(innerWidth + 2)}┤`,
    row(`Phases: ${opts.nodeCount}`),
    row(`Levels: ${opts.levelCount}`),
    row(`Mode:   ${opts.parallel ? "parallel" : "sequential"}`),
    `  └${"─".repeat(innerWidth + 2)}┘`,
    "",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export function renderSummary(result: PipelineResult): string {
  const statusIcon = result.status === "success"
    ? `${ANSI.green}✔ success${ANSI.reset}`
    : `${ANSI.yellow}⚠ partial failure${ANSI.reset}`;
  const path = result.completed.length > 0
    ? result.completed.join(` ${ANSI.dim}→${ANSI.reset} `)
    : `${ANSI.dim}(none)${ANSI.reset}`;

  const lines = [
    "",
    `  Status: ${statusIcon}`,
    `  Time:   ${ANSI.dim}${formatDuration(result.durationMs)}${ANSI.reset}`,
    `  Path:   ${path}`,
  ];
  if (result.failed.length > 0) {
    lines.push(`  Failed: ${result.failed.map((f) => f.phase).join(", ")}`);
  }
  if (result.levels) {
    lines.push(renderLevels(result.levels));
  }
  return lines.join("\n");
}

/** Per-level timings collected in monitor mode. */
export function renderLevels(levels: LevelReport[]): string {
  const lines = [
    "",
    `  ${ANSI.bold}Levels${ANSI.reset}`,
    `  ${ANSI.dim}${"─".repeat(40)}${ANSI.reset}`,
  ];
  for (const level of levels) {
    const label = `#${level.index}`.padEnd(4);
    lines.push(`  ${label} ${formatDuration(level.durationMs).padStart(8)}  ${level.nodes.join(", ")}`);
  }
  return lines.join("\n");
}

export function renderFailureSummary(failure: PhaseFailure): string {
  return [
    "",
    `  ${ANSI.red}${ANSI.bold}Failure Summary${ANSI.reset}`,
    `  ${ANSI.dim}${"─".repeat(40)}${ANSI.reset}`,
    `  Phase:    ${ANSI.bold}${failure.phase}${ANSI.reset}`,
    `  Attempts: ${failure.attempts}`,
    `  Error:    ${failure.error}`,
  ].join("\n");
}

/**
 * Format milliseconds for display. Sub-second values keep their
 * millisecond precision.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.max(0, Math.round(ms))}ms`;
  const secs = Math.floor(ms / 1000);
  if (secs < 60) return `${secs}s`;
  const mins = Math.floor(secs / 60);
  const remainSecs = secs % 60;
  if (mins < 60) return `${mins}m ${remainSecs}s`;
  const hours = Math.floor(mins / 60);
  const remainMins = mins % 60;
  return `${hours}h ${remainMins}m ${remainSecs}s`;
}

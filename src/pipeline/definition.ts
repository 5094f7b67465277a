/**
 * Pipeline definition files: a flat JSON phase list that the CLI (or any
 * caller) turns into a batch run.
 *
 *   {
 *     "name": "ingest",
 *     "parallel": true,
 *     "phases": [
 *       { "name": "fetch", "phase": "acquisition" },
 *       { "name": "clean", "phase": "preprocessing", "executor": "merge",
 *         "dependencies": ["fetch"], "config": { "retries": 2 } }
 *     ]
 *   }
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PhaseConfig } from "./types.js";
import type { BatchPhaseSpec } from "./orchestrator.js";
import type { ExecutorRegistry } from "./executors.js";
import { PhaseConfigSchema, parseJson, schemaIssues } from "./serialization.js";
import { DocumentError } from "./errors.js";

export const PhaseDefinitionSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  phase: Type.String({ minLength: 1 }),
  executor: Type.Optional(Type.String({ minLength: 1 })),
  config: Type.Optional(PhaseConfigSchema),
  dependencies: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
});

export const PipelineDefinitionSchema = Type.Object({
  name: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  parallel: Type.Optional(Type.Boolean()),
  phases: Type.Array(PhaseDefinitionSchema, { minItems: 1 }),
});

export type PhaseDefinition = Static<typeof PhaseDefinitionSchema>;
export type PipelineDefinition = Static<typeof PipelineDefinitionSchema>;

/** Cross-phase checks the schema cannot express. */
function referenceIssues(def: PipelineDefinition): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();
  for (const phase of def.phases) {
    if (seen.has(phase.name)) issues.push(`phase "${phase.name}" is defined more than once`);
    seen.add(phase.name);
  }
  for (const phase of def.phases) {
    for (const dep of phase.dependencies ?? []) {
      if (!seen.has(dep)) issues.push(`phase "${phase.name}" depends on unknown phase "${dep}"`);
    }
  }
  return issues;
}

export function parseDefinition(text: string): PipelineDefinition {
  const data = parseJson(text, "parse-definition");
  if (!Value.Check(PipelineDefinitionSchema, data)) {
    throw new DocumentError(
      "Not a valid pipeline definition",
      "parse-definition",
      schemaIssues(PipelineDefinitionSchema, data),
    );
  }
  const issues = referenceIssues(data);
  if (issues.length > 0) {
    throw new DocumentError("Pipeline definition has broken references", "parse-definition", issues);
  }
  return data;
}

/** Resolve executor names and produce batch specs. Unknown executors throw UnknownExecutorError. */
export function definitionToSpecs(def: PipelineDefinition, registry: ExecutorRegistry): BatchPhaseSpec[] {
  return def.phases.map((phase) => {
    const config: PhaseConfig = { ...phase.config };
    if (phase.executor !== undefined) {
      config.executor = registry.resolve(phase.executor);
    }
    return {
      name: phase.name,
      phase: phase.phase,
      config,
      dependencies: [...(phase.dependencies ?? [])],
    };
  });
}

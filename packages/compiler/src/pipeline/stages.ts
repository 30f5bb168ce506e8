// ITL Pipeline Stages
//
// Pure sequential functions:
//   parse → build → validate
//
// Each stage is a stateless function called with explicit inputs and a
// stage-scoped diagnostic emitter. A stage that reports an error ends the run;
// later stages never see a partial artifact.

import type { ItlDiagnostic } from "../model/diagnostics.js";
import { resolveCompileOptions, type CompileOptions, type ResolvedCompileOptions } from "../config/options.js";
import { DiagnosticsRuntime } from "../diagnostics/runtime.js";
import { parseDocument, type DocumentInput, type ParsedDocument } from "../parsing/parse-document.js";
import { buildTypeGraph, type BuildResult } from "../analysis/20-build/build.js";
import { validateTypeGraph } from "../analysis/30-validate/validate.js";
import type { ValidatedGraph } from "../graph/validated-graph.js";
import { debug } from "../shared/debug.js";

export type FailedStage = "parse" | "build" | "validate";

export type CompileResult =
  | { readonly ok: true; readonly graph: ValidatedGraph; readonly diagnostics: readonly [] }
  | { readonly ok: false; readonly stage: FailedStage; readonly diagnostics: readonly ItlDiagnostic[] };

/** Everything one run produced, including the intermediates editor features need. */
export interface PipelineRun {
  readonly options: ResolvedCompileOptions;
  readonly document: ParsedDocument;
  /** Null when parsing failed. */
  readonly build: BuildResult | null;
  readonly result: CompileResult;
}

/**
 * Run parse → build → validate, keeping each stage's output.
 *
 * Throws only for invalid options (`ItlConfigError`); every problem with the
 * document itself is returned as diagnostics.
 */
export function runPipeline(input: DocumentInput, options: CompileOptions = {}): PipelineRun {
  const resolved = resolveCompileOptions(options);
  const diag = new DiagnosticsRuntime();
  debug.pipeline("start", { source: resolved.sourceName, grammar: resolved.grammar });

  const fail = (stage: FailedStage): CompileResult => {
    debug.pipeline("failed", { source: resolved.sourceName, stage, diagnostics: diag.count(stage) });
    return { ok: false, stage, diagnostics: diag.sorted() };
  };

  // Stage 1: parse, text → JSON tree
  const document = parseDocument(input, { maxDepth: resolved.maxDepth, diagnostics: diag.forStage("parse") });
  if (!document.root) {
    return { options: resolved, document, build: null, result: fail("parse") };
  }

  // Stage 2: build, JSON tree → linked graph
  const build = buildTypeGraph(document.root, { grammar: resolved.grammar, diagnostics: diag.forStage("build") });
  if (!build.graph) {
    return { options: resolved, document, build, result: fail("build") };
  }

  // Stage 3: validate, linked graph → validated graph
  const graph = validateTypeGraph(build.graph, { diagnostics: diag.forStage("validate") });
  if (!graph) {
    return { options: resolved, document, build, result: fail("validate") };
  }

  debug.pipeline("done", { source: resolved.sourceName, types: graph.types.length, names: graph.names().length });
  return { options: resolved, document, build, result: { ok: true, graph, diagnostics: [] } };
}

/** Compile one ITL document into a validated graph or the diagnostics of the stage that failed. */
export function parseAndValidate(input: DocumentInput, options?: CompileOptions): CompileResult {
  return runPipeline(input, options).result;
}

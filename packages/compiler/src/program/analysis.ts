import type { JsonNode } from "../model/json.js";
import type { ItlDiagnostic } from "../model/diagnostics.js";
import type { CompileOptions, ResolvedCompileOptions } from "../config/options.js";
import type { DefinitionEntry, ReadonlyTypeRegistry } from "../analysis/20-build/registry.js";
import type { ReferenceSite } from "../analysis/20-build/build.js";
import type { DocumentInput } from "../parsing/parse-document.js";
import { runPipeline, type CompileResult } from "../pipeline/stages.js";

/**
 * One document run through the pipeline, with the intermediates editor
 * queries need. Definitions and references are present whenever the JSON
 * parsed, even if later stages failed.
 */
export interface DocumentAnalysis {
  readonly options: ResolvedCompileOptions;
  readonly text: string;
  readonly root: JsonNode | null;
  readonly result: CompileResult;
  readonly diagnostics: readonly ItlDiagnostic[];
  /** Null when parsing failed. */
  readonly registry: ReadonlyTypeRegistry | null;
  readonly definitions: readonly DefinitionEntry[];
  readonly references: readonly ReferenceSite[];
}

export function analyzeDocument(input: DocumentInput, options?: CompileOptions): DocumentAnalysis {
  const run = runPipeline(input, options);
  const registry = run.build?.registry ?? null;
  return {
    options: run.options,
    text: run.document.text,
    root: run.document.root,
    result: run.result,
    diagnostics: run.result.diagnostics,
    registry,
    definitions: registry?.entries() ?? [],
    references: run.build?.references ?? [],
  };
}

// Compiler package public API
//
// This barrel exports the pipeline, the stage entry points, the validated
// graph and the document queries. Import from here rather than deep paths.

// === Pipeline ===
export { parseAndValidate, runPipeline } from "./pipeline/stages.js";
export type { CompileResult, FailedStage, PipelineRun } from "./pipeline/stages.js";

// === Configuration ===
export {
  DEFAULT_COMPILE_OPTIONS,
  GRAMMAR_PROFILES,
  ItlConfigError,
  isGrammarProfile,
  resolveCompileOptions,
} from "./config/options.js";
export type { CompileOptions, GrammarProfile, ResolvedCompileOptions } from "./config/options.js";

// === Stage 1: parse ===
export { parseDocument } from "./parsing/parse-document.js";
export type { DocumentInput, ParseDocumentOptions, ParsedDocument } from "./parsing/parse-document.js";
export { DEFAULT_MAX_DEPTH, JsonParser, JsonSyntaxError, parseJson } from "./parsing/json-parser.js";
export type { JsonParseOptions } from "./parsing/json-parser.js";

// === Stage 2: build ===
export { buildTypeGraph } from "./analysis/20-build/build.js";
export type { BuildResult, BuildTypeGraphOptions, LinkedGraph, ReferenceSite } from "./analysis/20-build/build.js";
export { TypeRegistry } from "./analysis/20-build/registry.js";
export type { DeclareResult, DefinitionEntry, ReadonlyTypeRegistry } from "./analysis/20-build/registry.js";

// === Stage 3: validate ===
export { validateTypeGraph, VALIDATION_RULES } from "./analysis/30-validate/validate.js";
export type { ValidateTypeGraphOptions } from "./analysis/30-validate/validate.js";
export type { ValidateContext, ValidationRule } from "./analysis/30-validate/context.js";
export { domainOf, labelText } from "./analysis/30-validate/domain.js";
export type { LabelDomain } from "./analysis/30-validate/domain.js";

// === Validated graph ===
export { ValidatedGraph } from "./graph/validated-graph.js";
export { childRefs, walkTypes } from "./graph/walk.js";
export type { TypeVisitor, WalkOptions } from "./graph/walk.js";

// === Program (editor queries) ===
export { analyzeDocument } from "./program/analysis.js";
export type { DocumentAnalysis } from "./program/analysis.js";
export { definitionAt, describeTypeDef, documentSymbols, hoverAt, referencesTo } from "./program/queries.js";
export type { DocumentSymbolInfo, HoverInfo } from "./program/queries.js";
export { DefaultItlProgram } from "./program/program.js";
export type { DocumentSnapshot, DocumentUri, ItlProgram, ItlProgramCacheStats } from "./program/program.js";

// === Model ===
export * from "./model/index.js";

// === Diagnostics ===
export * from "./diagnostics/index.js";

// === Shared ===
export * from "./shared/index.js";

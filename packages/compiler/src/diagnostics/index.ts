// Diagnostic catalog and emission. Codes are declared once in catalog/ and
// every stage emits through a DiagnosticsRuntime bound to it.
export { defineDiagnostic } from "./types.js";
export type {
  DiagnosticCategory,
  DiagnosticDataBase,
  DiagnosticDataRecord,
  DiagnosticImpact,
  DiagnosticsCatalog,
  DiagnosticSpanRequirement,
  DiagnosticSpec,
  DiagnosticStatus,
} from "./types.js";
export { createDiagnosticEmitter, type DiagnosticEmitter, type EmitDiagnosticInput } from "./emitter.js";
export { DiagnosticsRuntime } from "./runtime.js";
export * from "./catalog/index.js";

import type { DiagnosticEmitter } from "../../diagnostics/emitter.js";
import type { DiagnosticCodeForStage, diagnosticsCatalog } from "../../diagnostics/catalog/index.js";
import type { TypeDef, TypeRef } from "../../model/types.js";
import type { LinkedGraph } from "../20-build/build.js";

export type ValidateDiagnosticEmitter = DiagnosticEmitter<typeof diagnosticsCatalog, DiagnosticCodeForStage<"validate">>;

export interface ValidateContext {
  readonly graph: LinkedGraph;
  /** Every definition in the document (top-level and inline), pre-order. */
  readonly defs: readonly TypeDef[];
  readonly diagnostics: ValidateDiagnosticEmitter;
  /** Definition a reference points at; null for an unresolved marker. */
  target(ref: TypeRef): TypeDef | null;
}

export interface ValidationRule {
  readonly name: string;
  run(ctx: ValidateContext): void;
}

export function memberPath(base: string, key: string | number): string {
  return typeof key === "number" ? `${base}[${key}]` : `${base}.${key}`;
}

/** Display name for messages: the type name, or its path when anonymous. */
export function describeDef(def: TypeDef): string {
  return def.name === undefined ? `${def.kind} at ${def.loc.path}` : `'${def.name}'`;
}

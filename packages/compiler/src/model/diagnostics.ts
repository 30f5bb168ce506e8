/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions with no external dependencies.
 * Builder functions live in shared/diagnostics.ts.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Pipeline stage that produced the diagnostic. Each stage owns one error kind. */
export type DiagnosticStage = "parse" | "build" | "validate";

export interface DiagnosticRelated {
  message: string;
  path?: string | null;
  span?: SourceSpan | null;
}

/** Unified diagnostic envelope for every pipeline stage. */
export interface ItlDiagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  /** Rendered JSON path (`types[3].fields[1].type`), `$` for the root, null when unknown. */
  path: string | null;
  span: SourceSpan | null;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Malformed JSON or undecodable bytes. Fatal at the first occurrence. */
export type ParseError = ItlDiagnostic & { readonly stage: "parse" };
/** Valid JSON that does not match the ITL grammar, or an unknown type name. */
export type StructuralError = ItlDiagnostic & { readonly stage: "build" };
/** Well-shaped document that violates a semantic rule; `code` is the rule, `message` the detail. */
export type ValidationError = ItlDiagnostic & { readonly stage: "validate" };

import type { DiagnosticSeverity, DiagnosticStage } from "../model/diagnostics.js";

export type { DiagnosticSeverity, DiagnosticStage };

/** Impact captures the real consequence if ignored, which can differ from UI severity. */
export type DiagnosticImpact =
  | "blocking" // No graph is produced.
  | "degraded" // Output continues but is likely wrong or incomplete.
  | "informational"; // No behavioral impact; context only.

/** Status tracks lifecycle (canonical vs migration cases). */
export type DiagnosticStatus =
  | "canonical" // Stable, preferred code for new usage.
  | "proposed" // Not finalized; may change or be removed.
  | "deprecated"; // Superseded by another code, do not emit.

/** Category is the primary axis for grouping and reporting. */
export type DiagnosticCategory =
  | "syntax"
  | "shape"
  | "reference"
  | "names"
  | "bounds"
  | "numeric"
  | "unions"
  | "containment"
  | "legacy";

/** Some diagnostics point at a node, others apply to the document as a whole. */
export type DiagnosticSpanRequirement = "span" | "document" | "either";

export type DiagnosticDataBase = {
  /** Name of the offending type, field or value where one applies. */
  name?: string;
};

/** Data fields a code carries. Required ones are checked when the code is emitted. */
export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity and routing metadata. */
export type DiagnosticSpec<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  readonly category: DiagnosticCategory;
  readonly status: DiagnosticStatus;
  readonly defaultSeverity: DiagnosticSeverity;
  readonly impact: DiagnosticImpact;
  readonly span: DiagnosticSpanRequirement;
  /** Stages allowed to emit the code. */
  readonly stages: readonly DiagnosticStage[];
  /** Human-readable explanation for docs and tooling. */
  readonly description: string;
  readonly data?: DiagnosticDataRequirement;
  /** Phantom slot carrying the data shape; never set at runtime. */
  readonly __data?: TData;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<
  TData extends DiagnosticDataBase,
  const TSpec extends DiagnosticSpec<TData> = DiagnosticSpec<TData>,
>(spec: TSpec): TSpec {
  return spec;
}

/** Fallback data shape when exact fields are unknown at compile time. */
export type DiagnosticDataRecord = DiagnosticDataBase & Record<string, unknown>;
/** Catalog is the authoritative registry of codes and metadata. */
export type DiagnosticsCatalog = Record<string, DiagnosticSpec<DiagnosticDataRecord>>;
/** Maps code -> data shape for strongly-typed emission. */
export type DiagnosticDataByCode<Catalog extends DiagnosticsCatalog> = {
  [K in keyof Catalog]: Catalog[K] extends DiagnosticSpec<infer D extends DiagnosticDataBase> ? D : never;
};

import { normalizeSpanMaybe } from "../model/span.js";
import type { SourceSpan } from "../model/span.js";

// Re-export foundation types from model
export type {
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticRelated,
  ItlDiagnostic,
} from "../model/diagnostics.js";

import type { DiagnosticSeverity, DiagnosticStage, DiagnosticRelated, ItlDiagnostic } from "../model/diagnostics.js";

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  path?: string | null;
  span?: SourceSpan | null | undefined;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder that normalizes spans and applies defaults. */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): ItlDiagnostic<TCode, TData> {
  const diag: ItlDiagnostic<TCode, TData> = {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    path: input.path ?? null,
    span: normalizeSpanMaybe(input.span),
    ...(input.related?.length ? { related: input.related.map(normalizeRelated) } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
  return diag;
}

function normalizeRelated(related: DiagnosticRelated): DiagnosticRelated {
  return {
    message: related.message,
    path: related.path ?? null,
    span: normalizeSpanMaybe(related.span),
  };
}

/** Stable ordering for presentation: by source offset, then stage order, then code. */
export function compareDiagnostics(a: ItlDiagnostic, b: ItlDiagnostic): number {
  const aStart = a.span?.start ?? Number.POSITIVE_INFINITY;
  const bStart = b.span?.start ?? Number.POSITIVE_INFINITY;
  if (aStart !== bStart) return aStart - bStart;
  const stageDelta = STAGE_ORDER[a.stage] - STAGE_ORDER[b.stage];
  if (stageDelta !== 0) return stageDelta;
  return a.code < b.code ? -1 : a.code > b.code ? 1 : 0;
}

const STAGE_ORDER: Record<DiagnosticStage, number> = { parse: 0, build: 1, validate: 2 };

/** One-line rendering for logs and test failure output. */
export function formatDiagnostic(diag: ItlDiagnostic): string {
  const where = diag.path ? ` at ${diag.path}` : "";
  return `${diag.severity} ${diag.code}${where}: ${diag.message}`;
}

import type { SourceSpan } from "../model/span.js";
import type { ItlDiagnostic, DiagnosticStage, DiagnosticSeverity, DiagnosticRelated } from "../model/diagnostics.js";
import type { DiagnosticDataBase, DiagnosticStatus, DiagnosticsCatalog, DiagnosticDataByCode } from "./types.js";
import { buildDiagnostic } from "../shared/diagnostics.js";

export type EmitDiagnosticInput<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  message: string;
  path?: string | null;
  span?: SourceSpan | null;
  related?: readonly DiagnosticRelated[];
  /** Overrides the catalog default. */
  severity?: DiagnosticSeverity;
  data?: Readonly<TData>;
};

export type DiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
> = {
  readonly stage: DiagnosticStage;
  emit<Code extends AllowedCodes>(
    code: Code,
    input: EmitDiagnosticInput<DiagnosticDataByCode<Catalog>[Code]>,
  ): ItlDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]>;
};

export function createDiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
>(
  catalog: Catalog,
  options: { stage: DiagnosticStage },
): DiagnosticEmitter<Catalog, AllowedCodes> {
  const stage = options.stage;

  function emit<Code extends AllowedCodes>(
    code: Code,
    input: EmitDiagnosticInput<DiagnosticDataByCode<Catalog>[Code]>,
  ): ItlDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]> {
    const spec = catalog[code];
    if (!spec) {
      throw new Error(`Diagnostic code '${code}' is not in the catalog.`);
    }
    if (!ALLOWED_STATUSES.has(spec.status)) {
      throw new Error(`Diagnostic code '${code}' is ${spec.status} and cannot be emitted.`);
    }
    if (!spec.stages.includes(stage)) {
      throw new Error(`Diagnostic code '${code}' cannot be emitted by the '${stage}' stage.`);
    }
    const present = new Set(
      Object.entries(input.data ?? {})
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key),
    );
    const missing = (spec.data?.required ?? []).filter((key) => !present.has(key));
    if (missing.length > 0) {
      throw new Error(`Diagnostic code '${code}' is missing data: ${missing.join(", ")}.`);
    }
    return buildDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]>({
      code,
      message: input.message,
      stage,
      severity: input.severity ?? spec.defaultSeverity,
      path: input.path,
      span: input.span,
      related: input.related,
      data: input.data,
    });
  }

  return { stage, emit };
}

const ALLOWED_STATUSES = new Set<DiagnosticStatus>(["canonical", "proposed"]);

import type { ItlDiagnostic, DiagnosticStage } from "../model/diagnostics.js";
import { compareDiagnostics } from "../shared/diagnostics.js";
import { createDiagnosticEmitter, type DiagnosticEmitter } from "./emitter.js";
import { diagnosticsCatalog } from "./catalog/index.js";

type Catalog = typeof diagnosticsCatalog;

/** Collects diagnostics from every stage of one pipeline run. */
export class DiagnosticsRuntime {
  readonly #diagnostics: ItlDiagnostic[] = [];
  readonly #emitters = new Map<DiagnosticStage, DiagnosticEmitter<Catalog>>();
  readonly #counts = new Map<DiagnosticStage, number>();

  get all(): readonly ItlDiagnostic[] {
    return this.#diagnostics;
  }

  /** Diagnostics ordered by position, for presentation. */
  sorted(): ItlDiagnostic[] {
    return [...this.#diagnostics].sort(compareDiagnostics);
  }

  count(stage?: DiagnosticStage): number {
    if (!stage) return this.#diagnostics.length;
    return this.#counts.get(stage) ?? 0;
  }

  hasErrors(stage?: DiagnosticStage): boolean {
    return this.#diagnostics.some((d) => d.severity === "error" && (!stage || d.stage === stage));
  }

  forStage(stage: DiagnosticStage): DiagnosticEmitter<Catalog> {
    const existing = this.#emitters.get(stage);
    if (existing) return existing;
    const base = createDiagnosticEmitter(diagnosticsCatalog, { stage });
    const runtimeEmitter: DiagnosticEmitter<Catalog> = {
      stage,
      emit: (code, input) => {
        const diag = base.emit(code, input);
        this.record(diag);
        return diag;
      },
    };
    this.#emitters.set(stage, runtimeEmitter);
    return runtimeEmitter;
  }

  record(diag: ItlDiagnostic): void {
    this.#diagnostics.push(diag);
    const prev = this.#counts.get(diag.stage) ?? 0;
    this.#counts.set(diag.stage, prev + 1);
  }
}

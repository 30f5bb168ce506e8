/* =============================================================================
 * PHASE 30: VALIDATE (Semantic Rules)
 * LinkedGraph -> ValidatedGraph (pure, deterministic)
 * - Every rule runs over every definition, independent of the others
 * - All violations are collected; the graph is released only when none fired
 * - Rules read the frozen graph and never modify it
 * ============================================================================= */

import type { TypeDef, TypeRef } from "../../model/types.js";
import { ValidatedGraph } from "../../graph/validated-graph.js";
import { walkTypes } from "../../graph/walk.js";
import { debug } from "../../shared/debug.js";
import type { LinkedGraph } from "../20-build/build.js";
import type { ValidateContext, ValidateDiagnosticEmitter, ValidationRule } from "./context.js";
import { namesRule } from "./rules/names.js";
import { boundsRule } from "./rules/bounds.js";
import { numericRule } from "./rules/numeric.js";
import { unionsRule } from "./rules/unions.js";
import { containmentRule } from "./rules/containment.js";
import { legacyRule } from "./rules/legacy.js";

export const VALIDATION_RULES: readonly ValidationRule[] = [
  namesRule,
  boundsRule,
  numericRule,
  unionsRule,
  containmentRule,
  legacyRule,
];

export interface ValidateTypeGraphOptions {
  diagnostics: ValidateDiagnosticEmitter;
  /** Defaults to {@link VALIDATION_RULES}. */
  rules?: readonly ValidationRule[];
}

/** Run every rule; returns the validated graph, or null when any rule reported an error. */
export function validateTypeGraph(graph: LinkedGraph, options: ValidateTypeGraphOptions): ValidatedGraph | null {
  let errors = 0;
  const diagnostics: ValidateDiagnosticEmitter = {
    stage: options.diagnostics.stage,
    emit: (code, input) => {
      const diag = options.diagnostics.emit(code, input);
      if (diag.severity === "error") errors += 1;
      return diag;
    },
  };

  const defs: TypeDef[] = [];
  walkTypes(graph.roots, (def) => defs.push(def));

  const ctx: ValidateContext = {
    graph,
    defs,
    diagnostics,
    target: (ref: TypeRef) => {
      switch (ref.kind) {
        case "named":
          return graph.registry.get(ref.id);
        case "inline":
          return ref.def;
        case "unresolved":
          return null;
      }
    },
  };

  for (const rule of options.rules ?? VALIDATION_RULES) {
    const before = errors;
    rule.run(ctx);
    debug.validate("rule.done", { rule: rule.name, errors: errors - before });
  }

  debug.validate("done", { definitions: defs.length, errors });
  return errors === 0 ? new ValidatedGraph(graph) : null;
}

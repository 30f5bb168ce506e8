import { describe, test, expect } from "vitest";
import {
  DiagnosticsRuntime,
  VALIDATION_RULES,
  validateTypeGraph,
  type LinkedGraph,
  type ValidationRule,
} from "@itl/compiler";
import { build, doc } from "../_helpers/compile.js";

function linked(text: string): LinkedGraph {
  const graph = build(text).result.graph;
  if (!graph) throw new Error("expected the document to build");
  return graph;
}

describe("validateTypeGraph", () => {
  test("runs the rules in a fixed order", () => {
    expect(VALIDATION_RULES.map((r) => r.name)).toEqual(["names", "bounds", "numeric", "unions", "containment", "legacy"]);
  });

  test("hands every definition to each rule once, in pre-order", () => {
    const seen: string[] = [];
    const recorder: ValidationRule = {
      name: "recorder",
      run(ctx) {
        for (const def of ctx.defs) seen.push(def.name ?? def.kind);
      },
    };
    const runtime = new DiagnosticsRuntime();
    const graph = validateTypeGraph(
      linked(
        doc(
          { kind: "record", name: "R", fields: [{ name: "a", type: { kind: "sequence", type: { kind: "byte" } } }, { name: "b", type: "R", optional: true }] },
          { kind: "bool", name: "Flag" },
        ),
      ),
      { diagnostics: runtime.forStage("validate"), rules: [recorder] },
    );
    expect(graph).not.toBeNull();
    expect(seen).toEqual(["R", "sequence", "byte", "Flag"]);
  });

  test("collects every rule's errors before failing", () => {
    const runtime = new DiagnosticsRuntime();
    const graph = validateTypeGraph(
      linked(
        doc(
          { kind: "string", name: "S", size: 10, capacity: 5 },
          { kind: "fixed", name: "F", base: 10, digits: 2, scale: 3 },
        ),
      ),
      { diagnostics: runtime.forStage("validate") },
    );
    expect(graph).toBeNull();
    expect(runtime.all.map((d) => d.code)).toEqual(["itl/size-exceeds-capacity", "itl/invalid-fixed"]);
    expect(runtime.count("validate")).toBe(2);
  });
});

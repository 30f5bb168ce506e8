import { describe, test, expect } from "vitest";
import {
  createDiagnosticEmitter,
  defineDiagnostic,
  diagnosticsByStage,
  diagnosticsCatalog,
  DiagnosticsRuntime,
  type DiagnosticDataBase,
} from "@itl/compiler";

const testCatalog = {
  "test/live": defineDiagnostic<DiagnosticDataBase>({
    category: "names",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    span: "span",
    stages: ["validate"],
    description: "live",
  }),
  "test/retired": defineDiagnostic<DiagnosticDataBase>({
    category: "names",
    status: "deprecated",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["validate"],
    description: "retired",
  }),
  "test/with-data": defineDiagnostic<DiagnosticDataBase & { value?: string }>({
    category: "bounds",
    status: "proposed",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["validate"],
    description: "with data",
    data: { required: ["name", "value"] },
  }),
} as const;

describe("createDiagnosticEmitter", () => {
  test("applies catalog severity and the emitter's stage", () => {
    const emitter = createDiagnosticEmitter(testCatalog, { stage: "validate" });
    const d = emitter.emit("test/live", { message: "m", path: "types[0]", span: { start: 3, end: 1 } });
    expect(d).toEqual({
      code: "test/live",
      message: "m",
      stage: "validate",
      severity: "warning",
      path: "types[0]",
      span: { start: 1, end: 3 },
    });
  });

  test("explicit severity wins", () => {
    const emitter = createDiagnosticEmitter(testCatalog, { stage: "validate" });
    expect(emitter.emit("test/live", { message: "m", severity: "info" }).severity).toBe("info");
  });

  test("refuses deprecated codes", () => {
    const emitter = createDiagnosticEmitter(testCatalog, { stage: "validate" });
    expect(() => emitter.emit("test/retired", { message: "m" })).toThrow(
      "Diagnostic code 'test/retired' is deprecated and cannot be emitted.",
    );
  });

  test("refuses codes owned by another stage", () => {
    const emitter = createDiagnosticEmitter(testCatalog, { stage: "build" });
    expect(() => emitter.emit("test/live", { message: "m" })).toThrow(
      "Diagnostic code 'test/live' cannot be emitted by the 'build' stage.",
    );
  });

  test("checks required data", () => {
    const emitter = createDiagnosticEmitter(testCatalog, { stage: "validate" });
    expect(() => emitter.emit("test/with-data", { message: "m", data: { name: "Flag" } })).toThrow(
      "Diagnostic code 'test/with-data' is missing data: value.",
    );
    expect(() => emitter.emit("test/with-data", { message: "m" })).toThrow(
      "Diagnostic code 'test/with-data' is missing data: name, value.",
    );
    const d = emitter.emit("test/with-data", { message: "m", data: { name: "Flag", value: "3" } });
    expect(d.data).toEqual({ name: "Flag", value: "3" });
  });
});

describe("diagnosticsCatalog", () => {
  test("every code is namespaced and owned by the stage it is grouped under", () => {
    for (const [stage, group] of Object.entries(diagnosticsByStage)) {
      for (const [code, spec] of Object.entries(group)) {
        expect(code.startsWith("itl/")).toBe(true);
        expect(spec.stages).toEqual([stage]);
        expect(Object.hasOwn(diagnosticsCatalog, code)).toBe(true);
      }
    }
  });
});

describe("DiagnosticsRuntime", () => {
  test("records per stage and sorts by position", () => {
    const runtime = new DiagnosticsRuntime();
    runtime.forStage("validate").emit("itl/duplicate-field-name", { message: "late", span: { start: 40, end: 44 }, data: { name: "a" } });
    runtime.forStage("build").emit("itl/unknown-type-reference", { message: "early", span: { start: 10, end: 12 }, data: { name: "X" } });

    expect(runtime.count()).toBe(2);
    expect(runtime.count("build")).toBe(1);
    expect(runtime.count("parse")).toBe(0);
    expect(runtime.hasErrors("validate")).toBe(true);
    expect(runtime.hasErrors("parse")).toBe(false);
    expect(runtime.all.map((d) => d.message)).toEqual(["late", "early"]);
    expect(runtime.sorted().map((d) => d.message)).toEqual(["early", "late"]);
  });

  test("reuses one emitter per stage", () => {
    const runtime = new DiagnosticsRuntime();
    expect(runtime.forStage("build")).toBe(runtime.forStage("build"));
  });
});

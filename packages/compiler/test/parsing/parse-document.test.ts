import { describe, test, expect } from "vitest";
import { DiagnosticsRuntime, parseDocument } from "@itl/compiler";

function parse(input: string | Uint8Array, maxDepth?: number) {
  const runtime = new DiagnosticsRuntime();
  const document = parseDocument(input, {
    diagnostics: runtime.forStage("parse"),
    ...(maxDepth === undefined ? {} : { maxDepth }),
  });
  return { document, diagnostics: runtime.all };
}

describe("parseDocument", () => {
  test("decodes UTF-8 bytes", () => {
    const { document, diagnostics } = parse(new TextEncoder().encode('{"types": []}'));
    expect(diagnostics).toEqual([]);
    expect(document.text).toBe('{"types": []}');
    expect(document.root?.kind).toBe("object");
  });

  test("strips a byte order mark so spans index the remaining text", () => {
    const { document } = parse("\uFEFF[]");
    expect(document.text).toBe("[]");
    expect(document.root?.span).toEqual({ start: 0, end: 2 });
  });

  test("reports invalid UTF-8 without a location", () => {
    const { document, diagnostics } = parse(new Uint8Array([0x7b, 0xff, 0x7d]));
    expect(document.root).toBeNull();
    expect(diagnostics).toEqual([
      {
        code: "itl/invalid-encoding",
        message: "Input is not valid UTF-8",
        stage: "parse",
        severity: "error",
        path: null,
        span: null,
      },
    ]);
  });

  test("reports a syntax error once with its line and column", () => {
    const { document, diagnostics } = parse('{\n  "types": [1,]\n}');
    expect(document.root).toBeNull();
    expect(diagnostics).toEqual([
      {
        code: "itl/json-syntax",
        message: "Trailing commas are not allowed (line 2, column 15)",
        stage: "parse",
        severity: "error",
        path: null,
        span: { start: 16, end: 17 },
        data: { offset: 16, line: 1, character: 14 },
      },
    ]);
  });

  test("honours the configured depth limit", () => {
    const { diagnostics } = parse("[[[]]]", 2);
    expect(diagnostics.map((d) => d.message)).toEqual(["Nesting exceeds the maximum depth of 2 (line 1, column 3)"]);
  });
});

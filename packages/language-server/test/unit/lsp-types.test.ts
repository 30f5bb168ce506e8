import { describe, test, expect } from "vitest";
import { DiagnosticSeverity, SymbolKind } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import type { ItlDiagnostic } from "@itl/compiler";
import { mapDiagnostics, mapLocations, positionToOffset, spanToRange, spanToRangeOrStart, toSymbolKind } from "@itl/language-server";

const doc = TextDocument.create("file:///schemas/a.json", "json", 1, '{\n  "types": []\n}');

function diagnostic(overrides: Partial<ItlDiagnostic> & { message: string }): ItlDiagnostic {
  return {
    code: "itl/test",
    stage: "validate",
    severity: "error",
    path: null,
    span: null,
    ...overrides,
  };
}

describe("mapDiagnostics", () => {
  test("appends the JSON path and maps related locations", () => {
    const [mapped] = mapDiagnostics(
      [
        diagnostic({
          message: "Field 'a' is already declared",
          path: "types[0]",
          span: { start: 4, end: 11 },
          related: [
            { message: "First declaration", path: "types[0]", span: { start: 2, end: 3 } },
            { message: "No location" },
          ],
        }),
      ],
      doc,
    );

    expect(mapped).toEqual({
      range: { start: { line: 1, character: 2 }, end: { line: 1, character: 9 } },
      message: "Field 'a' is already declared (types[0])",
      severity: DiagnosticSeverity.Error,
      code: "itl/test",
      source: "itl",
      relatedInformation: [
        {
          message: "First declaration",
          location: { uri: doc.uri, range: { start: { line: 1, character: 0 }, end: { line: 1, character: 1 } } },
        },
      ],
    });
  });

  test("pins span-less diagnostics to the start of the document", () => {
    const [mapped] = mapDiagnostics([diagnostic({ message: "Input is not valid UTF-8", stage: "parse", severity: "warning" })], doc);
    expect(mapped?.range).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 0 } });
    expect(mapped?.message).toBe("Input is not valid UTF-8");
    expect(mapped?.severity).toBe(DiagnosticSeverity.Warning);
    expect(mapped?.relatedInformation).toBeUndefined();
  });
});

describe("spans", () => {
  test("reversed spans are normalized", () => {
    expect(mapLocations([{ start: 11, end: 4 }], doc)).toEqual([
      { uri: doc.uri, range: { start: { line: 1, character: 2 }, end: { line: 1, character: 9 } } },
    ]);
  });

  test("missing spans map to the document start", () => {
    expect(spanToRangeOrStart(doc, null)).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 0 } });
  });
});

describe("byte order mark", () => {
  const bomDoc = TextDocument.create("file:///schemas/b.json", "json", 1, '\uFEFF{"types": []}');

  test("shifts compiler spans past the mark", () => {
    expect(spanToRange(bomDoc, { start: 1, end: 8 })).toEqual({
      start: { line: 0, character: 2 },
      end: { line: 0, character: 9 },
    });
  });

  test("converts editor positions back to compiler offsets", () => {
    expect(positionToOffset(bomDoc, { line: 0, character: 2 })).toBe(1);
    expect(positionToOffset(bomDoc, { line: 0, character: 0 })).toBe(0);
    expect(positionToOffset(doc, { line: 1, character: 2 })).toBe(4);
  });
});

describe("toSymbolKind", () => {
  test.each([
    ["record", SymbolKind.Struct],
    ["union", SymbolKind.Enum],
    ["enum", SymbolKind.Enum],
    ["sequence", SymbolKind.Array],
    ["fixed", SymbolKind.Number],
    ["rune", SymbolKind.String],
    ["bool", SymbolKind.Boolean],
    ["", SymbolKind.TypeParameter],
  ])("%s", (kind, expected) => {
    expect(toSymbolKind(kind)).toBe(expected);
  });
});

import { describe, test, expect } from "vitest";
import { build, codes, doc } from "../_helpers/compile.js";

describe("buildTypeGraph: references", () => {
  test("resolves forward references to the registered definition", () => {
    const { result, diagnostics } = build(
      doc(
        { kind: "record", name: "Pair", fields: [{ name: "left", type: "Small" }] },
        { kind: "int", name: "Small", bits: 8, unsigned: true },
      ),
    );
    expect(diagnostics).toEqual([]);
    const graph = result.graph;
    if (!graph) throw new Error("expected a graph");

    const [pair, small] = graph.roots;
    expect(pair?.kind).toBe("record");
    const ref = pair?.kind === "record" ? pair.fields[0]?.type : undefined;
    expect(ref).toMatchObject({ kind: "named", name: "Small", id: graph.registry.idOf("Small") });
    expect(ref?.kind === "named" ? graph.registry.get(ref.id) : undefined).toBe(small);
  });

  test("resolves self references", () => {
    const { result } = build(
      doc({ kind: "record", name: "Node", fields: [{ name: "next", type: "Node", optional: true }] }),
    );
    expect(result.graph).not.toBeNull();
    expect(result.references).toEqual([
      { name: "Node", loc: { path: "types[0].fields[0].type", span: expect.anything() }, target: result.registry.idOf("Node") },
    ]);
  });

  test("registers named inline definitions and links later references to them", () => {
    const { result, diagnostics } = build(
      doc(
        { kind: "sequence", name: "Bytes", type: { kind: "byte", name: "Octet" } },
        { kind: "record", name: "Wrap", fields: [{ name: "b", type: "Octet" }] },
      ),
    );
    expect(diagnostics).toEqual([]);
    expect(result.registry.names()).toEqual(["Bytes", "Octet", "Wrap"]);
    expect(result.registry.entry("Octet")?.topLevel).toBe(false);
    const bytes = result.graph?.roots[0];
    expect(bytes?.kind === "sequence" ? bytes.type.kind : undefined).toBe("inline");
  });

  test("rejects an unknown name with a suggestion", () => {
    const { result, diagnostics } = build(
      doc(
        { kind: "bool", name: "Flag" },
        { kind: "record", name: "Msg", fields: [{ name: "f", type: "Flga" }] },
      ),
    );
    expect(result.graph).toBeNull();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: "itl/unknown-type-reference",
      stage: "build",
      message: "Unknown type 'Flga'. Did you mean 'Flag'?",
      path: "types[1].fields[0].type",
      data: { name: "Flga", suggestion: "Flag" },
    });
    expect(result.references.map((r) => r.target)).toEqual([null]);
  });

  test("reports a duplicate type name against the first definition", () => {
    const { result, diagnostics } = build(doc({ kind: "bool", name: "T" }, { kind: "byte", name: "T" }));
    expect(result.graph).toBeNull();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: "itl/duplicate-type-name",
      message: "Type 'T' is already defined at types[0]",
      path: "types[1].name",
      data: { name: "T" },
    });
    expect(diagnostics[0]?.related?.[0]).toMatchObject({ message: "'T' first defined here", path: "types[0]" });
  });
});

describe("buildTypeGraph: named inline definitions", () => {
  test("reports an inline name that collides with a top-level definition", () => {
    const { result, diagnostics } = build(
      doc(
        { kind: "byte", name: "T" },
        { kind: "record", name: "R", fields: [{ name: "f", type: { kind: "bool", name: "T" } }] },
      ),
    );
    expect(result.graph).toBeNull();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: "itl/duplicate-type-name",
      message: "Type 'T' is already defined at types[0]",
      path: "types[1].fields[0].type.name",
      data: { name: "T" },
    });
    expect(diagnostics[0]?.related?.[0]).toMatchObject({ message: "'T' first defined here", path: "types[0]" });
  });

  test("keeps an int wider than 64 bits as written", () => {
    const { result, diagnostics } = build(doc({ kind: "int", name: "Huge", bits: 2 ** 31, unsigned: true }));
    expect(diagnostics).toEqual([]);
    expect(result.graph?.roots[0]).toMatchObject({ kind: "int", name: "Huge", bits: 2147483648, unsigned: true });
  });
});

describe("buildTypeGraph: document shape", () => {
  test("requires an object root", () => {
    const { diagnostics } = build("[]");
    expect(diagnostics).toMatchObject([
      {
        code: "itl/invalid-root",
        message: "Document root must be an object with a 'types' array, got an array",
        path: "$",
        span: { start: 0, end: 2 },
      },
    ]);
  });

  test("requires a types array", () => {
    expect(build("{}").diagnostics.map((d) => d.message)).toEqual(["Document root has no 'types' array"]);
    expect(build('{"types": {}}').diagnostics).toMatchObject([
      { message: "'types' must be an array, got an object", path: "types", span: { start: 10, end: 12 } },
    ]);
  });

  test("reports a repeated key at the second occurrence", () => {
    const { result, diagnostics } = build('{"types": [], "types": []}');
    expect(result.graph).toBeNull();
    expect(diagnostics).toEqual([
      {
        code: "itl/duplicate-property",
        message: "Property 'types' appears more than once",
        stage: "build",
        severity: "error",
        path: "types",
        span: { start: 14, end: 21 },
        related: [{ message: "First occurrence", path: "types", span: { start: 1, end: 8 } }],
        data: { property: "types" },
      },
    ]);
  });

  test("preserves the document note", () => {
    const { result } = build(JSON.stringify({ note: { owner: "schemas", tags: ["a"] }, types: [] }));
    expect(result.graph?.note).toEqual({ owner: "schemas", tags: ["a"] });
  });

  test("requires each type to be an object", () => {
    expect(build(doc(42)).diagnostics).toMatchObject([
      { code: "itl/invalid-property", message: "'types' must be an object, got a number", path: "types[0]" },
    ]);
  });

  test("requires a kind", () => {
    expect(build(doc({ name: "X" })).diagnostics).toMatchObject([
      { code: "itl/missing-kind", message: "Type definition has no 'kind'", path: "types[0]" },
    ]);
    expect(build(doc({ kind: 3 })).diagnostics).toMatchObject([
      { code: "itl/missing-kind", message: "'kind' must be a string, got a number", path: "types[0].kind" },
    ]);
  });

  test("suggests the closest kind", () => {
    expect(build(doc({ kind: "recrod", name: "R", fields: [] })).diagnostics).toMatchObject([
      { code: "itl/unknown-kind", message: "Unknown kind 'recrod'. Did you mean 'record'?", path: "types[0].kind" },
    ]);
  });

  test("suggests the closest property", () => {
    expect(build(doc({ kind: "sequence", type: { kind: "byte" }, capactiy: 4 })).diagnostics).toMatchObject([
      {
        code: "itl/unknown-property",
        message: "Unknown property 'capactiy'. Did you mean 'capacity'?",
        path: "types[0].capactiy",
        data: { property: "capactiy", suggestion: "capacity" },
      },
    ]);
  });

  test("reports missing required properties on the object", () => {
    const { diagnostics } = build(doc({ kind: "fixed", name: "Money", base: 10 }));
    expect(diagnostics.map((d) => [d.code, d.message, d.path])).toEqual([
      ["itl/missing-property", "Missing required property 'digits'", "types[0]"],
      ["itl/missing-property", "Missing required property 'scale'", "types[0]"],
    ]);
  });

  test("reports a mistyped property", () => {
    expect(build(doc({ kind: "int", bits: 8.5 })).diagnostics).toMatchObject([
      { code: "itl/invalid-property", message: "'bits' must be an integer, got a number", path: "types[0].bits" },
    ]);
    expect(build(doc({ kind: "float", model: "binary33" })).diagnostics).toMatchObject([
      { code: "itl/invalid-property", path: "types[0].model", data: { property: "model" } },
    ]);
  });

  test("keeps checking sibling fields after one fails", () => {
    const { diagnostics } = build(
      doc({
        kind: "record",
        name: "R",
        fields: [{ name: "a" }, { name: "", type: { kind: "byte" } }, { name: "c", type: "Nope" }],
      }),
    );
    expect(diagnostics.map((d) => [d.code, d.path])).toEqual([
      ["itl/missing-property", "types[0].fields[0]"],
      ["itl/invalid-property", "types[0].fields[1].name"],
      ["itl/unknown-type-reference", "types[0].fields[2].type"],
    ]);
  });
});

describe("buildTypeGraph: nested grammar objects", () => {
  test("suggests the closest field property", () => {
    const { diagnostics } = build(
      doc({ kind: "record", name: "R", fields: [{ name: "a", type: { kind: "byte" }, optinal: true }] }),
    );
    expect(diagnostics).toMatchObject([
      {
        code: "itl/unknown-property",
        message: "Unknown property 'optinal'. Did you mean 'optional'?",
        path: "types[0].fields[0].optinal",
      },
    ]);
  });

  test("requires a type position to hold a name or a definition", () => {
    expect(build(doc({ kind: "sequence", name: "S", type: 42 })).diagnostics).toMatchObject([
      {
        code: "itl/invalid-property",
        message: "'type' must be a type name or a type definition, got a number",
        path: "types[0].type",
        data: { property: "type", expected: "a string or an object" },
      },
    ]);
  });

  test("reports a repeated key inside a field", () => {
    const text = '{"types": [{"kind": "record", "fields": [{"name": "a", "name": "b", "type": "R"}]}]}';
    const { diagnostics } = build(text);
    expect(diagnostics.map((d) => [d.code, d.path])).toEqual([
      ["itl/duplicate-property", "types[0].fields[0].name"],
      ["itl/unknown-type-reference", "types[0].fields[0].type"],
    ]);
  });

  test("describes both forms a sequence size may take", () => {
    expect(build(doc({ kind: "sequence", type: { kind: "byte" }, size: "4" })).diagnostics).toMatchObject([
      {
        code: "itl/invalid-property",
        message: "'size' must be an integer or an array of integers, got a string",
        path: "types[0].size",
      },
    ]);
  });

  test("still checks definitions nested in a failed one", () => {
    const { diagnostics } = build(
      doc({ kind: "sequence", name: "S", capacity: "big", type: { kind: "int", bits: "wide" } }),
    );
    expect(diagnostics.map((d) => [d.code, d.path])).toEqual([
      ["itl/invalid-property", "types[0].capacity"],
      ["itl/invalid-property", "types[0].type.bits"],
    ]);
  });

  test("rejects an empty enum member name", () => {
    expect(build(doc({ kind: "enum", name: "E", values: ["a", ""] }), "compat").diagnostics).toMatchObject([
      {
        code: "itl/invalid-property",
        message: "'values' must be a non-empty name, got an empty string",
        path: "types[0].values[1]",
      },
    ]);
  });

  test("checks enum member objects against their own grammar", () => {
    const { diagnostics } = build(doc({ kind: "enum", name: "E", values: [{ name: "a", value: 1.5, bit: 2 }] }), "compat");
    expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["itl/invalid-property", "'value' must be an integer, got a number"],
      ["itl/unknown-property", "Unknown property 'bit'."],
    ]);
  });

  test("reports an unknown root property", () => {
    expect(build('{"types": [], "tpyes": []}').diagnostics).toMatchObject([
      { code: "itl/unknown-property", message: "Unknown property 'tpyes'. Did you mean 'types'?", path: "tpyes" },
    ]);
  });
});

describe("buildTypeGraph: kinds", () => {
  test("builds sequence bounds", () => {
    const { result } = build(doc({ kind: "sequence", name: "Grid", type: { kind: "byte" }, size: [3, 4], capacity: 12 }));
    expect(result.graph?.roots[0]).toMatchObject({ kind: "sequence", size: [3, 4], capacity: 12 });
  });

  test("rejects a non-integer dimension", () => {
    expect(codes(build(doc({ kind: "sequence", type: { kind: "byte" }, size: [3, "x"] })).diagnostics)).toEqual([
      "itl/invalid-property",
    ]);
  });

  test("marks union fields without labels as the default", () => {
    const { result, diagnostics } = build(
      doc(
        { kind: "byte", name: "Tag" },
        {
          kind: "union",
          name: "U",
          discriminator: "Tag",
          fields: [
            { name: "one", type: { kind: "bool" }, labels: [1, 2] },
            { name: "other", type: { kind: "bool" } },
          ],
        },
      ),
    );
    expect(diagnostics).toEqual([]);
    const union = result.graph?.roots[1];
    if (union?.kind !== "union") throw new Error("expected a union");
    expect(union.fields.map((f) => f.isDefault)).toEqual([false, true]);
    expect(union.fields[0]?.labels.map((l) => l.integer)).toEqual([1n, 2n]);
  });

  test("rejects labels that are not scalars", () => {
    const { diagnostics } = build(
      doc({ kind: "union", discriminator: { kind: "byte" }, fields: [{ name: "a", type: { kind: "bool" }, labels: [[1]] }] }),
    );
    expect(diagnostics).toMatchObject([
      {
        code: "itl/invalid-property",
        message: "'labels' must be a string, number or boolean, got an array",
        path: "types[0].fields[0].labels[0]",
      },
    ]);
  });

  test("accepts encoding hints only under the compat grammar", () => {
    const text = doc({ kind: "int", name: "I", bits: 16, encoding: "zigzag" });
    expect(build(text).diagnostics).toMatchObject([
      { code: "itl/unknown-property", message: "Property 'encoding' requires the compat grammar", path: "types[0].encoding" },
    ]);
    expect(build(text, "compat").result.graph?.roots[0]).toMatchObject({ kind: "int", encoding: "zigzag" });
  });

  test("accepts legacy kinds only under the compat grammar", () => {
    const text = doc({ kind: "enum", name: "Color", values: ["red", "green"] });
    expect(build(text).diagnostics).toMatchObject([
      { code: "itl/unknown-kind", message: "Kind 'enum' requires the compat grammar", path: "types[0].kind" },
    ]);
    expect(build(text, "compat").result.graph).not.toBeNull();
  });

  test("numbers enum values after the previous one", () => {
    const { result } = build(doc({ kind: "enum", name: "E", values: ["a", { name: "b", value: 5 }, "c"] }), "compat");
    const def = result.graph?.roots[0];
    if (def?.kind !== "enum") throw new Error("expected an enum");
    expect(def.values.map((v) => [v.name, v.value, v.explicit])).toEqual([
      ["a", 0n, false],
      ["b", 5n, true],
      ["c", 6n, false],
    ]);
  });

  test("numbers bits after the previous one", () => {
    const { result } = build(doc({ kind: "bitset", name: "B", values: [{ name: "x", bit: 3 }, "y"] }), "compat");
    const def = result.graph?.roots[0];
    if (def?.kind !== "bitset") throw new Error("expected a bitset");
    expect(def.values.map((v) => [v.name, v.bit])).toEqual([
      ["x", 3n],
      ["y", 4n],
    ]);
  });

  test("freezes the linked graph", () => {
    const { result } = build(doc({ kind: "record", name: "R", fields: [{ name: "a", type: { kind: "byte" } }] }));
    expect(Object.isFrozen(result.graph)).toBe(true);
    expect(Object.isFrozen(result.graph?.roots[0])).toBe(true);
  });
});

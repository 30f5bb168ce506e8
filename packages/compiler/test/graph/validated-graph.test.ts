import { describe, test, expect } from "vitest";
import { childRefs, walkTypes, type TypeDef } from "@itl/compiler";
import { compileOk, doc } from "../_helpers/compile.js";

const graph = compileOk(
  doc(
    { kind: "record", name: "Point", fields: [{ name: "x", type: "Coord" }, { name: "y", type: "Coord" }] },
    { kind: "int", name: "Coord", bits: 32 },
    { kind: "sequence", type: "Point" },
  ),
);

describe("ValidatedGraph", () => {
  test("separates named types from anonymous roots", () => {
    expect(graph.types.map((t) => t.name)).toEqual(["Point", "Coord"]);
    expect(graph.roots.map((r) => r.kind)).toEqual(["record", "int", "sequence"]);
    expect(graph.names()).toEqual(["Point", "Coord"]);
  });

  test("looks definitions up by name and id", () => {
    const id = graph.idOf("Coord");
    if (id === undefined) throw new Error("expected an id");
    expect(graph.has("Coord")).toBe(true);
    expect(graph.has("Nope")).toBe(false);
    expect(graph.node(id)).toBe(graph.lookup("Coord"));
    expect(graph.definition("Coord")).toMatchObject({ name: "Coord", loc: { path: "types[1]" }, topLevel: true });
  });

  test("is immutable", () => {
    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.types)).toBe(true);
    expect(Object.isFrozen(graph.lookup("Point"))).toBe(true);
  });

  test("refuses to resolve an unresolved marker", () => {
    const loc = { path: "$", span: { start: 0, end: 0 } };
    expect(() => graph.resolve({ kind: "unresolved", name: "Ghost", loc })).toThrow(
      "Unresolved reference 'Ghost' in a validated graph",
    );
  });

  test("walks each definition once, following named links", () => {
    const visited: string[] = [];
    graph.walk((def) => visited.push(def.name ?? def.kind));
    expect(visited).toEqual(["Point", "Coord", "sequence"]);
  });
});

describe("walkTypes", () => {
  test("stays inside inline definitions without a registry", () => {
    const anonymous = graph.roots[2];
    if (!anonymous) throw new Error("expected a root");
    const visited: TypeDef[] = [];
    walkTypes(anonymous, (def) => visited.push(def));
    expect(visited).toEqual([anonymous]);
    expect(childRefs(anonymous).map((r) => r.kind)).toEqual(["named"]);
  });
});

import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type StructureData = DiagnosticDataBase & {
  property?: string;
  kind?: string;
  expected?: string;
  suggestion?: string;
};

const shape = {
  category: "shape",
  status: "canonical",
  defaultSeverity: "error",
  impact: "blocking",
  span: "span",
  stages: ["build"],
} as const;

export const structureDiagnostics = {
  "itl/invalid-root": defineDiagnostic<StructureData>({
    ...shape,
    span: "either",
    description: "The document root is not an object with a `types` array.",
  }),
  "itl/missing-kind": defineDiagnostic<StructureData>({
    ...shape,
    description: "A type definition has no `kind` string.",
  }),
  "itl/unknown-kind": defineDiagnostic<StructureData>({
    ...shape,
    description: "A type definition names a kind the active grammar does not know.",
    data: { required: ["kind"] },
  }),
  "itl/missing-property": defineDiagnostic<StructureData>({
    ...shape,
    description: "An object lacks a property its grammar requires.",
    data: { required: ["property"] },
  }),
  "itl/invalid-property": defineDiagnostic<StructureData>({
    ...shape,
    description: "A property holds a value of the wrong JSON kind or outside its allowed set.",
    data: { required: ["property", "expected"] },
  }),
  "itl/unknown-property": defineDiagnostic<StructureData>({
    ...shape,
    description: "An object carries a property its grammar does not define.",
    data: { required: ["property"], optional: ["suggestion"] },
  }),
  "itl/duplicate-property": defineDiagnostic<StructureData>({
    ...shape,
    description: "The same key appears twice in one object.",
    data: { required: ["property"] },
  }),
  "itl/duplicate-type-name": defineDiagnostic<StructureData>({
    ...shape,
    category: "names",
    description: "Two type definitions share a name.",
    data: { required: ["name"] },
  }),
  "itl/unknown-type-reference": defineDiagnostic<StructureData>({
    ...shape,
    category: "reference",
    description: "A type reference names no definition in the document.",
    data: { required: ["name"], optional: ["suggestion"] },
  }),
} as const;

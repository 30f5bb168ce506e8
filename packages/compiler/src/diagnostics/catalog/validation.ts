import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type ValidationData = DiagnosticDataBase & {
  /** Second party of a pairwise conflict (duplicate name, overlapping field). */
  other?: string;
  labels?: readonly string[];
  value?: string;
};

const rule = {
  status: "canonical",
  defaultSeverity: "error",
  impact: "blocking",
  span: "span",
  stages: ["validate"],
} as const;

export const validationDiagnostics = {
  // names
  "itl/duplicate-field-name": defineDiagnostic<ValidationData>({
    ...rule,
    category: "names",
    description: "Two fields of one record or union share a name.",
    data: { required: ["name"] },
  }),
  "itl/duplicate-value-name": defineDiagnostic<ValidationData>({
    ...rule,
    category: "names",
    description: "Two values of one enum or bitset share a name.",
    data: { required: ["name"] },
  }),

  // bounds
  "itl/size-exceeds-capacity": defineDiagnostic<ValidationData>({
    ...rule,
    category: "bounds",
    description: "A scalar size is larger than the declared capacity.",
  }),
  "itl/invalid-size": defineDiagnostic<ValidationData>({
    ...rule,
    category: "bounds",
    description: "A scalar size is negative.",
  }),
  "itl/invalid-dimension": defineDiagnostic<ValidationData>({
    ...rule,
    category: "bounds",
    description: "A dimension of a multi-dimensional size is not a positive integer.",
  }),
  "itl/invalid-capacity": defineDiagnostic<ValidationData>({
    ...rule,
    category: "bounds",
    description: "A capacity is negative.",
  }),

  // numeric
  "itl/invalid-fixed": defineDiagnostic<ValidationData>({
    ...rule,
    category: "numeric",
    description: "Fixed-point parameters break `base >= 2`, `digits > 0` or `0 <= scale <= digits`.",
  }),
  "itl/invalid-int-bits": defineDiagnostic<ValidationData>({
    ...rule,
    category: "numeric",
    description: "An int declares a bit width that is not positive.",
  }),

  // unions
  "itl/empty-union": defineDiagnostic<ValidationData>({
    ...rule,
    category: "unions",
    description: "A union declares no fields.",
  }),
  "itl/multiple-default-fields": defineDiagnostic<ValidationData>({
    ...rule,
    category: "unions",
    description: "More than one union field has an empty label set.",
  }),
  "itl/overlapping-labels": defineDiagnostic<ValidationData>({
    ...rule,
    category: "unions",
    description: "Two union fields share a discriminator label.",
    data: { required: ["name", "other", "labels"] },
  }),
  "itl/duplicate-label": defineDiagnostic<ValidationData>({
    ...rule,
    category: "unions",
    description: "A union field lists the same label twice.",
    data: { required: ["value"] },
  }),
  "itl/invalid-label": defineDiagnostic<ValidationData>({
    ...rule,
    category: "unions",
    description: "A label is not a legal value of the discriminator type.",
    data: { required: ["value"] },
  }),
  "itl/invalid-discriminator": defineDiagnostic<ValidationData>({
    ...rule,
    category: "unions",
    description: "A union discriminator is not a discrete kind (int, byte, bool, enum or rune).",
  }),

  // containment
  "itl/infinite-type": defineDiagnostic<ValidationData>({
    ...rule,
    category: "containment",
    description: "A type contains itself by value with no base case, so no finite value exists.",
    data: { required: ["name"] },
  }),

  // legacy kinds
  "itl/duplicate-enum-value": defineDiagnostic<ValidationData>({
    ...rule,
    category: "legacy",
    description: "Two enum members resolve to the same integer value.",
    data: { required: ["value"] },
  }),
  "itl/duplicate-bit": defineDiagnostic<ValidationData>({
    ...rule,
    category: "legacy",
    description: "Two bitset members claim the same bit position.",
    data: { required: ["value"] },
  }),
  "itl/invalid-bit": defineDiagnostic<ValidationData>({
    ...rule,
    category: "legacy",
    description: "A bitset member has a negative bit position.",
    data: { required: ["value"] },
  }),
} as const;

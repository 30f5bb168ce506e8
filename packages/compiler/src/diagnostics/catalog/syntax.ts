import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type SyntaxData = DiagnosticDataBase & {
  offset?: number;
  line?: number;
  character?: number;
};

export const syntaxDiagnostics = {
  "itl/json-syntax": defineDiagnostic<SyntaxData>({
    category: "syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    span: "span",
    stages: ["parse"],
    description: "The document is not well-formed JSON.",
    data: {
      required: ["offset", "line", "character"],
    },
  }),
  "itl/invalid-encoding": defineDiagnostic<SyntaxData>({
    category: "syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    span: "document",
    stages: ["parse"],
    description: "The input bytes are not valid UTF-8.",
  }),
} as const;

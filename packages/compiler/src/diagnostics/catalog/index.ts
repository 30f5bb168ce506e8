import type {
  DiagnosticDataByCode as CatalogDataByCode,
  DiagnosticStage,
  DiagnosticsCatalog,
} from "../types.js";
import { syntaxDiagnostics } from "./syntax.js";
import { structureDiagnostics } from "./structure.js";
import { validationDiagnostics } from "./validation.js";

export { syntaxDiagnostics, type SyntaxData } from "./syntax.js";
export { structureDiagnostics, type StructureData } from "./structure.js";
export { validationDiagnostics, type ValidationData } from "./validation.js";

// Every code the pipeline can emit.
export const diagnosticsCatalog = {
  ...syntaxDiagnostics,
  ...structureDiagnostics,
  ...validationDiagnostics,
} as const satisfies DiagnosticsCatalog;

export const diagnosticsByStage = {
  parse: syntaxDiagnostics,
  build: structureDiagnostics,
  validate: validationDiagnostics,
} as const satisfies Record<DiagnosticStage, DiagnosticsCatalog>;

export type DiagnosticCode = keyof typeof diagnosticsCatalog;
export type DiagnosticDataByCode = CatalogDataByCode<typeof diagnosticsCatalog>;
export type DiagnosticDataFor<Code extends DiagnosticCode> = DiagnosticDataByCode[Code];
export type DiagnosticCodeForStage<Stage extends DiagnosticStage> = keyof (typeof diagnosticsByStage)[Stage] & string;

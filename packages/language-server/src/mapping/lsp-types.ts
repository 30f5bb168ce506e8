/**
 * Type mapping utilities: compiler results → LSP types
 */
import {
  DiagnosticSeverity as LspDiagnosticSeverity,
  SymbolKind,
  type Diagnostic,
  type DiagnosticRelatedInformation,
  type DocumentSymbol,
  type Hover,
  type Location,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type {
  DefinitionEntry,
  DiagnosticSeverity,
  DocumentSymbolInfo,
  HoverInfo,
  ItlDiagnostic,
  SourceSpan,
} from "@itl/compiler";
import { spanToRange, spanToRangeOrStart } from "../services/spans.js";

export const DIAGNOSTIC_SOURCE = "itl";

function toLspSeverity(sev: DiagnosticSeverity): LspDiagnosticSeverity {
  switch (sev) {
    case "warning":
      return LspDiagnosticSeverity.Warning;
    case "info":
      return LspDiagnosticSeverity.Information;
    default:
      return LspDiagnosticSeverity.Error;
  }
}

export function mapDiagnostics(diags: readonly ItlDiagnostic[], doc: TextDocument): Diagnostic[] {
  return diags.map((diag) => {
    const related: DiagnosticRelatedInformation[] = (diag.related ?? []).flatMap((rel) =>
      rel.span ? [{ message: rel.message, location: { uri: doc.uri, range: spanToRange(doc, rel.span) } }] : [],
    );
    const base: Diagnostic = {
      range: spanToRangeOrStart(doc, diag.span),
      message: diag.path ? `${diag.message} (${diag.path})` : diag.message,
      severity: toLspSeverity(diag.severity),
      code: diag.code,
      source: DIAGNOSTIC_SOURCE,
    };
    if (related.length) base.relatedInformation = related;
    return base;
  });
}

export function mapHover(hover: HoverInfo | null, doc: TextDocument): Hover | null {
  if (!hover) return null;
  return {
    contents: { kind: "markdown", value: hover.contents },
    range: spanToRange(doc, hover.span),
  };
}

export function mapDefinition(entry: DefinitionEntry | null, doc: TextDocument): Location | null {
  if (!entry) return null;
  return { uri: doc.uri, range: spanToRange(doc, entry.nameSpan) };
}

export function mapLocations(spans: readonly SourceSpan[], doc: TextDocument): Location[] {
  return spans.map((span) => ({ uri: doc.uri, range: spanToRange(doc, span) }));
}

export function toSymbolKind(kind: string): SymbolKind {
  switch (kind) {
    case "record":
      return SymbolKind.Struct;
    case "union":
    case "enum":
      return SymbolKind.Enum;
    case "sequence":
      return SymbolKind.Array;
    case "string":
    case "rune":
      return SymbolKind.String;
    case "bool":
      return SymbolKind.Boolean;
    case "int":
    case "float":
    case "fixed":
    case "byte":
      return SymbolKind.Number;
    default:
      return SymbolKind.TypeParameter;
  }
}

export function mapDocumentSymbols(symbols: readonly DocumentSymbolInfo[], doc: TextDocument): DocumentSymbol[] {
  return symbols.map((symbol) => {
    const mapped: DocumentSymbol = {
      name: symbol.name,
      kind: toSymbolKind(symbol.detail),
      range: spanToRange(doc, symbol.span),
      selectionRange: spanToRange(doc, symbol.selectionSpan),
    };
    if (symbol.detail) mapped.detail = symbol.detail;
    if (symbol.children.length) mapped.children = mapDocumentSymbols(symbol.children, doc);
    return mapped;
  });
}

import { spanContains, type SourceSpan } from "../model/span.js";
import type { TypeDef, TypeRef } from "../model/types.js";
import type { DefinitionEntry } from "../analysis/20-build/registry.js";
import type { DocumentAnalysis } from "./analysis.js";

// ============================================================================
// Definition
// ============================================================================

/**
 * Definition of the name under `offset`: the target of a type reference, or
 * the definition itself when the offset is on its `name`.
 */
export function definitionAt(analysis: DocumentAnalysis, offset: number): DefinitionEntry | null {
  const ref = analysis.references.find((r) => spanContains(r.loc.span, offset));
  if (ref) {
    return ref.target === null ? null : (analysis.definitions[ref.target] ?? null);
  }
  return analysis.definitions.find((d) => spanContains(d.nameSpan, offset)) ?? null;
}

/** Every reference to `name`, in document order. */
export function referencesTo(analysis: DocumentAnalysis, name: string): readonly SourceSpan[] {
  return analysis.references.filter((r) => r.name === name).map((r) => r.loc.span);
}

// ============================================================================
// Hover
// ============================================================================

export interface HoverInfo {
  /** Span of the hovered name. */
  readonly span: SourceSpan;
  /** Markdown. */
  readonly contents: string;
}

export function hoverAt(analysis: DocumentAnalysis, offset: number): HoverInfo | null {
  const ref = analysis.references.find((r) => spanContains(r.loc.span, offset));
  const entry = ref ? definitionAt(analysis, offset) : analysis.definitions.find((d) => spanContains(d.nameSpan, offset));
  if (!entry) {
    return ref ? { span: ref.loc.span, contents: `Unknown type \`${ref.name}\`` } : null;
  }

  const def = analysis.registry?.lookup(entry.name);
  const lines = [`**${entry.name}**${def ? `: ${describeTypeDef(def)}` : ""}`, "", `Defined at \`${entry.loc.path}\``];
  return { span: ref ? ref.loc.span : entry.nameSpan, contents: lines.join("\n") };
}

/** One-line summary of a definition, e.g. `int, 8 bits, unsigned`. */
export function describeTypeDef(def: TypeDef): string {
  switch (def.kind) {
    case "byte":
    case "bool":
    case "rune":
      return def.kind;
    case "int":
      return [
        "int",
        def.bits === undefined ? "arbitrary precision" : `${def.bits} bits`,
        ...(def.unsigned ? ["unsigned"] : []),
      ].join(", ");
    case "float":
      return def.model === undefined ? "float" : `float, ${def.model}`;
    case "fixed":
      return `fixed, base ${def.base}, ${def.digits} digits, scale ${def.scale}`;
    case "sequence":
      return [`sequence of ${describeRef(def.type)}`, ...bounds(def.size, def.capacity)].join(", ");
    case "string":
      return ["string", ...bounds(def.size, def.capacity)].join(", ");
    case "record":
      return `record, ${plural(def.fields.length, "field")}`;
    case "union":
      return `union on ${describeRef(def.discriminator)}, ${plural(def.fields.length, "field")}`;
    case "enum":
      return `enum, ${plural(def.values.length, "value")}`;
    case "bitset":
      return `bitset, ${plural(def.values.length, "bit")}`;
  }
}

function describeRef(ref: TypeRef): string {
  switch (ref.kind) {
    case "named":
    case "unresolved":
      return ref.name;
    case "inline":
      return ref.def.name ?? ref.def.kind;
  }
}

function bounds(size: number | readonly number[] | undefined, capacity: number | undefined): string[] {
  const out: string[] = [];
  if (size !== undefined) out.push(`size ${typeof size === "number" ? size : size.join("×")}`);
  if (capacity !== undefined) out.push(`capacity ${capacity}`);
  return out;
}

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? "" : "s"}`;
}

// ============================================================================
// Document symbols
// ============================================================================

export interface DocumentSymbolInfo {
  readonly name: string;
  /** Type kind, when the definition was built. */
  readonly detail: string;
  readonly span: SourceSpan;
  readonly selectionSpan: SourceSpan;
  readonly children: readonly DocumentSymbolInfo[];
}

/** Named definitions as an outline; named inline definitions nest under their container. */
export function documentSymbols(analysis: DocumentAnalysis): DocumentSymbolInfo[] {
  interface MutableSymbol extends DocumentSymbolInfo {
    readonly children: MutableSymbol[];
  }

  const top: MutableSymbol[] = [];
  const open: MutableSymbol[] = [];
  // Entries are in pre-order, so the innermost enclosing symbol is on top of `open`.
  for (const entry of analysis.definitions) {
    const symbol: MutableSymbol = {
      name: entry.name,
      detail: analysis.registry?.lookup(entry.name)?.kind ?? "",
      span: entry.loc.span,
      selectionSpan: entry.nameSpan,
      children: [],
    };
    while (open.length > 0) {
      const last = open[open.length - 1];
      if (last && last.span.start <= symbol.span.start && symbol.span.end <= last.span.end) break;
      open.pop();
    }
    const parent = open[open.length - 1];
    if (parent) parent.children.push(symbol);
    else top.push(symbol);
    open.push(symbol);
  }
  return top;
}

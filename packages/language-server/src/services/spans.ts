import { normalizeSpan, type SourceSpan } from "@itl/compiler";
import type { Position, Range } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";

const BOM = "\uFEFF";

/** The compiler reads past a leading BOM; the editor counts it as a character. */
function bomLength(doc: TextDocument): number {
  return doc.getText().startsWith(BOM) ? BOM.length : 0;
}

export function spanToRange(doc: TextDocument, span: SourceSpan): Range {
  const normalized = normalizeSpan(span);
  const shift = bomLength(doc);
  return { start: doc.positionAt(normalized.start + shift), end: doc.positionAt(normalized.end + shift) };
}

/** Span-less diagnostics (an undecodable file) are pinned to the start of the document. */
export function spanToRangeOrStart(doc: TextDocument, span: SourceSpan | null | undefined): Range {
  if (!span) return { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } };
  return spanToRange(doc, span);
}

/** Editor position to a compiler offset. */
export function positionToOffset(doc: TextDocument, position: Position): number {
  return Math.max(0, doc.offsetAt(position) - bomLength(doc));
}

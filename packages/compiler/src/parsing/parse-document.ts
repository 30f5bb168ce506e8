import type { JsonNode } from "../model/json.js";
import { positionAtOffset } from "../model/text.js";
import type { DiagnosticEmitter } from "../diagnostics/emitter.js";
import type { diagnosticsCatalog } from "../diagnostics/catalog/index.js";
import { debug } from "../shared/debug.js";
import { JsonSyntaxError, parseJson } from "./json-parser.js";

export type DocumentInput = string | Uint8Array;

export interface ParseDocumentOptions {
  maxDepth?: number;
  diagnostics: DiagnosticEmitter<typeof diagnosticsCatalog, "itl/json-syntax" | "itl/invalid-encoding">;
}

export interface ParsedDocument {
  /** Decoded text; spans in the tree index into it. */
  readonly text: string;
  /** Null when parsing failed; the ParseError has been emitted. */
  readonly root: JsonNode | null;
}

const BOM = "\uFEFF";

/**
 * Stage 1: bytes or text → JSON tree.
 *
 * Knows nothing about ITL. Any syntax error is fatal and reported once.
 */
export function parseDocument(input: DocumentInput, options: ParseDocumentOptions): ParsedDocument {
  const decoded = decodeInput(input);
  if (decoded === null) {
    options.diagnostics.emit("itl/invalid-encoding", {
      message: "Input is not valid UTF-8",
      path: null,
      span: null,
    });
    return { text: "", root: null };
  }
  const text = decoded.startsWith(BOM) ? decoded.slice(BOM.length) : decoded;

  try {
    const root = parseJson(text, options.maxDepth === undefined ? {} : { maxDepth: options.maxDepth });
    debug.parse("done", { length: text.length, root: root.kind });
    return { text, root };
  } catch (e) {
    if (!(e instanceof JsonSyntaxError)) throw e;
    const { line, character } = positionAtOffset(text, e.offset);
    debug.parse("syntax-error", { offset: e.offset, message: e.message });
    options.diagnostics.emit("itl/json-syntax", {
      message: `${e.message} (line ${line + 1}, column ${character + 1})`,
      path: null,
      span: e.span,
      data: { offset: e.offset, line, character },
    });
    return { text, root: null };
  }
}

function decodeInput(input: DocumentInput): string | null {
  if (typeof input === "string") return input;
  try {
    // BOM is kept here and stripped above with the string case.
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(input);
  } catch (e) {
    if (e instanceof TypeError) return null;
    throw e;
  }
}

/**
 * LSP feature handlers: hover, definition, references, document symbols
 *
 * Each handler is wrapped in try/catch to prevent exceptions from destabilizing
 * the LSP connection. Errors are logged and empty results are returned.
 */
import type {
  DocumentSymbol,
  DocumentSymbolParams,
  Hover,
  Location,
  ReferenceParams,
  TextDocumentPositionParams,
} from "vscode-languageserver/node.js";
import { definitionAt, documentSymbols, hoverAt, referencesTo } from "@itl/compiler";
import type { ServerContext } from "../context.js";
import { mapDefinition, mapDocumentSymbols, mapHover, mapLocations } from "../mapping/lsp-types.js";
import { positionToOffset } from "../services/spans.js";

function formatError(e: unknown): string {
  if (e instanceof Error) return e.stack ?? e.message;
  return String(e);
}

export function handleHover(ctx: ServerContext, params: TextDocumentPositionParams): Hover | null {
  try {
    const target = ctx.analyze(params.textDocument.uri);
    if (!target) return null;
    const offset = positionToOffset(target.doc, params.position);
    return mapHover(hoverAt(target.analysis, offset), target.doc);
  } catch (e) {
    ctx.logger.error(`[hover] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return null;
  }
}

export function handleDefinition(ctx: ServerContext, params: TextDocumentPositionParams): Location | null {
  try {
    const target = ctx.analyze(params.textDocument.uri);
    if (!target) return null;
    const offset = positionToOffset(target.doc, params.position);
    return mapDefinition(definitionAt(target.analysis, offset), target.doc);
  } catch (e) {
    ctx.logger.error(`[definition] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return null;
  }
}

export function handleReferences(ctx: ServerContext, params: ReferenceParams): Location[] {
  try {
    const target = ctx.analyze(params.textDocument.uri);
    if (!target) return [];
    const entry = definitionAt(target.analysis, positionToOffset(target.doc, params.position));
    if (!entry) return [];
    const spans = referencesTo(target.analysis, entry.name);
    const all = params.context.includeDeclaration ? [entry.nameSpan, ...spans] : spans;
    return mapLocations(all, target.doc);
  } catch (e) {
    ctx.logger.error(`[references] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return [];
  }
}

export function handleDocumentSymbols(ctx: ServerContext, params: DocumentSymbolParams): DocumentSymbol[] {
  try {
    const target = ctx.analyze(params.textDocument.uri);
    if (!target) return [];
    return mapDocumentSymbols(documentSymbols(target.analysis), target.doc);
  } catch (e) {
    ctx.logger.error(`[documentSymbol] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return [];
  }
}

/**
 * Registers all LSP feature handlers on the connection.
 */
export function registerFeatureHandlers(ctx: ServerContext): void {
  ctx.connection.onHover((params) => handleHover(ctx, params));
  ctx.connection.onDefinition((params) => handleDefinition(ctx, params));
  ctx.connection.onReferences((params) => handleReferences(ctx, params));
  ctx.connection.onDocumentSymbol((params) => handleDocumentSymbols(ctx, params));
}

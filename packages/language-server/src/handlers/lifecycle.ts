/**
 * LSP lifecycle handlers: initialize, document events, configuration changes
 */
import {
  TextDocumentSyncKind,
  type DidChangeConfigurationParams,
  type InitializeParams,
  type InitializeResult,
  type ServerCapabilities,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { DEFAULT_COMPILE_OPTIONS, debug } from "@itl/compiler";
import type { ServerContext } from "../context.js";
import { mapDiagnostics } from "../mapping/lsp-types.js";
import { settingsToCompileOptions } from "../services/settings.js";

export const SERVER_CAPABILITIES: ServerCapabilities = {
  textDocumentSync: TextDocumentSyncKind.Incremental,
  hoverProvider: true,
  definitionProvider: true,
  referencesProvider: true,
  documentSymbolProvider: true,
};

/**
 * Re-analyze a document and publish its diagnostics. When analysis throws, the
 * previously published diagnostics are left in place.
 */
export async function refreshDocument(ctx: ServerContext, doc: TextDocument): Promise<void> {
  try {
    ctx.program.upsertDocument(doc.uri, doc.getText(), doc.version);
    const analysis = ctx.program.getAnalysis(doc.uri);
    const diagnostics = mapDiagnostics(analysis.diagnostics, doc);
    debug.server("diagnostics", { uri: doc.uri, version: doc.version, count: diagnostics.length });
    await ctx.connection.sendDiagnostics({ uri: doc.uri, version: doc.version, diagnostics });
  } catch (e: unknown) {
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    ctx.logger.error(`refreshDocument failed: ${message}`);
  }
}

/** Publish an empty diagnostic set for a closed document. */
export async function clearDiagnostics(ctx: ServerContext, uri: string): Promise<void> {
  try {
    await ctx.connection.sendDiagnostics({ uri, diagnostics: [] });
  } catch (e: unknown) {
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    ctx.logger.error(`clearing diagnostics for ${uri} failed: ${message}`);
  }
}

async function refreshAllOpenDocuments(ctx: ServerContext): Promise<void> {
  for (const doc of ctx.documents.all()) {
    await refreshDocument(ctx, doc);
  }
}

/**
 * Apply the client's `itl` settings. Returns true when the compile options
 * changed (and open documents need new diagnostics).
 */
export function applySettings(ctx: ServerContext, settings: unknown): boolean {
  const options = settingsToCompileOptions(settings, ctx.logger);
  const grammar = options.grammar ?? DEFAULT_COMPILE_OPTIONS.grammar;
  if (grammar === ctx.program.options.grammar) return false;
  ctx.program.setOptions({ ...options, grammar });
  ctx.logger.info(`[settings] grammar=${grammar}`);
  return true;
}

async function reloadSettings(ctx: ServerContext, pushed: unknown): Promise<void> {
  try {
    const settings: unknown = ctx.supportsConfiguration
      ? await ctx.connection.workspace.getConfiguration("itl")
      : pushed;
    if (applySettings(ctx, settings)) await refreshAllOpenDocuments(ctx);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    ctx.logger.error(`reloadSettings failed: ${message}`);
  }
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  ctx.supportsConfiguration = params.capabilities.workspace?.configuration === true;
  ctx.logger.info(`initialize: grammar=${ctx.program.options.grammar} configuration=${ctx.supportsConfiguration}`);
  return {
    capabilities: SERVER_CAPABILITIES,
    serverInfo: { name: "itl-language-server" },
  };
}

function pushedSettings(params: DidChangeConfigurationParams): unknown {
  const settings: unknown = params.settings;
  if (typeof settings !== "object" || settings === null) return undefined;
  return Reflect.get(settings, "itl");
}

/**
 * Registers all lifecycle handlers on the connection and documents.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  ctx.connection.onInitialize((params) => handleInitialize(ctx, params));

  ctx.connection.onInitialized(() => {
    void reloadSettings(ctx, undefined);
  });

  ctx.documents.onDidOpen((e) => {
    ctx.logger.log(`didOpen ${e.document.uri}`);
    void refreshDocument(ctx, e.document);
  });

  ctx.documents.onDidChangeContent((e) => {
    ctx.logger.log(`didChange ${e.document.uri}`);
    void refreshDocument(ctx, e.document);
  });

  ctx.connection.onDidChangeConfiguration((params) => {
    ctx.logger.log("didChangeConfiguration: reloading itl settings");
    void reloadSettings(ctx, pushedSettings(params));
  });

  ctx.documents.onDidClose((e) => {
    ctx.logger.log(`didClose ${e.document.uri}`);
    ctx.program.closeDocument(e.document.uri);
    void clearDiagnostics(ctx, e.document.uri);
  });
}

/**
 * ITL Language Server - Entry Point
 *
 * This is a thin entry point that creates the server context and wires together
 * all the handlers. The actual logic is split into:
 *
 * - context.ts            - ServerContext with the connection, documents and program
 * - mapping/lsp-types.ts  - Type conversion from compiler results to LSP types
 * - handlers/features.ts  - LSP feature handlers (hover, definition, symbols)
 * - handlers/lifecycle.ts - Lifecycle, document and configuration handlers
 */
import { createConnection, ProposedFeatures, TextDocuments } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { configureDebug } from "@itl/compiler";
import { createServerContext } from "./context.js";
import type { Logger } from "./services/types.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";

// Create LSP connection and document store
const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

// Create logger that writes to LSP connection console
const logger: Logger = {
  log: (m: string) => connection.console.log(`[itl-ls] ${m}`),
  info: (m: string) => connection.console.info(`[itl-ls] ${m}`),
  warn: (m: string) => connection.console.warn(`[itl-ls] ${m}`),
  error: (m: string) => connection.console.error(`[itl-ls] ${m}`),
};

// stdout carries the protocol; compiler debug channels go to the console too.
configureDebug({ output: (m: string) => connection.console.log(`[itl-ls] ${m}`) });

const ctx = createServerContext({ connection, documents, logger });

registerLifecycleHandlers(ctx);
registerFeatureHandlers(ctx);

// Start listening
documents.listen(connection);
connection.listen();

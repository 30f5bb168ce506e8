import type { Connection, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { DefaultItlProgram, type CompileOptions, type DocumentAnalysis, type ItlProgram } from "@itl/compiler";
import type { Logger } from "./services/types.js";

/**
 * Shared server context passed to all handlers.
 * Holds the connection, the open documents and the program that analyzes them.
 */
export interface ServerContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly logger: Logger;
  readonly program: ItlProgram;

  /** Set from the client's capabilities during initialize. */
  supportsConfiguration: boolean;

  /** Sync the live document into the program and return its analysis; null when it is not open. */
  analyze(uri: string): { doc: TextDocument; analysis: DocumentAnalysis } | null;
}

export interface ServerContextInit {
  connection: Connection;
  documents: TextDocuments<TextDocument>;
  logger: Logger;
  options?: CompileOptions;
}

export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, documents, logger } = init;
  const program = new DefaultItlProgram(init.options);

  function analyze(uri: string): { doc: TextDocument; analysis: DocumentAnalysis } | null {
    const doc = documents.get(uri);
    if (!doc) return null;
    program.upsertDocument(uri, doc.getText(), doc.version);
    return { doc, analysis: program.getAnalysis(uri) };
  }

  return {
    connection,
    documents,
    logger,
    program,
    supportsConfiguration: false,
    analyze,
  };
}

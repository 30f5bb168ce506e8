import { describe, test, expect, vi } from "vitest";
import { DiagnosticSeverity, TextDocumentSyncKind } from "vscode-languageserver/node.js";
import {
  applySettings,
  handleInitialize,
  refreshDocument,
  registerLifecycleHandlers,
} from "@itl/language-server";
import { createTestServer, docOf, TEST_URI } from "../helpers/test-context.js";

const UNKNOWN_REF = `{"types": [{"kind": "record", "name": "R", "fields": [{"name": "a", "type": "Missing"}]}]}`;
const LEGACY_ENUM = `{"types": [{"kind": "enum", "name": "Color", "values": ["red", "green"]}]}`;

describe("refreshDocument", () => {
  test("publishes the document's diagnostics", async () => {
    const server = createTestServer({ [TEST_URI]: UNKNOWN_REF });
    await refreshDocument(server.ctx, docOf(server));

    expect(server.connection.sendDiagnostics).toHaveBeenCalledTimes(1);
    expect(server.connection.sendDiagnostics).toHaveBeenCalledWith({
      uri: TEST_URI,
      version: 1,
      diagnostics: [
        {
          range: { start: { line: 0, character: 76 }, end: { line: 0, character: 85 } },
          message: "Unknown type 'Missing'. (types[0].fields[0].type)",
          severity: DiagnosticSeverity.Error,
          code: "itl/unknown-type-reference",
          source: "itl",
        },
      ],
    });
  });

  test("keeps previous diagnostics when analysis throws", async () => {
    const server = createTestServer({ [TEST_URI]: UNKNOWN_REF });
    vi.spyOn(server.ctx.program, "getAnalysis").mockImplementation(() => {
      throw new Error("analysis failed");
    });

    await refreshDocument(server.ctx, docOf(server));

    expect(server.connection.sendDiagnostics).not.toHaveBeenCalled();
    expect(server.logger.error).toHaveBeenCalledWith(expect.stringContaining("refreshDocument failed"));
  });
});

describe("handleInitialize", () => {
  test("advertises the supported features", () => {
    const { ctx } = createTestServer({});
    const result = handleInitialize(ctx, {
      processId: null,
      rootUri: null,
      capabilities: { workspace: { configuration: true } },
    });

    expect(result.capabilities).toEqual({
      textDocumentSync: TextDocumentSyncKind.Incremental,
      hoverProvider: true,
      definitionProvider: true,
      referencesProvider: true,
      documentSymbolProvider: true,
    });
    expect(ctx.supportsConfiguration).toBe(true);
  });

  test("falls back to pushed settings when the client cannot be asked", () => {
    const { ctx } = createTestServer({});
    handleInitialize(ctx, { processId: null, rootUri: null, capabilities: {} });
    expect(ctx.supportsConfiguration).toBe(false);
  });
});

describe("applySettings", () => {
  test("switches the grammar profile once", () => {
    const { ctx } = createTestServer({});
    expect(applySettings(ctx, { grammar: "compat" })).toBe(true);
    expect(ctx.program.options.grammar).toBe("compat");
    expect(applySettings(ctx, { grammar: "compat" })).toBe(false);
  });

  test("ignores an unknown profile", () => {
    const { ctx, logger } = createTestServer({});
    expect(applySettings(ctx, { grammar: "legacy" })).toBe(false);
    expect(ctx.program.options.grammar).toBe("current");
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe("registerLifecycleHandlers", () => {
  test("clears diagnostics and forgets the document on close", () => {
    const server = createTestServer({ [TEST_URI]: LEGACY_ENUM });
    registerLifecycleHandlers(server.ctx);
    server.ctx.program.upsertDocument(TEST_URI, LEGACY_ENUM);

    const onClose = server.documents.onDidClose.mock.calls[0]?.[0];
    expect(onClose).toBeDefined();
    onClose?.({ document: docOf(server) });

    expect(server.ctx.program.has(TEST_URI)).toBe(false);
    expect(server.connection.sendDiagnostics).toHaveBeenCalledWith({ uri: TEST_URI, diagnostics: [] });
  });

  test("logs a failure to clear diagnostics on close", async () => {
    const server = createTestServer({ [TEST_URI]: LEGACY_ENUM });
    server.connection.sendDiagnostics.mockRejectedValueOnce(new Error("connection closed"));
    registerLifecycleHandlers(server.ctx);

    const onClose = server.documents.onDidClose.mock.calls[0]?.[0];
    onClose?.({ document: docOf(server) });

    await vi.waitFor(() => {
      expect(server.logger.error).toHaveBeenCalledWith(
        expect.stringContaining(`clearing diagnostics for ${TEST_URI} failed: Error: connection closed`),
      );
    });
  });

  test("re-checks open documents when pushed settings change the grammar", async () => {
    const server = createTestServer({ [TEST_URI]: LEGACY_ENUM });
    registerLifecycleHandlers(server.ctx);

    await refreshDocument(server.ctx, docOf(server));
    const before = server.connection.sendDiagnostics.mock.calls[0]?.[0];
    expect(before).toMatchObject({ diagnostics: [{ code: "itl/unknown-kind", message: "Kind 'enum' requires the compat grammar (types[0].kind)" }] });

    const onConfig = server.connection.onDidChangeConfiguration.mock.calls[0]?.[0];
    expect(onConfig).toBeDefined();
    onConfig?.({ settings: { itl: { grammar: "compat" } } });

    await vi.waitFor(() => {
      expect(server.connection.sendDiagnostics).toHaveBeenCalledTimes(2);
    });
    expect(server.connection.sendDiagnostics).toHaveBeenLastCalledWith({ uri: TEST_URI, version: 1, diagnostics: [] });
    expect(server.connection.workspace.getConfiguration).not.toHaveBeenCalled();
  });

  test("pulls the itl section when the client supports configuration requests", async () => {
    const server = createTestServer({ [TEST_URI]: LEGACY_ENUM }, { settings: { grammar: "compat" } });
    server.ctx.supportsConfiguration = true;
    registerLifecycleHandlers(server.ctx);

    const onInitialized = server.connection.onInitialized.mock.calls[0]?.[0];
    onInitialized?.({});

    await vi.waitFor(() => {
      expect(server.ctx.program.options.grammar).toBe("compat");
    });
    expect(server.connection.workspace.getConfiguration).toHaveBeenCalledWith("itl");
  });
});

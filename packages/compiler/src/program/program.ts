import { createHash } from "node:crypto";
import { resolveCompileOptions, type CompileOptions, type ResolvedCompileOptions } from "../config/options.js";
import { debug } from "../shared/debug.js";
import { analyzeDocument, type DocumentAnalysis } from "./analysis.js";

export type DocumentUri = string;

export interface DocumentSnapshot {
  readonly uri: DocumentUri;
  readonly text: string;
  readonly version: number;
}

/**
 * Open documents and their analyses.
 *
 * Analyses are cached per document and reused while the content hash and the
 * options fingerprint are unchanged; a version bump alone does not re-run the
 * pipeline.
 */
export interface ItlProgram {
  readonly options: ResolvedCompileOptions;
  upsertDocument(uri: DocumentUri, text: string, version?: number): void;
  closeDocument(uri: DocumentUri): void;
  /** Replace the compile options; every cached analysis is dropped. */
  setOptions(options: CompileOptions): void;
  has(uri: DocumentUri): boolean;
  uris(): readonly DocumentUri[];
  getAnalysis(uri: DocumentUri): DocumentAnalysis;
  getCacheStats(): ItlProgramCacheStats;
}

export interface ItlProgramCacheStats {
  readonly optionsFingerprint: string;
  readonly documents: number;
  readonly cached: number;
  readonly hits: number;
  readonly misses: number;
}

interface CachedAnalysis {
  readonly analysis: DocumentAnalysis;
  readonly contentHash: string;
  readonly optionsFingerprint: string;
}

export class DefaultItlProgram implements ItlProgram {
  #options: ResolvedCompileOptions;
  #optionsFingerprint: string;
  readonly #sources = new Map<DocumentUri, DocumentSnapshot>();
  readonly #cache = new Map<DocumentUri, CachedAnalysis>();
  #hits = 0;
  #misses = 0;

  constructor(options: CompileOptions = {}) {
    this.#options = resolveCompileOptions(options);
    this.#optionsFingerprint = fingerprintOptions(this.#options);
  }

  get options(): ResolvedCompileOptions {
    return this.#options;
  }

  upsertDocument(uri: DocumentUri, text: string, version?: number): void {
    const previous = this.#sources.get(uri);
    this.#sources.set(uri, { uri, text, version: version ?? (previous ? previous.version + 1 : 0) });
  }

  closeDocument(uri: DocumentUri): void {
    this.#sources.delete(uri);
    this.#cache.delete(uri);
  }

  setOptions(options: CompileOptions): void {
    this.#options = resolveCompileOptions(options);
    this.#optionsFingerprint = fingerprintOptions(this.#options);
    this.#cache.clear();
  }

  has(uri: DocumentUri): boolean {
    return this.#sources.has(uri);
  }

  uris(): readonly DocumentUri[] {
    return [...this.#sources.keys()];
  }

  getAnalysis(uri: DocumentUri): DocumentAnalysis {
    const snap = this.#sources.get(uri);
    if (!snap) {
      throw new Error(`ItlProgram: no snapshot for document ${uri}. Call upsertDocument(...) first.`);
    }
    const contentHash = hashContent(snap.text);
    const cached = this.#cache.get(uri);
    if (cached && cached.contentHash === contentHash && cached.optionsFingerprint === this.#optionsFingerprint) {
      this.#hits += 1;
      return cached.analysis;
    }

    this.#misses += 1;
    const analysis = analyzeDocument(snap.text, { ...this.#options, sourceName: uri });
    this.#cache.set(uri, { analysis, contentHash, optionsFingerprint: this.#optionsFingerprint });
    debug.pipeline("program.analyze", { uri, version: snap.version, ok: analysis.result.ok });
    return analysis;
  }

  getCacheStats(): ItlProgramCacheStats {
    return {
      optionsFingerprint: this.#optionsFingerprint,
      documents: this.#sources.size,
      cached: this.#cache.size,
      hits: this.#hits,
      misses: this.#misses,
    };
  }
}

function hashContent(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

function fingerprintOptions(options: ResolvedCompileOptions): string {
  // sourceName is per document and excluded.
  return hashContent(JSON.stringify({ grammar: options.grammar, maxDepth: options.maxDepth }));
}

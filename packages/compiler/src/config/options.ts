import { DEFAULT_MAX_DEPTH } from "../parsing/json-parser.js";

/**
 * Grammar profile.
 * - `current`: the model-centric grammar (`bits`/`model`/`base`), nine kinds.
 * - `compat`: additionally accepts the first-generation `rune`, `enum` and `bitset`
 *   kinds and `encoding` hints on int, float, fixed, string and rune.
 */
export type GrammarProfile = "current" | "compat";

export const GRAMMAR_PROFILES: readonly GrammarProfile[] = ["current", "compat"];

export interface CompileOptions {
  grammar?: GrammarProfile;
  /** Name shown in debug output. */
  sourceName?: string;
  /** Maximum JSON nesting depth. */
  maxDepth?: number;
}

export interface ResolvedCompileOptions {
  readonly grammar: GrammarProfile;
  readonly sourceName: string;
  readonly maxDepth: number;
}

export const DEFAULT_COMPILE_OPTIONS: ResolvedCompileOptions = Object.freeze({
  grammar: "current",
  sourceName: "<input>",
  maxDepth: DEFAULT_MAX_DEPTH,
});

/** Invalid host configuration. Document problems are never thrown. */
export class ItlConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ItlConfigError";
  }
}

export function isGrammarProfile(value: unknown): value is GrammarProfile {
  return typeof value === "string" && (GRAMMAR_PROFILES as readonly string[]).includes(value);
}

export function resolveCompileOptions(options: CompileOptions = {}): ResolvedCompileOptions {
  const grammar = options.grammar ?? DEFAULT_COMPILE_OPTIONS.grammar;
  if (!isGrammarProfile(grammar)) {
    throw new ItlConfigError(`Unknown grammar profile '${String(grammar)}'; expected one of ${GRAMMAR_PROFILES.join(", ")}`);
  }
  const maxDepth = options.maxDepth ?? DEFAULT_COMPILE_OPTIONS.maxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new ItlConfigError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return {
    grammar,
    sourceName: options.sourceName ?? DEFAULT_COMPILE_OPTIONS.sourceName,
    maxDepth,
  };
}

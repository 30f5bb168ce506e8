import { isGrammarProfile, type CompileOptions } from "@itl/compiler";
import type { Logger } from "./types.js";

/**
 * Compile options from the client's `itl` section. Unknown grammar values are
 * logged and ignored, leaving the default profile in place.
 */
export function settingsToCompileOptions(settings: unknown, logger: Logger): CompileOptions {
  if (typeof settings !== "object" || settings === null) return {};
  const grammar: unknown = Reflect.get(settings, "grammar");
  if (grammar === undefined || grammar === null) return {};
  if (!isGrammarProfile(grammar)) {
    logger.warn(`ignoring itl.grammar=${JSON.stringify(grammar)}; expected "current" or "compat"`);
    return {};
  }
  return { grammar };
}

// Shared compiler infrastructure
//
// Cross-cutting utilities used by multiple layers.
// This module only imports from model/ - no other compiler layers.

// Diagnostics
export {
  buildDiagnostic,
  compareDiagnostics,
  formatDiagnostic,
  type BuildDiagnosticInput,
} from "./diagnostics.js";

// Suggestions ("Did you mean?")
export {
  levenshteinDistance,
  findSimilar,
  findBestMatch,
  formatSuggestion,
  type FindSimilarOptions,
} from "./suggestions.js";

// Debug channels
export {
  debug,
  configureDebug,
  isDebugEnabled,
  refreshDebugChannels,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

// Immutability
export { deepFreeze } from "./freeze.js";

/**
 * String similarity utilities for "Did you mean?" suggestions.
 *
 * Used when a document mistypes:
 * - a type reference (e.g., "Flga" → "Flag")
 * - a kind (e.g., "recrod" → "record")
 * - a property key (e.g., "capactiy" → "capacity")
 */

/**
 * Levenshtein edit distance between two strings: the minimum number of
 * single-character insertions, deletions and substitutions turning one into the other.
 *
 * @example
 * levenshteinDistance("record", "recrod") // 2
 * levenshteinDistance("int", "int")       // 0
 */
export function levenshteinDistance(a: string, b: string): number {
  // Keep the shorter string in the row so memory is O(min(m, n)).
  if (a.length > b.length) [a, b] = [b, a];
  if (a.length === 0) return b.length;

  let prevRow = Array.from({ length: a.length + 1 }, (_, j) => j);
  let currRow = new Array<number>(a.length + 1).fill(0);

  for (let i = 1; i <= b.length; i++) {
    currRow[0] = i;
    for (let j = 1; j <= a.length; j++) {
      const cost = a[j - 1] === b[i - 1] ? 0 : 1;
      currRow[j] = Math.min(
        (prevRow[j] ?? 0) + 1, // deletion
        (currRow[j - 1] ?? 0) + 1, // insertion
        (prevRow[j - 1] ?? 0) + cost, // substitution
      );
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[a.length] ?? 0;
}

export interface FindSimilarOptions {
  /** Maximum edit distance to consider a match. Default: 2. */
  maxDistance?: number;
  /** Default: true. Type names are case-sensitive in ITL. */
  caseSensitive?: boolean;
  /** Maximum number of suggestions. Default: 1. */
  limit?: number;
}

/**
 * Candidates within `maxDistance` of `needle`, closest first, ties alphabetical.
 * An exact match is never suggested.
 */
export function findSimilar(
  needle: string,
  haystack: Iterable<string>,
  options: FindSimilarOptions = {},
): string[] {
  const { maxDistance = 2, caseSensitive = true, limit = 1 } = options;
  const normalizedNeedle = caseSensitive ? needle : needle.toLowerCase();

  const matches: { value: string; distance: number }[] = [];
  for (const candidate of haystack) {
    if (candidate === needle) continue;
    const normalized = caseSensitive ? candidate : candidate.toLowerCase();
    const distance = levenshteinDistance(normalizedNeedle, normalized);
    if (distance <= maxDistance) matches.push({ value: candidate, distance });
  }

  matches.sort((x, y) => x.distance - y.distance || (x.value < y.value ? -1 : x.value > y.value ? 1 : 0));
  return matches.slice(0, limit).map((m) => m.value);
}

/** Best single match, or null when nothing is close enough. */
export function findBestMatch(
  needle: string,
  haystack: Iterable<string>,
  options: Omit<FindSimilarOptions, "limit"> = {},
): string | null {
  return findSimilar(needle, haystack, { ...options, limit: 1 })[0] ?? null;
}

/**
 * Message suffix for a suggestion, or "" when there is none.
 *
 * @example
 * formatSuggestion("Flga", ["Flag", "Msg"]) // " Did you mean 'Flag'?"
 */
export function formatSuggestion(suggestion: string | null): string {
  return suggestion ? ` Did you mean '${suggestion}'?` : "";
}

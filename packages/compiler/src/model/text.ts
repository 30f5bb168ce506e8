/** Zero-based line and UTF-16 column, as editors count them. */
export interface Position {
  line: number;
  character: number;
}

/** Offsets at which each line begins. CRLF counts as one break, and so does a lone CR. */
export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 && text.charCodeAt(i + 1) === 10) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}

/** Line and column of `offset`, clamped to the text. */
export function positionAtOffset(
  text: string,
  offset: number,
  lineStarts: readonly number[] = computeLineStarts(text),
): Position {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((lineStarts[mid] ?? Number.POSITIVE_INFINITY) <= clamped) low = mid;
    else high = mid - 1;
  }
  return { line: low, character: clamped - (lineStarts[low] ?? 0) };
}

/** Half-open [start, end) range of UTF-16 offsets into the document text. */
export interface SourceSpan {
  readonly start: number;
  readonly end: number;
}

export function spanFromBounds(start: number, end: number): SourceSpan {
  return start <= end ? { start, end } : { start: end, end: start };
}

export function normalizeSpan(span: SourceSpan): SourceSpan {
  return spanFromBounds(span.start, span.end);
}

export function normalizeSpanMaybe(span: SourceSpan | null | undefined): SourceSpan | null {
  return span ? normalizeSpan(span) : null;
}

/** Inclusive of both edges so a cursor sitting right after a token still hits it. */
export function spanContains(span: SourceSpan, offset: number): boolean {
  return offset >= span.start && offset <= span.end;
}

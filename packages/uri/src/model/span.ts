/* =======================================================================================
 * Span primitives
 * ---------------------------------------------------------------------------------------
 * Every parsed entity records where it came from in the caller's input so the raw text
 * can be recovered without copying the input again.
 * ======================================================================================= */

export interface TextSpan {
  /**
   * Offsets into the parsed input.
   * 0-based UTF-16 code units, [start, end) (end is exclusive).
   */
  readonly start: number;
  readonly end: number;
}

/** The text a span covers. */
export function sliceSpan(text: string, span: TextSpan): string {
  return text.slice(span.start, span.end);
}

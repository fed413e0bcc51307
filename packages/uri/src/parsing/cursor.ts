import { CharCode, isHexDigit, isPcharUnit } from "../grammar/chars.js";

/**
 * Position over the input for the grammar productions.
 *
 * Productions save `pos`, try to match, and write the saved value back when they fail;
 * nothing else holds state, so backtracking is just that assignment.
 *
 * Offsets are 0-based UTF-16 code units into the original string.
 */
export class Cursor {
  readonly source: string;
  readonly length: number;
  pos = 0;

  constructor(source: string) {
    this.source = source;
    this.length = source.length;
  }

  get atEnd(): boolean {
    return this.pos >= this.length;
  }

  /** Code unit at `pos + ahead`, or -1 past either end. */
  peek(ahead = 0): number {
    const index = this.pos + ahead;
    if (index < 0 || index >= this.length) return -1;
    return this.source.charCodeAt(index);
  }

  eat(ch: number): boolean {
    if (this.peek() !== ch) return false;
    this.pos++;
    return true;
  }

  eatLiteral(text: string): boolean {
    if (!this.source.startsWith(text, this.pos)) return false;
    this.pos += text.length;
    return true;
  }

  /** Case-insensitive literal match; `lower` must be given in lower case. */
  eatLiteralIgnoreCase(lower: string): boolean {
    const candidate = this.source.slice(this.pos, this.pos + lower.length);
    if (candidate.length !== lower.length || candidate.toLowerCase() !== lower) return false;
    this.pos += lower.length;
    return true;
  }

  /** pct-encoded = "%" HEXDIG HEXDIG, checked at `pos + ahead` */
  isPctEncoded(ahead = 0): boolean {
    return this.peek(ahead) === CharCode.Percent && isHexDigit(this.peek(ahead + 1)) && isHexDigit(this.peek(ahead + 2));
  }

  /**
   * Consume one unit of a character class that may also contain `pct-encoded`:
   * a whole `%HH` triple, or one code unit accepted by `accepts`.
   */
  eatUnit(accepts: (ch: number) => boolean, allowPct = true): boolean {
    if (allowPct && this.isPctEncoded()) {
      this.pos += 3;
      return true;
    }
    const ch = this.peek();
    if (ch < 0 || ch === CharCode.Percent || !accepts(ch)) return false;
    this.pos++;
    return true;
  }

  /** `*unit`; returns how many units were consumed. */
  eatRun(accepts: (ch: number) => boolean, allowPct = true): number {
    let count = 0;
    while (this.eatUnit(accepts, allowPct)) count++;
    return count;
  }

  /** True when a `pchar` starts at `pos`. */
  atPchar(): boolean {
    return this.isPctEncoded() || (this.peek() !== CharCode.Percent && isPcharUnit(this.peek()));
  }

  slice(start: number, end = this.pos): string {
    return this.source.slice(start, end);
  }
}

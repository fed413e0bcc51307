/* =======================================================================================
 * RFC 3986 character classes
 * ---------------------------------------------------------------------------------------
 * Predicates take UTF-16 code units. Out-of-range reads from the scanner come back as -1
 * and never match any class.
 * ======================================================================================= */

export const enum CharCode {
  Exclamation = 0x0021,      // !
  Hash = 0x0023,             // #
  Dollar = 0x0024,           // $
  Percent = 0x0025,          // %
  Ampersand = 0x0026,        // &
  SingleQuote = 0x0027,      // '
  OpenParen = 0x0028,        // (
  CloseParen = 0x0029,       // )
  Asterisk = 0x002a,         // *
  Plus = 0x002b,             // +
  Comma = 0x002c,            // ,
  Minus = 0x002d,            // -
  Dot = 0x002e,              // .
  Slash = 0x002f,            // /
  Colon = 0x003a,            // :
  Semicolon = 0x003b,        // ;
  Equals = 0x003d,           // =
  Question = 0x003f,         // ?
  At = 0x0040,               // @
  OpenBracket = 0x005b,      // [
  CloseBracket = 0x005d,     // ]
  Underscore = 0x005f,       // _
  Tilde = 0x007e,            // ~

  Zero = 0x0030,
  One = 0x0031,
  Two = 0x0032,
  Four = 0x0034,
  Five = 0x0035,
  Nine = 0x0039,

  UppercaseA = 0x0041,
  UppercaseF = 0x0046,
  UppercaseZ = 0x005a,
  LowercaseA = 0x0061,
  LowercaseF = 0x0066,
  LowercaseV = 0x0076,
  LowercaseZ = 0x007a,
}

/** ALPHA = %x41-5A / %x61-7A */
export function isAlpha(ch: number): boolean {
  return (ch >= CharCode.UppercaseA && ch <= CharCode.UppercaseZ) || (ch >= CharCode.LowercaseA && ch <= CharCode.LowercaseZ);
}

/** DIGIT = %x30-39 */
export function isDigit(ch: number): boolean {
  return ch >= CharCode.Zero && ch <= CharCode.Nine;
}

/** HEXDIG = DIGIT / "A"-"F" (either case) */
export function isHexDigit(ch: number): boolean {
  return (
    isDigit(ch) ||
    (ch >= CharCode.UppercaseA && ch <= CharCode.UppercaseF) ||
    (ch >= CharCode.LowercaseA && ch <= CharCode.LowercaseF)
  );
}

/** Numeric value of a hex digit, or -1. */
export function hexValue(ch: number): number {
  if (isDigit(ch)) return ch - CharCode.Zero;
  if (ch >= CharCode.UppercaseA && ch <= CharCode.UppercaseF) return ch - CharCode.UppercaseA + 10;
  if (ch >= CharCode.LowercaseA && ch <= CharCode.LowercaseF) return ch - CharCode.LowercaseA + 10;
  return -1;
}

/** unreserved = ALPHA / DIGIT / "-" / "." / "_" / "~" */
export function isUnreserved(ch: number): boolean {
  return (
    isAlpha(ch) ||
    isDigit(ch) ||
    ch === CharCode.Minus ||
    ch === CharCode.Dot ||
    ch === CharCode.Underscore ||
    ch === CharCode.Tilde
  );
}

/** sub-delims = "!" / "$" / "&" / "'" / "(" / ")" / "*" / "+" / "," / ";" / "=" */
export function isSubDelim(ch: number): boolean {
  switch (ch) {
    case CharCode.Exclamation:
    case CharCode.Dollar:
    case CharCode.Ampersand:
    case CharCode.SingleQuote:
    case CharCode.OpenParen:
    case CharCode.CloseParen:
    case CharCode.Asterisk:
    case CharCode.Plus:
    case CharCode.Comma:
    case CharCode.Semicolon:
    case CharCode.Equals:
      return true;
    default:
      return false;
  }
}

/** gen-delims = ":" / "/" / "?" / "#" / "[" / "]" / "@" */
export function isGenDelim(ch: number): boolean {
  switch (ch) {
    case CharCode.Colon:
    case CharCode.Slash:
    case CharCode.Question:
    case CharCode.Hash:
    case CharCode.OpenBracket:
    case CharCode.CloseBracket:
    case CharCode.At:
      return true;
    default:
      return false;
  }
}

/** reserved = gen-delims / sub-delims */
export function isReserved(ch: number): boolean {
  return isGenDelim(ch) || isSubDelim(ch);
}

/** Continuation characters of `scheme`: ALPHA / DIGIT / "+" / "-" / "." */
export function isSchemeChar(ch: number): boolean {
  return isAlpha(ch) || isDigit(ch) || ch === CharCode.Plus || ch === CharCode.Minus || ch === CharCode.Dot;
}

/**
 * Single-code-unit members of `pchar` (everything except the `pct-encoded` triple):
 * unreserved / sub-delims / ":" / "@"
 */
export function isPcharUnit(ch: number): boolean {
  return isUnreserved(ch) || isSubDelim(ch) || ch === CharCode.Colon || ch === CharCode.At;
}

import { CharCode, hexValue, isUnreserved } from "../grammar/chars.js";
import { PercentDecodeError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";

const encoder = new TextEncoder();
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

const HEX = "0123456789ABCDEF";

/**
 * Append the percent-encoded form of `text` to `out`.
 *
 * Unreserved characters pass through; every other character is written as one `%HH`
 * triple per byte of its UTF-8 encoding.
 */
export function percentEncodeInto(text: string, out: string[]): void {
  let runStart = 0;
  for (let i = 0; i < text.length; i++) {
    if (isUnreserved(text.charCodeAt(i))) continue;
    if (i > runStart) out.push(text.slice(runStart, i));

    // Extend over the whole reserved run so surrogate pairs reach the encoder together
    let j = i + 1;
    while (j < text.length && !isUnreserved(text.charCodeAt(j))) j++;
    for (const byte of encoder.encode(text.slice(i, j))) {
      out.push("%", HEX.charAt(byte >> 4), HEX.charAt(byte & 0x0f));
    }
    runStart = j;
    i = j - 1;
  }
  if (runStart < text.length) out.push(text.slice(runStart));
}

export function percentEncode(text: string): string {
  const out: string[] = [];
  percentEncodeInto(text, out);
  return out.join("");
}

/**
 * Decode `%HH` triples.
 *
 * - A `%` with fewer than two characters after it is kept literally, with whatever follows.
 * - A complete triple whose digits are not hex is a PercentDecodeError.
 * - Adjacent triples are decoded together as UTF-8; invalid UTF-8 is a PercentDecodeError.
 *
 * Hex digit case is not normalized and non-`%` characters pass through untouched.
 */
export function percentDecode(text: string): string {
  if (text.indexOf("%") < 0) return text;

  let result = "";
  let i = 0;
  while (i < text.length) {
    const ch = text.charCodeAt(i);
    if (ch !== CharCode.Percent) {
      const next = text.indexOf("%", i);
      const end = next < 0 ? text.length : next;
      result += text.slice(i, end);
      i = end;
      continue;
    }

    if (i + 2 >= text.length) {
      result += text.slice(i);
      break;
    }

    // Collect the run of adjacent triples as one byte sequence
    const start = i;
    const bytes: number[] = [];
    while (i + 2 < text.length && text.charCodeAt(i) === CharCode.Percent) {
      const hi = hexValue(text.charCodeAt(i + 1));
      const lo = hexValue(text.charCodeAt(i + 2));
      if (hi < 0 || lo < 0) {
        const sequence = text.slice(i, i + 3);
        debug.codec("decode.invalid-hex", { input: text, sequence });
        throw new PercentDecodeError(text, sequence, "not a hexadecimal byte");
      }
      bytes.push((hi << 4) | lo);
      i += 3;
    }
    result += decodeUtf8(text, text.slice(start, i), bytes);
  }
  return result;
}

function decodeUtf8(input: string, sequence: string, bytes: readonly number[]): string {
  try {
    return utf8.decode(Uint8Array.from(bytes));
  } catch (err) {
    debug.codec("decode.invalid-utf8", { input, sequence });
    const reason = err instanceof Error ? err.message : "not valid UTF-8";
    throw new PercentDecodeError(input, sequence, reason);
  }
}

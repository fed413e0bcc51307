import { describe, test, expect } from "vitest";

import {
  hexValue,
  isAlpha,
  isGenDelim,
  isHexDigit,
  isPcharUnit,
  isReserved,
  isSchemeChar,
  isSubDelim,
  isUnreserved,
} from "../../src/grammar/chars.js";

const code = (ch: string): number => ch.charCodeAt(0);

function members(predicate: (ch: number) => boolean): string {
  let out = "";
  for (let ch = 0; ch < 128; ch++) {
    if (predicate(ch)) out += String.fromCharCode(ch);
  }
  return out;
}

describe("character classes", () => {
  test("gen-delims and sub-delims", () => {
    expect(members(isGenDelim)).toBe("#/:?@[]");
    expect(members(isSubDelim)).toBe("!$&'()*+,;=");
  });

  test("unreserved is letters, digits and -._~", () => {
    const unreserved = members(isUnreserved);
    expect(unreserved).toHaveLength(26 * 2 + 10 + 4);
    expect(unreserved.replace(/[A-Za-z0-9]/g, "")).toBe("-._~");
  });

  test("reserved is the union of the delimiters", () => {
    expect(members(isReserved)).toBe("!#$&'()*+,/:;=?@[]");
  });

  test("pchar units exclude '/', '?', '#' and '%'", () => {
    for (const ch of ["/", "?", "#", "%", "[", "]", " "]) {
      expect(isPcharUnit(code(ch))).toBe(false);
    }
    for (const ch of [":", "@", "=", "~", "a"]) {
      expect(isPcharUnit(code(ch))).toBe(true);
    }
  });

  test("scheme continuation characters", () => {
    expect(isSchemeChar(code("+"))).toBe(true);
    expect(isSchemeChar(code("."))).toBe(true);
    expect(isSchemeChar(code("-"))).toBe(true);
    expect(isSchemeChar(code("_"))).toBe(false);
    expect(isSchemeChar(code(":"))).toBe(false);
  });

  test("hex digits in either case", () => {
    expect(hexValue(code("0"))).toBe(0);
    expect(hexValue(code("a"))).toBe(10);
    expect(hexValue(code("F"))).toBe(15);
    expect(hexValue(code("g"))).toBe(-1);
    expect(isHexDigit(code("G"))).toBe(false);
  });

  test("out-of-range reads match nothing", () => {
    expect(isAlpha(-1)).toBe(false);
    expect(isUnreserved(-1)).toBe(false);
    expect(isPcharUnit(-1)).toBe(false);
    expect(hexValue(-1)).toBe(-1);
  });
});

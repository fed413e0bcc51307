import { describe, test, expect } from "vitest";

import { percentDecode, percentEncode, percentEncodeInto } from "../../src/codec/percent.js";
import { PercentDecodeError, UriError } from "../../src/shared/errors.js";

describe("percentEncode", () => {
  test("unreserved characters pass through", () => {
    expect(percentEncode("AZaz09-._~")).toBe("AZaz09-._~");
  });

  test("reserved and space become upper-case triples", () => {
    expect(percentEncode("hello world")).toBe("hello%20world");
    expect(percentEncode("a/b?c")).toBe("a%2Fb%3Fc");
    expect(percentEncode("%")).toBe("%25");
  });

  test("non-ASCII is encoded as UTF-8 bytes", () => {
    expect(percentEncode("é")).toBe("%C3%A9");
    expect(percentEncode("€5")).toBe("%E2%82%AC5");
    expect(percentEncode("😀")).toBe("%F0%9F%98%80");
  });

  test("encodeInto appends to an existing buffer", () => {
    const out = ["x="];
    percentEncodeInto("a b", out);
    expect(out.join("")).toBe("x=a%20b");
  });
});

describe("percentDecode", () => {
  test("decodes triples in either case", () => {
    expect(percentDecode("hello%20world")).toBe("hello world");
    expect(percentDecode("%c3%a9")).toBe("é");
    expect(percentDecode("%F0%9F%98%80!")).toBe("😀!");
  });

  test("text without '%' is returned as is", () => {
    expect(percentDecode("plain+text")).toBe("plain+text");
  });

  test("a truncated triple at the end is kept literally", () => {
    expect(percentDecode("100%")).toBe("100%");
    expect(percentDecode("a%4")).toBe("a%4");
    expect(percentDecode("%41%")).toBe("A%");
  });

  test("non-hex digits throw", () => {
    expect(() => percentDecode("a%zzb")).toThrow(PercentDecodeError);
    try {
      percentDecode("a%zzb");
    } catch (err) {
      expect(err).toBeInstanceOf(UriError);
      if (err instanceof PercentDecodeError) {
        expect(err.code).toBe("uri/decode");
        expect(err.sequence).toBe("%zz");
        expect(err.input).toBe("a%zzb");
        expect(err.message).toBe('Invalid percent-encoding "%zz": not a hexadecimal byte');
      }
    }
  });

  test("invalid UTF-8 throws", () => {
    expect(() => percentDecode("%C3")).toThrow(PercentDecodeError);
    expect(() => percentDecode("%FF%FE")).toThrow(PercentDecodeError);
  });

  test("decode inverts encode for every ASCII character", () => {
    let ascii = "";
    for (let ch = 0; ch < 128; ch++) ascii += String.fromCharCode(ch);
    expect(percentDecode(percentEncode(ascii))).toBe(ascii);
  });
});

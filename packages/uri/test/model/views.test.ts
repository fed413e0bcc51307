import { describe, test, expect } from "vitest";

import { parsePath, parseRelativeReference, parseUri } from "../../src/parsing/parse.js";
import { PercentDecodeError } from "../../src/shared/errors.js";
import { sliceSpan } from "../../src/model/span.js";

describe("parsed views", () => {
  test("each span covers its raw text", () => {
    const input = "foo://user@example.com:8042/over/there?name=ferret#nose";
    const uri = parseUri(input);
    const parts = [uri.scheme, uri.authority, uri.authority?.userinfo, uri.authority?.host, uri.path, uri.query, uri.fragment];
    for (const part of parts) {
      if (!part) throw new Error("missing component");
      expect(sliceSpan(input, part.span)).toBe(part.raw);
    }
  });

  test("toString returns the raw text", () => {
    const uri = parseUri("HTTP://[::1]/a?b#c");
    expect(uri.scheme.toString()).toBe("HTTP");
    expect(uri.authority?.toString()).toBe("[::1]");
    expect(uri.authority?.host.toString()).toBe("[::1]");
    expect(uri.path.toString()).toBe("/a");
    expect(uri.query?.toString()).toBe("b");
    expect(uri.fragment?.toString()).toBe("c");
    expect(uri.toString()).toBe("HTTP://[::1]/a?b#c");
  });

  test("isRooted follows the path kind", () => {
    expect(parsePath("/a").isRooted).toBe(true);
    expect(parsePath("//a").isRooted).toBe(true);
    expect(parsePath("a").isRooted).toBe(false);
  });
});

describe("builder()", () => {
  test("re-encodes to the same text when nothing needs escaping", () => {
    const input = "https://john.doe@www.example.com:1234/forum/questions/?tag=networking&order=newest#top";
    expect(parseUri(input).builder().toString()).toBe(input);
  });

  test("decodes user content", () => {
    const builder = parseUri("http://h/a%20b?k%3D=v%2C1#f%23").builder();
    expect(builder.path.segments).toEqual(["a b"]);
    expect(builder.query?.parameters).toEqual([["k=", ["v,1"]]]);
    expect(builder.fragment?.value).toBe("f#");
    expect(builder.toString()).toBe("http://h/a%20b?k%3D=v%2C1#f%23");
  });

  test("decodes userinfo and reg-name", () => {
    const authority = parseUri("ftp://us%65r:p%40ss@ex%61mple.com/").builder().authority;
    expect(authority?.userinfo?.username).toBe("user");
    expect(authority?.userinfo?.password).toBe("p@ss");
    expect(authority?.host.kind).toBe("reg-name");
    expect(authority?.host.toString()).toBe("example.com");
  });

  test("scheme fast path keeps its kind", () => {
    const scheme = parseUri("HTTPS://h").builder().scheme;
    expect(scheme.kind).toBe("https");
    expect(scheme.toString()).toBe("https");
  });

  test("unparsed userinfo becomes the username", () => {
    const userinfo = parseUri("ftp://:x@h/").authority?.userinfo?.builder();
    expect(userinfo?.username).toBe(":x");
    expect(userinfo?.password).toBeNull();
    expect(userinfo?.toString()).toBe("%3Ax");
  });

  test("IPv6 hosts render canonically", () => {
    expect(parseUri("http://[2001:DB8:0:0:0:0:0:1]/").builder().toString()).toBe("http://[2001:db8::1]/");
  });

  test("IPv4 and IPvFuture hosts keep their text", () => {
    expect(parseUri("http://192.0.2.1:80/").builder().toString()).toBe("http://192.0.2.1:80/");
    expect(parseUri("http://[v7.a:b]/").builder().toString()).toBe("http://[v7.a:b]/");
  });

  test("path kinds map to rooted and relative builders", () => {
    expect(parsePath("/a/b").builder().kind).toBe("absolute");
    expect(parsePath("//a").builder().kind).toBe("absolute");
    expect(parsePath("a/b").builder().kind).toBe("relative");
    expect(parseRelativeReference("a/b").path.builder().kind).toBe("relative");
    expect(parsePath("").builder().kind).toBe("empty");
  });

  test("relative references keep their shape", () => {
    const builder = parseRelativeReference("//h/x?y#z").builder();
    expect(builder.kind).toBe("relative-ref");
    expect(builder.toString()).toBe("//h/x?y#z");
  });

  test("malformed encoding fails the whole conversion", () => {
    const uri = parseUri("http://h/%C3");
    expect(() => uri.builder()).toThrow(PercentDecodeError);
  });
});

import { describe, test, expect } from "vitest";

import {
  AuthorityBuilder,
  Ipv6HostBuilder,
  RegistryNameBuilder,
  UserInfoBuilder,
} from "../../src/builder/authority-builder.js";
import { FragmentBuilder } from "../../src/builder/fragment-builder.js";
import { PathBuilder } from "../../src/builder/path-builder.js";
import { QueryBuilder } from "../../src/builder/query-builder.js";
import { SchemeBuilder } from "../../src/builder/scheme-builder.js";
import { UriBuilder, UriRelativeReferenceBuilder } from "../../src/builder/uri-builder.js";
import { Ipv6Address } from "../../src/model/ip-address.js";
import { parsePath, parseUri } from "../../src/parsing/parse.js";
import { UriBuildError } from "../../src/shared/errors.js";

describe("SchemeBuilder", () => {
  test("defaults", () => {
    expect(new SchemeBuilder().toString()).toBe("scheme");
  });

  test("of() recognizes http and https in any case", () => {
    expect(SchemeBuilder.of("HTTPS").kind).toBe("https");
    expect(SchemeBuilder.of("Http").toString()).toBe("http");
    const other = SchemeBuilder.of("Git+SSH");
    expect(other.kind).toBe("other");
    expect(other.toString()).toBe("Git+SSH");
  });
});

describe("PathBuilder", () => {
  test("parent of an absolute path drops the last segment", () => {
    expect(PathBuilder.absolute("a", "b").parent().toString()).toBe("/a");
    expect(PathBuilder.absolute("a").parent().toString()).toBe("/");
  });

  test("parent of a relative path climbs past its start", () => {
    expect(PathBuilder.relative("a").parent().toString()).toBe("");
    expect(PathBuilder.relative().parent().toString()).toBe("..");
  });

  test("parent of an empty path is empty", () => {
    expect(new PathBuilder().parent().kind).toBe("empty");
  });

  test("child appends and turns an empty path relative", () => {
    const child = new PathBuilder().child("x");
    expect(child.kind).toBe("relative");
    expect(child.toString()).toBe("x");
    expect(PathBuilder.absolute().child("a b").toString()).toBe("/a%20b");
  });

  test("segments pushed into an empty path render as a relative path", () => {
    const path = new PathBuilder();
    path.segments.push("a", "b c");
    expect(path.toString()).toBe("a/b%20c");
  });

  test("parent and child leave the receiver alone", () => {
    const path = PathBuilder.absolute("a");
    path.child("b");
    path.parent();
    expect(path.segments).toEqual(["a"]);
  });

  test("works from a parsed path", () => {
    expect(parsePath("/a/b/c").builder().parent().toString()).toBe("/a/b");
    expect(parsePath("a/b%2Fc").builder().segments).toEqual(["a", "b/c"]);
    expect(parsePath("a/b%2Fc").builder().toString()).toBe("a/b%2Fc");
  });
});

describe("QueryBuilder", () => {
  test("renders keys, value lists and bare keys", () => {
    const query = new QueryBuilder().append("a", "1", "2").append("b").append("c", "");
    expect(query.toString()).toBe("a=1,2&b&c=");
  });

  test("set replaces every parameter with the key", () => {
    const query = new QueryBuilder().append("a", "1").append("b", "2").append("a", "3");
    query.set("a", "9");
    expect(query.parameters).toEqual([
      ["a", ["9"]],
      ["b", ["2"]],
    ]);
    expect(query.get("a")).toEqual(["9"]);
    query.set("c", "x");
    expect(query.toString()).toBe("a=9&b=2&c=x");
  });

  test("delete reports whether anything was removed", () => {
    const query = new QueryBuilder([["a", ["1"]]]);
    expect(query.delete("zz")).toBe(false);
    expect(query.delete("a")).toBe(true);
    expect(query.toString()).toBe("");
  });

  test("encodes separators inside keys and values", () => {
    expect(new QueryBuilder().append("a&b", "x=y", "1,2").toString()).toBe("a%26b=x%3Dy,1%2C2");
  });
});

describe("AuthorityBuilder", () => {
  test("renders userinfo, host and port", () => {
    const authority = new AuthorityBuilder(new RegistryNameBuilder("ex ample"), 80, new UserInfoBuilder("me", "test-secret"));
    expect(authority.toString()).toBe("me:test-secret@ex%20ample:80");
  });

  test("default reg-name host is localhost", () => {
    expect(new RegistryNameBuilder().toString()).toBe("localhost");
    expect(new AuthorityBuilder().toString()).toBe("localhost");
  });

  test("IPv6 hosts are bracketed", () => {
    expect(new AuthorityBuilder(new Ipv6HostBuilder(Ipv6Address.fromText("::1")), 443).toString()).toBe("[::1]:443");
  });

  test("out-of-range port fails to render", () => {
    const authority = new AuthorityBuilder(new RegistryNameBuilder("h"), 70000);
    expect(() => authority.toString()).toThrow(UriBuildError);
    expect(() => authority.toString()).toThrow("Cannot serialize port: expected an integer in 0..65535");
  });
});

describe("UriBuilder", () => {
  test("defaults to the placeholder scheme and an empty path", () => {
    expect(new UriBuilder().toString()).toBe("scheme:");
  });

  test("assembles every component", () => {
    const uri = new UriBuilder({
      scheme: SchemeBuilder.of("HTTPS"),
      authority: new AuthorityBuilder(new RegistryNameBuilder("example.com")),
      path: PathBuilder.absolute("a b"),
      query: new QueryBuilder().append("q", "x y"),
      fragment: new FragmentBuilder("top"),
    });
    expect(uri.toString()).toBe("https://example.com/a%20b?q=x%20y#top");
  });

  test("mutations show up in the rendered text", () => {
    const uri = new UriBuilder({ scheme: SchemeBuilder.of("http"), authority: new AuthorityBuilder(new RegistryNameBuilder("h")) });
    uri.path = PathBuilder.absolute().child("x");
    uri.fragment = new FragmentBuilder("");
    expect(uri.toString()).toBe("http://h/x#");
  });

  test("a path added after an authority is rooted", () => {
    const uri = parseUri("http://host").builder();
    expect(uri.path.kind).toBe("empty");
    uri.path = uri.path.child("x");
    expect(uri.toString()).toBe("http://host/x");

    const reparsed = parseUri(uri.toString());
    expect(reparsed.authority?.host.raw).toBe("host");
    expect(reparsed.path.segments).toEqual(["x"]);

    uri.path = PathBuilder.relative("a", "b");
    expect(uri.toString()).toBe("http://host/a/b");
  });

  test("a leading empty segment without an authority is kept out of the authority slot", () => {
    const uri = new UriBuilder({ scheme: SchemeBuilder.of("s"), path: PathBuilder.absolute("", "a") });
    expect(uri.toString()).toBe("s:/.//a");
    const reparsed = parseUri(uri.toString());
    expect(reparsed.authority).toBeNull();
    expect(reparsed.path.segments).toEqual([".", "", "a"]);

    const ref = new UriRelativeReferenceBuilder({ path: PathBuilder.absolute("", "a") });
    expect(ref.toString()).toBe("/.//a");
  });

  test("relative references have no scheme", () => {
    const ref = new UriRelativeReferenceBuilder({ path: PathBuilder.relative("..", "x") });
    expect(ref.kind).toBe("relative-ref");
    expect(ref.toString()).toBe("../x");
  });
});

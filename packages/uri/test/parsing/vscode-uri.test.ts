/**
 * Cross-check component boundaries against vscode-uri on inputs without percent-encoding,
 * where its decoding step is the identity.
 */

import { describe, test, expect } from "vitest";
import { URI } from "vscode-uri";

import { parseUri } from "../../src/parsing/parse.js";

const inputs = [
  "https://www.example.com:8080/a/b?x=1#frag",
  "ldap://[2001:db8::7]/c=GB?objectClass?one",
  "mailto:John.Doe@example.com",
  "tel:+1-816-555-1212",
  "ftp://user@ftp.example.org/pub/file.txt",
  "urn:oasis:names:specification:docbook:dtd:xml:4.1.2",
  "foo://example.com:8042/over/there?name=ferret#nose",
];

describe("agreement with vscode-uri", () => {
  test.each(inputs)("%s", (input) => {
    const ours = parseUri(input);
    const theirs = URI.parse(input);

    expect(ours.scheme.raw).toBe(theirs.scheme);
    expect(ours.authority?.raw ?? "").toBe(theirs.authority);
    expect(ours.path.raw).toBe(theirs.path);
    expect(ours.query?.raw ?? "").toBe(theirs.query);
    expect(ours.fragment?.raw ?? "").toBe(theirs.fragment);
  });
});

import type { Path } from "../model/path.js";
import type { Uri, UriReference, UriRelativeReference } from "../model/uri.js";
import { debug } from "../shared/debug.js";
import { UriParseError, type UriProduction, type UriResult } from "../shared/errors.js";
import { UriParser } from "./uri-parser.js";

function run<T>(production: UriProduction, input: string, match: (parser: UriParser) => T | null): UriResult<T> {
  const value = match(new UriParser(input));
  if (value === null) {
    debug.parse("fail", { production, input });
    return { ok: false, error: new UriParseError(production, input) };
  }
  debug.parse("ok", { production, length: input.length });
  return { ok: true, value };
}

function unwrap<T>(result: UriResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function tryParseUri(input: string): UriResult<Uri> {
  return run("URI", input, (p) => p.parseUri());
}

export function tryParseUriReference(input: string): UriResult<UriReference> {
  return run("URI-reference", input, (p) => p.parseUriReference());
}

export function tryParseRelativeReference(input: string): UriResult<UriRelativeReference> {
  return run("relative-ref", input, (p) => p.parseRelativeReference());
}

export function tryParsePath(input: string): UriResult<Path> {
  return run("path", input, (p) => p.parsePath());
}

/**
 * Parse an absolute URI. The whole input must match.
 * @throws UriParseError
 */
export function parseUri(input: string): Uri {
  return unwrap(tryParseUri(input));
}

/**
 * Parse a URI reference: an absolute URI when one matches the whole input, otherwise a
 * relative reference.
 * @throws UriParseError
 */
export function parseUriReference(input: string): UriReference {
  return unwrap(tryParseUriReference(input));
}

/** @throws UriParseError */
export function parseRelativeReference(input: string): UriRelativeReference {
  return unwrap(tryParseRelativeReference(input));
}

/**
 * Parse a bare path: absolute, rootless, path-abempty or empty, in that order.
 * @throws UriParseError
 */
export function parsePath(input: string): Path {
  return unwrap(tryParsePath(input));
}

import { PathBuilder, tryParsePath } from "@urikit/uri";

import { FileSystemError } from "./errors.js";

/**
 * Decoded segments of a filesystem path, parsed with the URI path grammar.
 * "" and "." segments are dropped; ".." and segments that decode to a separator
 * (`%2F`, `%5C`) or NUL are rejected so no path leaves the root.
 */
export function resolveSegments(path: string): string[] {
  const parsed = tryParsePath(path);
  if (!parsed.ok) {
    throw new FileSystemError("invalid-path", `Invalid path ${JSON.stringify(path)}`, { path, cause: parsed.error });
  }
  let decoded: string[];
  try {
    decoded = parsed.value.builder().segments;
  } catch (err) {
    throw new FileSystemError("invalid-path", `Invalid path ${JSON.stringify(path)}`, { path, cause: err });
  }
  return normalizeSegments(decoded, path);
}

export function normalizeSegments(segments: readonly string[], path: string): string[] {
  const out: string[] = [];
  for (const segment of segments) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      throw new FileSystemError("invalid-path", `Path ${JSON.stringify(path)} leaves the filesystem root`, { path });
    }
    if (/[\/\\\0]/.test(segment)) {
      throw new FileSystemError("invalid-path", `Path ${JSON.stringify(path)} has a separator inside a segment`, { path });
    }
    out.push(segment);
  }
  return out;
}

/** Canonical rooted text for a segment list: `/` for the root, `/a/b%20c` otherwise. */
export function pathKey(segments: readonly string[]): string {
  return PathBuilder.absolute(...segments).toString();
}

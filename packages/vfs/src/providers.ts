import * as nodePath from "node:path";

import { parseUri, UriError } from "@urikit/uri";

import { FileSystemError } from "./errors.js";
import type { FileSystem, FileSystemProvider } from "./filesystem.js";
import { LocalFileSystem } from "./local-fs.js";
import { MemoryFileSystem } from "./memory-fs.js";
import { normalizeSegments } from "./paths.js";

/**
 * `mem:` and `memory:` URLs. Each provision gets a fresh filesystem unless the provider is
 * configured with `shared: "true"`, in which case every URL sees the same one.
 */
export class MemoryFileSystemProvider implements FileSystemProvider {
  readonly schemes = ["mem", "memory"];
  #shared: MemoryFileSystem | null = null;

  configure(options: Readonly<Record<string, string>>): void {
    this.#shared = options["shared"] === "true" ? new MemoryFileSystem() : null;
  }

  provision(_url: string): FileSystem {
    return this.#shared ?? new MemoryFileSystem();
  }
}

/**
 * `file:` URLs. The URL path names the directory the provisioned filesystem is rooted at,
 * taken relative to the configured `root` (default `/`). Only local hosts are served.
 */
export class LocalFileSystemProvider implements FileSystemProvider {
  readonly schemes = ["file"];
  #root = "/";

  configure(options: Readonly<Record<string, string>>): void {
    this.#root = options["root"] ?? "/";
  }

  provision(url: string): FileSystem {
    let segments: string[];
    try {
      const uri = parseUri(url);
      const host = uri.authority?.host.raw ?? "";
      if (host !== "" && host.toLowerCase() !== "localhost") {
        throw new FileSystemError("unsupported-operation", `Remote file host "${host}" is not supported`);
      }
      segments = normalizeSegments(uri.path.builder().segments, url);
    } catch (err) {
      if (err instanceof UriError) {
        throw new FileSystemError("parsing", `Not a file URL: ${JSON.stringify(url)}`, { cause: err });
      }
      throw err;
    }
    return new LocalFileSystem(nodePath.join(this.#root, ...segments));
  }
}

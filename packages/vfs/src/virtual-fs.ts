import { getDebugChannel, tryParseUri } from "@urikit/uri";

import { FileSystemError } from "./errors.js";
import type { FileHandle, FileSystem, FileSystemProvider } from "./filesystem.js";

const trace = getDebugChannel("vfs");

/** One class in front of any FileSystem implementation. */
export class VirtualFileSystem implements FileSystem {
  readonly #inner: FileSystem;

  constructor(filesystem: FileSystem) {
    this.#inner = filesystem;
  }

  exists(path: string): boolean {
    return this.#inner.exists(path);
  }

  isFile(path: string): boolean {
    return this.#inner.isFile(path);
  }

  isDirectory(path: string): boolean {
    return this.#inner.isDirectory(path);
  }

  fileSize(path: string): number {
    return this.#inner.fileSize(path);
  }

  createDirectory(path: string): void {
    this.#inner.createDirectory(path);
  }

  createDirectoryAll(path: string): void {
    this.#inner.createDirectoryAll(path);
  }

  listDirectory(path: string): string[] {
    return this.#inner.listDirectory(path);
  }

  removeDirectory(path: string): void {
    this.#inner.removeDirectory(path);
  }

  removeDirectoryAll(path: string): void {
    this.#inner.removeDirectoryAll(path);
  }

  createFile(path: string): FileHandle {
    return this.#inner.createFile(path);
  }

  openFile(path: string): FileHandle {
    return this.#inner.openFile(path);
  }

  removeFile(path: string): void {
    this.#inner.removeFile(path);
  }
}

/**
 * Routes URLs to filesystem providers by scheme. Scheme names are matched in lower case;
 * registering a scheme twice replaces the earlier provider.
 */
export class VirtualFileSystemManager {
  readonly #providers = new Map<string, FileSystemProvider>();

  register(provider: FileSystemProvider): void {
    for (const scheme of provider.schemes) {
      this.#providers.set(scheme.toLowerCase(), provider);
    }
    trace("register", { schemes: provider.schemes.join(",") });
  }

  /** Schemes with a registered provider, sorted. */
  schemes(): string[] {
    return Array.from(this.#providers.keys()).sort();
  }

  /**
   * Provision the filesystem for `url`.
   * @throws FileSystemError `parsing` when `url` is not an absolute URI, `unknown-filesystem`
   *   when no provider claims its scheme.
   */
  get(url: string): VirtualFileSystem {
    const parsed = tryParseUri(url);
    if (!parsed.ok) {
      trace("get.parse-failed", { url });
      throw new FileSystemError("parsing", `Not a filesystem URL: ${JSON.stringify(url)}`, { cause: parsed.error });
    }

    const scheme = parsed.value.scheme.name.toLowerCase();
    const provider = this.#providers.get(scheme);
    if (!provider) {
      trace("get.unknown-scheme", { scheme });
      throw new FileSystemError("unknown-filesystem", `No filesystem registered for scheme "${scheme}"`);
    }

    trace("get.provision", { scheme, url });
    return new VirtualFileSystem(provider.provision(url));
  }
}

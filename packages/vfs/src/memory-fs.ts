import { PathBuilder } from "@urikit/uri";

import { FileSystemError } from "./errors.js";
import { BaseFileHandle, resolveSeek, type FileLockMode, type FileSystem, type SeekOrigin } from "./filesystem.js";
import { pathKey, resolveSegments } from "./paths.js";

/** Contents and lock state of one in-memory file, shared by its handles. */
export interface MemoryFile {
  readonly kind: "file";
  readonly segments: readonly string[];
  bytes: Uint8Array;
  lock: FileLockMode;
}

interface MemoryDirectory {
  readonly kind: "directory";
  readonly segments: readonly string[];
}

type MemoryEntry = MemoryFile | MemoryDirectory;

interface Lookup {
  readonly key: string;
  readonly segments: string[];
  readonly entry: MemoryEntry | undefined;
}

/**
 * In-process filesystem keyed by canonical path. The root always exists. File contents are
 * shared by every handle open on the same file and outlive removeFile() for those handles.
 */
export class MemoryFileSystem implements FileSystem {
  #entries = new Map<string, MemoryEntry>();

  exists(path: string): boolean {
    const { segments, entry } = this.#lookup(path);
    return segments.length === 0 || entry !== undefined;
  }

  isFile(path: string): boolean {
    return this.#lookup(path).entry?.kind === "file";
  }

  isDirectory(path: string): boolean {
    const { segments, entry } = this.#lookup(path);
    return segments.length === 0 || entry?.kind === "directory";
  }

  fileSize(path: string): number {
    return this.#file(path).bytes.length;
  }

  createDirectory(path: string): void {
    const { key, segments, entry } = this.#lookup(path);
    if (segments.length === 0 || entry) throw FileSystemError.pathExists(path);
    this.#requireParent(segments, path);
    this.#entries.set(key, { kind: "directory", segments });
  }

  /** Walks up with PathBuilder.parent(), creating each missing ancestor. */
  createDirectoryAll(path: string): void {
    const { segments, entry } = this.#lookup(path);
    if (segments.length === 0 || entry) throw FileSystemError.pathExists(path);

    const missing: PathBuilder[] = [];
    for (let current = PathBuilder.absolute(...segments); current.segments.length > 0; current = current.parent()) {
      const existing = this.#entries.get(current.toString());
      if (existing?.kind === "file") {
        throw FileSystemError.invalidOperation(current.toString(), "Not a directory");
      }
      if (!existing) missing.push(current);
    }
    for (const directory of missing) {
      this.#entries.set(directory.toString(), { kind: "directory", segments: [...directory.segments] });
    }
  }

  listDirectory(path: string): string[] {
    const { segments } = this.#directory(path);
    const names: string[] = [];
    for (const entry of this.#entries.values()) {
      if (entry.segments.length === segments.length + 1 && isPrefix(segments, entry.segments)) {
        names.push(entry.segments[segments.length] ?? "");
      }
    }
    return names.sort();
  }

  removeDirectory(path: string): void {
    const { key, segments } = this.#directory(path);
    if (segments.length === 0) throw FileSystemError.invalidOperation(path, "Cannot remove the root");
    if (this.#descendants(segments).length > 0) {
      throw FileSystemError.invalidOperation(path, "Directory not empty");
    }
    this.#entries.delete(key);
  }

  removeDirectoryAll(path: string): void {
    const { key, segments } = this.#directory(path);
    if (segments.length === 0) throw FileSystemError.invalidOperation(path, "Cannot remove the root");
    for (const descendant of this.#descendants(segments)) {
      this.#entries.delete(descendant);
    }
    this.#entries.delete(key);
  }

  createFile(path: string): MemoryFileHandle {
    const { key, segments, entry } = this.#lookup(path);
    if (segments.length === 0 || entry) throw FileSystemError.pathExists(path);
    this.#requireParent(segments, path);
    const file: MemoryFile = { kind: "file", segments, bytes: new Uint8Array(0), lock: "unlocked" };
    this.#entries.set(key, file);
    return new MemoryFileHandle(key, file);
  }

  openFile(path: string): MemoryFileHandle {
    return new MemoryFileHandle(this.#lookup(path).key, this.#file(path));
  }

  removeFile(path: string): void {
    const { key } = this.#lookup(path);
    this.#file(path);
    this.#entries.delete(key);
  }

  #lookup(path: string): Lookup {
    const segments = resolveSegments(path);
    const key = pathKey(segments);
    return { key, segments, entry: this.#entries.get(key) };
  }

  #file(path: string): MemoryFile {
    const { segments, entry } = this.#lookup(path);
    if (segments.length === 0 || entry?.kind === "directory") {
      throw FileSystemError.invalidOperation(path, "Is a directory");
    }
    if (!entry) throw FileSystemError.pathMissing(path);
    return entry;
  }

  #directory(path: string): Lookup {
    const found = this.#lookup(path);
    if (found.segments.length === 0) return found;
    if (!found.entry) throw FileSystemError.pathMissing(path);
    if (found.entry.kind !== "directory") throw FileSystemError.invalidOperation(path, "Not a directory");
    return found;
  }

  #requireParent(segments: readonly string[], path: string): void {
    if (segments.length <= 1) return;
    const parent = this.#entries.get(pathKey(segments.slice(0, -1)));
    if (parent?.kind !== "directory") throw FileSystemError.parentMissing(path);
  }

  #descendants(segments: readonly string[]): string[] {
    const keys: string[] = [];
    for (const [key, entry] of this.#entries) {
      if (entry.segments.length > segments.length && isPrefix(segments, entry.segments)) keys.push(key);
    }
    return keys;
  }
}

function isPrefix(prefix: readonly string[], segments: readonly string[]): boolean {
  return prefix.every((segment, i) => segments[i] === segment);
}

export class MemoryFileHandle extends BaseFileHandle {
  readonly #file: MemoryFile;
  #cursor = 0;

  constructor(
    override readonly path: string,
    file: MemoryFile,
  ) {
    super();
    this.#file = file;
  }

  override get position(): number {
    return this.#cursor;
  }

  override get lockMode(): FileLockMode {
    return this.#file.lock;
  }

  override set lockMode(mode: FileLockMode) {
    this.assertOpen();
    this.#file.lock = mode;
  }

  override read(buffer: Uint8Array): number {
    this.assertOpen();
    const bytes = this.#file.bytes;
    const count = Math.min(buffer.length, Math.max(0, bytes.length - this.#cursor));
    buffer.set(bytes.subarray(this.#cursor, this.#cursor + count));
    this.#cursor += count;
    return count;
  }

  override write(data: Uint8Array): number {
    this.assertOpen();
    const end = this.#cursor + data.length;
    if (end > this.#file.bytes.length) this.#resize(end);
    this.#file.bytes.set(data, this.#cursor);
    this.#cursor = end;
    return data.length;
  }

  override seek(offset: number, from: SeekOrigin = "start"): number {
    this.assertOpen();
    this.#cursor = resolveSeek(this.path, this.#cursor, this.#file.bytes.length, offset, from);
    return this.#cursor;
  }

  override size(): number {
    this.assertOpen();
    return this.#file.bytes.length;
  }

  override setSize(size: number): void {
    this.assertOpen();
    this.assertSize(size);
    this.#resize(size);
  }

  protected override release(): void {}

  #resize(size: number): void {
    const next = new Uint8Array(size);
    next.set(this.#file.bytes.subarray(0, size));
    this.#file.bytes = next;
  }
}

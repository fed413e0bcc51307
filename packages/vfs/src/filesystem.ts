/* =======================================================================================
 * FILESYSTEM CONTRACTS
 * ---------------------------------------------------------------------------------------
 * Synchronous, like the URI parser they sit on. Paths are URI paths: segments separated
 * by "/", percent-encoded where needed, "" and "." segments ignored, ".." rejected.
 * ======================================================================================= */

import { FileSystemError } from "./errors.js";

/** Advisory lock state of an open file. */
export type FileLockMode = "unlocked" | "shared" | "exclusive";

export type SeekOrigin = "start" | "current" | "end";

export interface FileHandle {
  /** Path of the file as the owning filesystem names it. */
  readonly path: string;
  /** Cursor offset in bytes. */
  readonly position: number;
  lockMode: FileLockMode;

  /** Read into `buffer` at the cursor; returns the byte count (0 at end of file). */
  read(buffer: Uint8Array): number;
  /** Write at the cursor, growing the file as needed; returns the byte count. */
  write(data: Uint8Array): number;
  /** Move the cursor; returns the new offset. */
  seek(offset: number, from?: SeekOrigin): number;
  size(): number;
  /** Grow (zero-filled) or shrink the file. The cursor stays where it is. */
  setSize(size: number): void;
  truncate(): void;
  /** Read at `offset` without moving the cursor. */
  readAt(offset: number, buffer: Uint8Array): number;
  /** Write at `offset` without moving the cursor. */
  writeAt(offset: number, data: Uint8Array): number;
  close(): void;
}

export interface FileSystem {
  exists(path: string): boolean;
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
  fileSize(path: string): number;
  createDirectory(path: string): void;
  /** Create the directory and every missing ancestor. */
  createDirectoryAll(path: string): void;
  /** Names of the direct children, sorted. */
  listDirectory(path: string): string[];
  /** Remove an empty directory. */
  removeDirectory(path: string): void;
  removeDirectoryAll(path: string): void;
  /** Create a new, empty file; fails when the path exists. */
  createFile(path: string): FileHandle;
  openFile(path: string): FileHandle;
  removeFile(path: string): void;
}

/** Provisions filesystems for the URL schemes it claims. */
export interface FileSystemProvider {
  readonly schemes: readonly string[];
  configure(options: Readonly<Record<string, string>>): void;
  provision(url: string): FileSystem;
}

/** Resolve a seek request against the current cursor and size. */
export function resolveSeek(path: string, current: number, size: number, offset: number, from: SeekOrigin): number {
  const base = from === "start" ? 0 : from === "current" ? current : size;
  const target = base + offset;
  if (!Number.isSafeInteger(target) || target < 0) {
    throw FileSystemError.invalidOperation(path, `Cannot seek to ${target}`);
  }
  return target;
}

/**
 * Shared behaviour of the handle implementations: positional I/O on top of seek/read/write,
 * truncate on top of setSize, and the closed state.
 */
export abstract class BaseFileHandle implements FileHandle {
  #closed = false;

  abstract readonly path: string;
  abstract get position(): number;
  abstract get lockMode(): FileLockMode;
  abstract set lockMode(mode: FileLockMode);

  abstract read(buffer: Uint8Array): number;
  abstract write(data: Uint8Array): number;
  abstract seek(offset: number, from?: SeekOrigin): number;
  abstract size(): number;
  abstract setSize(size: number): void;

  /** Release whatever the handle holds; called once by close(). */
  protected abstract release(): void;

  get closed(): boolean {
    return this.#closed;
  }

  truncate(): void {
    this.setSize(0);
  }

  readAt(offset: number, buffer: Uint8Array): number {
    const saved = this.position;
    this.seek(offset, "start");
    try {
      return this.read(buffer);
    } finally {
      this.seek(saved, "start");
    }
  }

  writeAt(offset: number, data: Uint8Array): number {
    const saved = this.position;
    this.seek(offset, "start");
    try {
      return this.write(data);
    } finally {
      this.seek(saved, "start");
    }
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.release();
  }

  protected assertOpen(): void {
    if (this.#closed) throw FileSystemError.invalidOperation(this.path, "File handle is closed");
  }

  protected assertSize(size: number): void {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw FileSystemError.invalidOperation(this.path, `Invalid file size ${size}`);
    }
  }
}

import * as fs from "node:fs";
import * as nodePath from "node:path";

import { FileSystemError, fromNodeError } from "./errors.js";
import { BaseFileHandle, resolveSeek, type FileLockMode, type FileSystem, type SeekOrigin } from "./filesystem.js";
import { resolveSegments } from "./paths.js";

/**
 * Filesystem over a directory of the host, through node:fs. Paths are resolved from their
 * decoded segments under `root`, so nothing outside it can be named.
 */
export class LocalFileSystem implements FileSystem {
  readonly root: string;

  constructor(root: string) {
    this.root = nodePath.resolve(root);
  }

  /** Host path for a filesystem path. */
  resolve(path: string): string {
    const target = nodePath.join(this.root, ...resolveSegments(path));
    const relative = nodePath.relative(this.root, target);
    if (relative === ".." || relative.startsWith(`..${nodePath.sep}`) || nodePath.isAbsolute(relative)) {
      throw new FileSystemError("invalid-path", `Path ${JSON.stringify(path)} leaves the filesystem root`, { path });
    }
    return target;
  }

  exists(path: string): boolean {
    return fs.existsSync(this.resolve(path));
  }

  isFile(path: string): boolean {
    return this.#stat(path)?.isFile() ?? false;
  }

  isDirectory(path: string): boolean {
    return this.#stat(path)?.isDirectory() ?? false;
  }

  fileSize(path: string): number {
    const stat = this.#stat(path);
    if (!stat) throw FileSystemError.pathMissing(path);
    if (stat.isDirectory()) throw FileSystemError.invalidOperation(path, "Is a directory");
    return stat.size;
  }

  createDirectory(path: string): void {
    const target = this.resolve(path);
    try {
      fs.mkdirSync(target);
    } catch (err) {
      throw this.#parentAware(err, path);
    }
  }

  createDirectoryAll(path: string): void {
    const target = this.resolve(path);
    if (fs.existsSync(target)) throw FileSystemError.pathExists(path);
    io(path, () => fs.mkdirSync(target, { recursive: true }));
  }

  listDirectory(path: string): string[] {
    this.#requireDirectory(path);
    return io(path, () => fs.readdirSync(this.resolve(path))).sort();
  }

  removeDirectory(path: string): void {
    this.#requireRemovable(path);
    io(path, () => fs.rmdirSync(this.resolve(path)));
  }

  removeDirectoryAll(path: string): void {
    this.#requireRemovable(path);
    io(path, () => fs.rmSync(this.resolve(path), { recursive: true }));
  }

  createFile(path: string): LocalFileHandle {
    const target = this.resolve(path);
    try {
      return new LocalFileHandle(target, fs.openSync(target, "wx+"));
    } catch (err) {
      throw this.#parentAware(err, path);
    }
  }

  openFile(path: string): LocalFileHandle {
    const target = this.resolve(path);
    return new LocalFileHandle(target, io(path, () => fs.openSync(target, "r+")));
  }

  removeFile(path: string): void {
    const stat = this.#stat(path);
    if (stat?.isDirectory()) throw FileSystemError.invalidOperation(path, "Is a directory");
    io(path, () => fs.unlinkSync(this.resolve(path)));
  }

  #stat(path: string): fs.Stats | undefined {
    return io(path, () => fs.statSync(this.resolve(path), { throwIfNoEntry: false }));
  }

  #requireDirectory(path: string): void {
    const stat = this.#stat(path);
    if (!stat) throw FileSystemError.pathMissing(path);
    if (!stat.isDirectory()) throw FileSystemError.invalidOperation(path, "Not a directory");
  }

  #requireRemovable(path: string): void {
    if (resolveSegments(path).length === 0) throw FileSystemError.invalidOperation(path, "Cannot remove the root");
    this.#requireDirectory(path);
  }

  /** ENOENT while creating an entry means the parent is missing. */
  #parentAware(err: unknown, path: string): FileSystemError {
    const mapped = fromNodeError(err, path);
    return mapped.kind === "path-missing" ? FileSystemError.parentMissing(path) : mapped;
  }
}

function io<T>(path: string, run: () => T): T {
  try {
    return run();
  } catch (err) {
    throw fromNodeError(err, path);
  }
}

/**
 * Handle over an open descriptor. Reads and writes are positional, so the cursor lives
 * here rather than in the descriptor. Node has no advisory file locks; the lock mode is
 * tracked on the handle only.
 */
export class LocalFileHandle extends BaseFileHandle {
  readonly #fd: number;
  #cursor = 0;
  #lock: FileLockMode = "unlocked";

  constructor(
    override readonly path: string,
    fd: number,
  ) {
    super();
    this.#fd = fd;
  }

  override get position(): number {
    return this.#cursor;
  }

  override get lockMode(): FileLockMode {
    return this.#lock;
  }

  override set lockMode(mode: FileLockMode) {
    this.assertOpen();
    this.#lock = mode;
  }

  override read(buffer: Uint8Array): number {
    this.assertOpen();
    const count = io(this.path, () => fs.readSync(this.#fd, buffer, 0, buffer.length, this.#cursor));
    this.#cursor += count;
    return count;
  }

  override write(data: Uint8Array): number {
    this.assertOpen();
    const written = io(this.path, () => fs.writeSync(this.#fd, data, 0, data.length, this.#cursor));
    this.#cursor += written;
    return written;
  }

  override seek(offset: number, from: SeekOrigin = "start"): number {
    this.assertOpen();
    const size = from === "end" ? this.size() : 0;
    this.#cursor = resolveSeek(this.path, this.#cursor, size, offset, from);
    return this.#cursor;
  }

  override size(): number {
    this.assertOpen();
    return io(this.path, () => fs.fstatSync(this.#fd).size);
  }

  override setSize(size: number): void {
    this.assertOpen();
    this.assertSize(size);
    io(this.path, () => fs.ftruncateSync(this.#fd, size));
  }

  protected override release(): void {
    io(this.path, () => fs.closeSync(this.#fd));
  }
}

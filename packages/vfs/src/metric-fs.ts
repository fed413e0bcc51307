import { BaseFileHandle, type FileHandle, type FileLockMode, type FileSystem, type SeekOrigin } from "./filesystem.js";

export interface MetricsData {
  bytesRead: number;
  bytesWritten: number;
  reads: number;
  writes: number;
}

export type FileSystemOperation = keyof FileSystem;

function emptyMetrics(): MetricsData {
  return { bytesRead: 0, bytesWritten: 0, reads: 0, writes: 0 };
}

/**
 * Wraps any FileSystem and counts what passes through it: calls per operation, and bytes
 * read and written per file (keyed by the handle's path) and in total.
 */
export class MetricFileSystem implements FileSystem {
  readonly #inner: FileSystem;
  readonly #files = new Map<string, MetricsData>();
  readonly #operations = new Map<FileSystemOperation, number>();

  constructor(inner: FileSystem) {
    this.#inner = inner;
  }

  /** Totals across every file opened through this filesystem. */
  filesystemMetrics(): MetricsData {
    const total = emptyMetrics();
    for (const file of this.#files.values()) {
      total.bytesRead += file.bytesRead;
      total.bytesWritten += file.bytesWritten;
      total.reads += file.reads;
      total.writes += file.writes;
    }
    return total;
  }

  fileMetrics(): Map<string, MetricsData> {
    return new Map(Array.from(this.#files, ([path, data]) => [path, { ...data }]));
  }

  operationCount(operation: FileSystemOperation): number {
    return this.#operations.get(operation) ?? 0;
  }

  exists(path: string): boolean {
    this.#count("exists");
    return this.#inner.exists(path);
  }

  isFile(path: string): boolean {
    this.#count("isFile");
    return this.#inner.isFile(path);
  }

  isDirectory(path: string): boolean {
    this.#count("isDirectory");
    return this.#inner.isDirectory(path);
  }

  fileSize(path: string): number {
    this.#count("fileSize");
    return this.#inner.fileSize(path);
  }

  createDirectory(path: string): void {
    this.#count("createDirectory");
    this.#inner.createDirectory(path);
  }

  createDirectoryAll(path: string): void {
    this.#count("createDirectoryAll");
    this.#inner.createDirectoryAll(path);
  }

  listDirectory(path: string): string[] {
    this.#count("listDirectory");
    return this.#inner.listDirectory(path);
  }

  removeDirectory(path: string): void {
    this.#count("removeDirectory");
    this.#inner.removeDirectory(path);
  }

  removeDirectoryAll(path: string): void {
    this.#count("removeDirectoryAll");
    this.#inner.removeDirectoryAll(path);
  }

  createFile(path: string): MetricFileHandle {
    this.#count("createFile");
    return this.#wrap(this.#inner.createFile(path));
  }

  openFile(path: string): MetricFileHandle {
    this.#count("openFile");
    return this.#wrap(this.#inner.openFile(path));
  }

  removeFile(path: string): void {
    this.#count("removeFile");
    this.#inner.removeFile(path);
  }

  #count(operation: FileSystemOperation): void {
    this.#operations.set(operation, this.operationCount(operation) + 1);
  }

  #wrap(handle: FileHandle): MetricFileHandle {
    let metrics = this.#files.get(handle.path);
    if (!metrics) {
      metrics = emptyMetrics();
      this.#files.set(handle.path, metrics);
    }
    return new MetricFileHandle(handle, metrics);
  }
}

export class MetricFileHandle extends BaseFileHandle {
  readonly #inner: FileHandle;
  readonly #metrics: MetricsData;

  constructor(inner: FileHandle, metrics: MetricsData) {
    super();
    this.#inner = inner;
    this.#metrics = metrics;
  }

  override get path(): string {
    return this.#inner.path;
  }

  override get position(): number {
    return this.#inner.position;
  }

  override get lockMode(): FileLockMode {
    return this.#inner.lockMode;
  }

  override set lockMode(mode: FileLockMode) {
    this.#inner.lockMode = mode;
  }

  override read(buffer: Uint8Array): number {
    const count = this.#inner.read(buffer);
    this.#metrics.reads++;
    this.#metrics.bytesRead += count;
    return count;
  }

  override write(data: Uint8Array): number {
    const count = this.#inner.write(data);
    this.#metrics.writes++;
    this.#metrics.bytesWritten += count;
    return count;
  }

  override seek(offset: number, from?: SeekOrigin): number {
    return this.#inner.seek(offset, from);
  }

  override size(): number {
    return this.#inner.size();
  }

  override setSize(size: number): void {
    this.#inner.setSize(size);
  }

  protected override release(): void {
    this.#inner.close();
  }
}

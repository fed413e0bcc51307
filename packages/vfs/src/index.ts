// VFS package public API
//
// Filesystems addressed by URL: register providers per scheme on a manager, then ask it
// for the filesystem behind a URL.

export { FileSystemError, fromNodeError } from "./errors.js";
export type { FileSystemErrorKind, FileSystemErrorOptions } from "./errors.js";

export { BaseFileHandle, resolveSeek } from "./filesystem.js";
export type { FileHandle, FileLockMode, FileSystem, FileSystemProvider, SeekOrigin } from "./filesystem.js";

export { MemoryFileSystem, MemoryFileHandle } from "./memory-fs.js";
export type { MemoryFile } from "./memory-fs.js";
export { LocalFileSystem, LocalFileHandle } from "./local-fs.js";
export { MetricFileSystem, MetricFileHandle } from "./metric-fs.js";
export type { MetricsData, FileSystemOperation } from "./metric-fs.js";
export { VirtualFileSystem, VirtualFileSystemManager } from "./virtual-fs.js";
export { MemoryFileSystemProvider, LocalFileSystemProvider } from "./providers.js";
export { resolveSegments, normalizeSegments, pathKey } from "./paths.js";

export type FileSystemErrorKind =
  | "invalid-path"
  | "path-exists"
  | "path-missing"
  | "parent-missing"
  | "permission-denied"
  | "invalid-operation"
  | "unsupported-operation"
  | "unknown-filesystem"
  | "parsing"
  | "io";

export interface FileSystemErrorOptions {
  path?: string;
  cause?: unknown;
}

/** Every failure raised by a FileSystem, a FileHandle or the manager. */
export class FileSystemError extends Error {
  readonly kind: FileSystemErrorKind;
  readonly path: string | null;

  constructor(kind: FileSystemErrorKind, message: string, options: FileSystemErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.path = options.path ?? null;
  }

  static pathMissing(path: string): FileSystemError {
    return new FileSystemError("path-missing", `No such file or directory: ${path}`, { path });
  }

  static pathExists(path: string): FileSystemError {
    return new FileSystemError("path-exists", `Already exists: ${path}`, { path });
  }

  static parentMissing(path: string): FileSystemError {
    return new FileSystemError("parent-missing", `Parent directory does not exist: ${path}`, { path });
  }

  static invalidOperation(path: string, reason: string): FileSystemError {
    return new FileSystemError("invalid-operation", `${reason}: ${path}`, { path });
  }
}

/** Map an error thrown by node:fs onto a FileSystemError for `path`. */
export function fromNodeError(err: unknown, path: string): FileSystemError {
  if (err instanceof FileSystemError) return err;
  const code = err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
  const message = err instanceof Error ? err.message : String(err);
  switch (code) {
    case "ENOENT":
      return new FileSystemError("path-missing", `No such file or directory: ${path}`, { path, cause: err });
    case "EEXIST":
      return new FileSystemError("path-exists", `Already exists: ${path}`, { path, cause: err });
    case "EACCES":
    case "EPERM":
      return new FileSystemError("permission-denied", `Permission denied: ${path}`, { path, cause: err });
    case "EINVAL":
    case "ENAMETOOLONG":
      return new FileSystemError("invalid-path", message, { path, cause: err });
    case "EISDIR":
    case "ENOTDIR":
    case "ENOTEMPTY":
      return new FileSystemError("invalid-operation", message, { path, cause: err });
    default:
      return new FileSystemError("io", message, { path, cause: err });
  }
}

import * as fs from "node:fs";
import * as os from "node:os";
import * as nodePath from "node:path";

import { configureDebug, refreshDebugChannels, UriParseError } from "@urikit/uri";
import { afterEach, beforeEach, describe, test, expect } from "vitest";

import { FileSystemError } from "../src/errors.js";
import { LocalFileSystemProvider, MemoryFileSystemProvider } from "../src/providers.js";
import { VirtualFileSystemManager } from "../src/virtual-fs.js";

function errorOf(run: () => unknown): FileSystemError {
  try {
    run();
  } catch (err) {
    if (err instanceof FileSystemError) return err;
    throw err;
  }
  throw new Error("expected a FileSystemError");
}

describe("VirtualFileSystemManager", () => {
  test("routes by scheme, case-insensitively", () => {
    const manager = new VirtualFileSystemManager();
    manager.register(new MemoryFileSystemProvider());
    expect(manager.schemes()).toEqual(["mem", "memory"]);

    const vfs = manager.get("MEM:/scratch");
    vfs.createDirectory("/d");
    expect(vfs.isDirectory("/d")).toBe(true);
  });

  test("memory filesystems are fresh per provision unless shared", () => {
    const manager = new VirtualFileSystemManager();
    const provider = new MemoryFileSystemProvider();
    manager.register(provider);

    manager.get("mem:x").createDirectory("/d");
    expect(manager.get("memory:y").exists("/d")).toBe(false);

    provider.configure({ shared: "true" });
    manager.get("mem:x").createDirectory("/d");
    expect(manager.get("memory:y").exists("/d")).toBe(true);
  });

  test("unknown scheme", () => {
    const manager = new VirtualFileSystemManager();
    const error = errorOf(() => manager.get("ftp://example.com/"));
    expect(error.kind).toBe("unknown-filesystem");
    expect(error.message).toBe('No filesystem registered for scheme "ftp"');
  });

  test("a URL that does not parse", () => {
    const manager = new VirtualFileSystemManager();
    manager.register(new MemoryFileSystemProvider());
    const error = errorOf(() => manager.get("not a url"));
    expect(error.kind).toBe("parsing");
    expect(error.cause).toBeInstanceOf(UriParseError);
  });
});

describe("vfs debug channel", () => {
  afterEach(() => {
    delete process.env["URIKIT_DEBUG"];
    refreshDebugChannels();
    configureDebug({ output: console.log });
  });

  test("reports registration and routing", () => {
    const lines: string[] = [];
    configureDebug({ output: (message) => lines.push(message), format: "pretty" });
    process.env["URIKIT_DEBUG"] = "vfs";
    refreshDebugChannels();

    const manager = new VirtualFileSystemManager();
    manager.register(new MemoryFileSystemProvider());
    manager.get("mem:x");
    errorOf(() => manager.get("zip:y"));

    expect(lines).toEqual([
      '[vfs.register] { schemes="mem,memory" }',
      '[vfs.get.provision] { scheme="mem", url="mem:x" }',
      '[vfs.get.unknown-scheme] { scheme="zip" }',
    ]);
  });
});

describe("LocalFileSystemProvider", () => {
  let root: string;
  let manager: VirtualFileSystemManager;

  beforeEach(() => {
    root = fs.mkdtempSync(nodePath.join(os.tmpdir(), "vfs-provider-"));
    fs.mkdirSync(nodePath.join(root, "sub"));
    const provider = new LocalFileSystemProvider();
    provider.configure({ root });
    manager = new VirtualFileSystemManager();
    manager.register(provider);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  test("roots the filesystem at the URL path", () => {
    manager.get("file:///sub").createFile("/f.txt").close();
    expect(fs.existsSync(nodePath.join(root, "sub", "f.txt"))).toBe(true);

    expect(manager.get("file://localhost/sub").isFile("/f.txt")).toBe(true);
  });

  test("remote hosts and escaping paths are refused", () => {
    expect(errorOf(() => manager.get("file://remote/sub")).kind).toBe("unsupported-operation");
    expect(errorOf(() => manager.get("file:///../sub")).kind).toBe("invalid-path");
    expect(errorOf(() => manager.get("file:///..%2Fsub")).kind).toBe("invalid-path");
  });
});

/**
 * Mock File System Context Implementation
 *
 * In-memory file system for testing. Paths are normalized to absolute posix
 * form; parent directories are created implicitly.
 */

import type { FileSystemContext } from "./context.js";

/**
 * Options for creating a mock file system.
 */
export interface MockFileSystemOptions {
  /**
   * Initial file contents.
   * Keys are file paths, values are contents.
   */
  readonly files?: Record<string, string>;

  /**
   * Root directory (for relative path resolution).
   */
  readonly root?: string;
}

/**
 * Mock file system context with mutation methods.
 */
export interface MockFileSystemContext extends FileSystemContext {
  /** Add (or overwrite) a file. */
  addFile(path: string, content?: string): void;

  /** Remove a file or directory. Removing a directory removes its contents. */
  remove(path: string): void;

  /** Get all file paths, sorted. */
  getAllFiles(): string[];
}

/**
 * Create a mock file system context for testing.
 *
 * @example
 * ```typescript
 * const mockFs = createMockFileSystem({
 *   files: {
 *     "/docs/guide/intro.md": "# Intro",
 *     "/docs/guide/intro.fr.md": "# Introduction",
 *   },
 * });
 * ```
 */
export function createMockFileSystem(options?: MockFileSystemOptions): MockFileSystemContext {
  const root = options?.root ?? "/";
  const files = new Map<string, string>();
  const directories = new Set<string>(["/"]);

  function normalizePath(path: string): string {
    let normalized = path.replace(/\\/g, "/");
    if (!normalized.startsWith("/")) {
      normalized = `${root}/${normalized}`;
    }

    const resolved: string[] = [];
    for (const part of normalized.split("/").filter(Boolean)) {
      if (part === ".") continue;
      if (part === "..") {
        resolved.pop();
      } else {
        resolved.push(part);
      }
    }
    return "/" + resolved.join("/");
  }

  function parentDirectory(path: string): string {
    const slash = path.lastIndexOf("/");
    return slash > 0 ? path.slice(0, slash) : "/";
  }

  function addDirectories(dir: string): void {
    let current = dir;
    while (!directories.has(current)) {
      directories.add(current);
      current = parentDirectory(current);
    }
  }

  function addFile(path: string, content = ""): void {
    const normalized = normalizePath(path);
    files.set(normalized, content);
    addDirectories(parentDirectory(normalized));
  }

  for (const [path, content] of Object.entries(options?.files ?? {})) {
    addFile(path, content);
  }

  return {
    fileExists(path: string): boolean {
      return files.has(normalizePath(path));
    },

    isDirectory(path: string): boolean {
      return directories.has(normalizePath(path));
    },

    readDirectory(path: string): string[] {
      const dir = normalizePath(path);
      const names = new Set<string>();
      for (const entry of [...files.keys(), ...directories]) {
        if (entry !== dir && parentDirectory(entry) === dir) {
          names.add(entry.slice(entry.lastIndexOf("/") + 1));
        }
      }
      return [...names];
    },

    addFile,

    remove(path: string): void {
      const normalized = normalizePath(path);
      const prefix = normalized === "/" ? "/" : `${normalized}/`;
      files.delete(normalized);
      directories.delete(normalized);
      for (const file of [...files.keys()]) {
        if (file.startsWith(prefix)) files.delete(file);
      }
      for (const dir of [...directories]) {
        if (dir.startsWith(prefix)) directories.delete(dir);
      }
      directories.add("/");
    },

    getAllFiles(): string[] {
      return [...files.keys()].sort();
    },
  };
}

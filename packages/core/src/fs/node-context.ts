/**
 * Node.js File System Context Implementation
 */

import * as fs from "node:fs";
import type { FileSystemContext } from "./context.js";

/**
 * Create a Node.js file system context.
 *
 * @example
 * ```typescript
 * const fileSystem = createNodeFileSystem();
 * fileSystem.fileExists("/project/docs/guide/intro.fr.md");
 * ```
 */
export function createNodeFileSystem(): FileSystemContext {
  return {
    fileExists(path: string): boolean {
      try {
        return fs.statSync(path).isFile();
      } catch {
        return false;
      }
    },

    isDirectory(path: string): boolean {
      try {
        return fs.statSync(path).isDirectory();
      } catch {
        return false;
      }
    },

    readDirectory(path: string): string[] {
      try {
        return fs.readdirSync(path);
      } catch {
        return [];
      }
    },
  };
}

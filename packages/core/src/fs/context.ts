/**
 * File System Context
 *
 * The few host operations resolution and discovery need. Consumers pick an
 * implementation for their environment:
 * - `createNodeFileSystem()` - Node.js fs module
 * - `createMockFileSystem()` - In-memory for tests
 *
 * All calls are synchronous; resolution probes a handful of paths per
 * document and does not cache the answers.
 */
export interface FileSystemContext {
  /**
   * Check if a file exists.
   *
   * @param path - Absolute path to check
   * @returns true if the path exists and is a file
   */
  fileExists(path: string): boolean;

  /**
   * Check if a path is a directory.
   */
  isDirectory(path: string): boolean;

  /**
   * List entries in a directory.
   *
   * @param path - Absolute path to directory
   * @returns Entry names (not full paths), or [] when the directory is missing
   */
  readDirectory(path: string): string[];
}

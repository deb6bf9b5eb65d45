/**
 * Docs tree discovery.
 *
 * Walks the docs directory and describes every file the way a non-localized
 * build would place it. Localization happens afterwards, per locale pass.
 */

import path from "node:path";
import { debug } from "./debug.js";
import type { FileSystemContext } from "./fs/context.js";
import { joinRelative, parentOf, stem, suffix } from "./paths.js";
import type { DiscoveredFile, DocumentKind } from "./types.js";

export const PAGE_EXTENSIONS: readonly string[] = [".md", ".markdown", ".mdown", ".mkdn", ".mkd"];

export interface DiscoverOptions {
  /** @default true */
  readonly useDirectoryUrls?: boolean;
}

export function getDocumentKind(srcPath: string): DocumentKind {
  return PAGE_EXTENSIONS.includes(suffix(srcPath).toLowerCase()) ? "page" : "asset";
}

/**
 * Un-localized destination of a source file.
 *
 * - "index.md" / "README.md" -> "index.html"
 * - "guide/intro.md"         -> "guide/intro/index.html" ("guide/intro.html")
 * - "img/logo.png"           -> "img/logo.png"
 */
export function getDefaultDestPath(
  srcPath: string,
  kind: DocumentKind,
  useDirectoryUrls: boolean,
): string {
  if (kind === "asset") return srcPath;

  const parent = parentOf(srcPath);
  const base = stem(srcPath);
  if (base === "index" || base === "README") {
    return joinRelative(parent, "index.html");
  }
  return useDirectoryUrls
    ? joinRelative(parent, base, "index.html")
    : joinRelative(parent, `${base}.html`);
}

/**
 * List every file under `docsDir` in sorted, depth-first order.
 * Entries starting with "." are skipped.
 */
export function discoverFiles(
  fs: FileSystemContext,
  docsDir: string,
  options?: DiscoverOptions,
): DiscoveredFile[] {
  const useDirectoryUrls = options?.useDirectoryUrls ?? true;
  const files: DiscoveredFile[] = [];

  function walk(relativeDir: string): void {
    const entries = fs.readDirectory(path.join(docsDir, relativeDir)).sort();
    for (const entry of entries) {
      if (entry.startsWith(".")) continue;

      const srcPath = joinRelative(relativeDir, entry);
      const absPath = path.join(docsDir, srcPath);
      if (fs.isDirectory(absPath)) {
        walk(srcPath);
      } else if (fs.fileExists(absPath)) {
        const kind = getDocumentKind(srcPath);
        files.push({
          kind,
          srcPath,
          destPath: getDefaultDestPath(srcPath, kind, useDirectoryUrls),
        });
      }
    }
  }

  walk("");
  debug.discover("walk.complete", { docsDir, count: files.length });
  return files;
}

/**
 * Localized File Collection
 *
 * Holds the resolved files of one locale pass. At most one physical variant
 * is kept per destination (first insertion wins), and lookups by logical
 * path transparently land on the best localized sibling.
 */

import { debug } from "./debug.js";
import { resolveLocalizedFile } from "./file.js";
import type { FileSystemContext } from "./fs/context.js";
import { normalizeRelative, suffix, withSuffix } from "./paths.js";
import type { DiscoveredFile, LocaleContext, LocalizedFile } from "./types.js";

export class LocalizedFiles implements Iterable<LocalizedFile> {
  readonly #files: LocalizedFile[] = [];
  readonly #destPaths = new Set<string>();
  readonly #bySrcPath = new Map<string, LocalizedFile>();

  constructor(readonly context: LocaleContext) {}

  get size(): number {
    return this.#files.length;
  }

  [Symbol.iterator](): Iterator<LocalizedFile> {
    return this.#files[Symbol.iterator]();
  }

  /**
   * Append a file unless a member already owns its destination.
   *
   * @returns false when the file was dropped as a duplicate
   */
  add(file: LocalizedFile): boolean {
    if (this.#destPaths.has(file.destPath)) {
      debug.collect("duplicate.dropped", {
        srcPath: file.srcPath,
        initial: file.initialSrcPath,
        destPath: file.destPath,
      });
      return false;
    }
    this.#files.push(file);
    this.#destPaths.add(file.destPath);
    const key = normalizeRelative(file.srcPath);
    if (!this.#bySrcPath.has(key)) {
      this.#bySrcPath.set(key, file);
    }
    return true;
  }

  /** Exact lookup by source path, no locale fallback. */
  get(srcPath: string): LocalizedFile | undefined {
    return this.#bySrcPath.get(normalizeRelative(srcPath));
  }

  /**
   * Whether the logical path, or one of its locale siblings, is a member.
   */
  contains(logicalPath: string): boolean {
    return this.resolve(logicalPath) !== undefined;
  }

  /**
   * Member backing a logical path, trying `<p>.<requested>.<ext>`,
   * then `<p>.<default>.<ext>`, then `<p>` itself.
   */
  resolve(logicalPath: string): LocalizedFile | undefined {
    for (const candidate of this.#candidatePaths(logicalPath)) {
      const file = this.#bySrcPath.get(candidate);
      if (file) return file;
    }
    debug.collect("lookup.miss", { path: logicalPath });
    return undefined;
  }

  srcPaths(): string[] {
    return [...this.#bySrcPath.keys()];
  }

  documentationPages(): LocalizedFile[] {
    return this.#files.filter((file) => file.kind === "page");
  }

  assets(): LocalizedFile[] {
    return this.#files.filter((file) => file.kind === "asset");
  }

  #candidatePaths(logicalPath: string): string[] {
    const expected = normalizeRelative(logicalPath);
    const extension = suffix(expected);
    const { requestedLocale, defaultLocale } = this.context;
    return [
      withSuffix(expected, `.${requestedLocale}${extension}`),
      withSuffix(expected, `.${defaultLocale}${extension}`),
      expected,
    ];
  }
}

/**
 * Resolve every discovered file for the context's locale and collect them,
 * in discovery order.
 */
export function localizeFiles(
  files: Iterable<DiscoveredFile>,
  context: LocaleContext,
  fs: FileSystemContext,
): LocalizedFiles {
  const collection = new LocalizedFiles(context);
  for (const file of files) {
    collection.add(resolveLocalizedFile(file, context, fs));
  }
  debug.collect("pass.complete", {
    locale: context.requestedLocale,
    size: collection.size,
  });
  return collection;
}

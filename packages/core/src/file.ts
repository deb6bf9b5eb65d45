/**
 * Localized File Resolution
 *
 * Decides which physical file backs a logical document for one locale pass,
 * and where it lands in the site tree.
 *
 * Candidates are probed in a fixed order, first existing wins:
 *   1. `<stem>.<requested>.<ext>`
 *   2. `<stem>.<default>.<ext>`
 *   3. `<stem>.<ext>`
 * When none exists the walker's paths are kept unchanged, so a missing
 * translation never fails the build.
 */

import path from "node:path";
import { debug } from "./debug.js";
import type { FileSystemContext } from "./fs/context.js";
import type { LocaleCode } from "./locale.js";
import {
  fileName,
  joinRelative,
  normalizeRelative,
  parentOf,
  suffix,
  suffixes,
  withSuffix,
} from "./paths.js";
import type {
  DiscoveredFile,
  DocumentKind,
  LocaleContext,
  LocalizedFile,
  ResolutionMatch,
} from "./types.js";
import { computeUrl } from "./url.js";

const INDEX_STEMS = new Set(["index", "README"]);

/**
 * Locale embedded right before the extension (`intro.fr.md` -> "fr").
 * Every configured locale is recognized, not just the active ones.
 */
export function detectLocaleSuffix(
  srcPath: string,
  allLocales: readonly LocaleCode[],
): LocaleCode | null {
  const chain = suffixes(srcPath);
  if (chain.length < 2) return null;
  const beforeExtension = chain[chain.length - 2];
  return allLocales.find((locale) => `.${locale}` === beforeExtension) ?? null;
}

/**
 * Strip the extension, and the locale suffix when one was detected.
 */
export function getLogicalStemPath(srcPath: string, detectedLocale: LocaleCode | null): string {
  const withoutExtension = withSuffix(srcPath, "");
  return detectedLocale === null ? withoutExtension : withSuffix(withoutExtension, "");
}

/** Destination stem: index/README documents both become "index". */
export function getDestinationName(logicalStemPath: string): string {
  const last = fileName(logicalStemPath);
  return INDEX_STEMS.has(last) ? "index" : last;
}

/**
 * Output filename for a matched candidate.
 *
 * A locale-suffixed match drops its locale token. The bare candidate keeps
 * the initial path's own chain, so `logo.fr.png` found through `logo.png`
 * in a `de` pass still lands at `logo.fr.png`.
 */
export function getDestinationFileName(
  name: string,
  match: ResolutionMatch,
  detectedLocale: LocaleCode | null,
  extension: string,
): string {
  if (match.tag === "none" && detectedLocale !== null) {
    return `${name}.${detectedLocale}${extension}`;
  }
  return name + extension;
}

interface DestinationInput {
  readonly parent: string;
  readonly name: string;
  readonly destinationName: string;
  readonly useDirectoryUrls: boolean;
}

type DestinationRule = (input: DestinationInput) => string;

const DESTINATION_RULES: { readonly [K in DocumentKind]: DestinationRule } = {
  // index.md / README.md => index.html, foo.md => foo/index.html (or foo.html)
  page: ({ parent, name, useDirectoryUrls }) =>
    !useDirectoryUrls || name === "index"
      ? joinRelative(parent, `${name}.html`)
      : joinRelative(parent, name, "index.html"),
  asset: ({ parent, destinationName }) => joinRelative(parent, destinationName),
};

/**
 * Probe the three candidates in priority order.
 */
export function findLocalizedSource(
  logicalStemPath: string,
  extension: string,
  context: LocaleContext,
  fs: FileSystemContext,
): ResolutionMatch | null {
  const { requestedLocale, defaultLocale } = context;
  const candidates: ResolutionMatch[] = [
    {
      tag: "requested",
      locale: requestedLocale,
      srcPath: `${logicalStemPath}.${requestedLocale}${extension}`,
    },
    {
      tag: "default",
      locale: defaultLocale,
      srcPath: `${logicalStemPath}.${defaultLocale}${extension}`,
    },
    { tag: "none", srcPath: `${logicalStemPath}${extension}` },
  ];

  for (const candidate of candidates) {
    if (fs.fileExists(path.join(context.docsDir, candidate.srcPath))) {
      return candidate;
    }
  }
  return null;
}

/**
 * Resolve one discovered file for the context's requested locale.
 *
 * @example
 * ```typescript
 * // docs/guide/intro.md and docs/guide/intro.fr.md exist
 * const file = resolveLocalizedFile(
 *   { kind: "page", srcPath: "guide/intro.md", destPath: "guide/intro/index.html" },
 *   { requestedLocale: "fr", defaultLocale: "en", allLocales: ["en", "fr"], ... },
 *   fs,
 * );
 * file.srcPath; // "guide/intro.fr.md"
 * file.url;     // "fr/guide/intro/"
 * ```
 */
export function resolveLocalizedFile(
  file: DiscoveredFile,
  context: LocaleContext,
  fs: FileSystemContext,
): LocalizedFile {
  const initialSrcPath = normalizeRelative(file.srcPath);
  const extension = suffix(initialSrcPath);
  const detectedLocale = detectLocaleSuffix(initialSrcPath, context.allLocales);
  const logicalStemPath = getLogicalStemPath(initialSrcPath, detectedLocale);
  const name = getDestinationName(logicalStemPath);
  const locale = context.requestedLocale;

  const found = findLocalizedSource(logicalStemPath, extension, context, fs);

  let match: ResolutionMatch;
  let destPath: string;
  let absDestPath: string;
  if (found) {
    match = found;
    destPath = DESTINATION_RULES[file.kind]({
      parent: parentOf(found.srcPath),
      name,
      destinationName: getDestinationFileName(name, found, detectedLocale, extension),
      useDirectoryUrls: context.useDirectoryUrls,
    });
    absDestPath = path.join(context.siteDir, locale, destPath);
  } else {
    match = { tag: "unresolved", srcPath: initialSrcPath };
    destPath = normalizeRelative(file.destPath);
    absDestPath = path.join(context.siteDir, destPath);
  }

  const localeSuffix = match.tag === "requested" || match.tag === "default" ? match.locale : null;
  if (match.tag !== "requested") {
    debug.resolve("translation.missing", {
      srcPath: initialSrcPath,
      locale,
      using: match.tag,
    });
  }

  const resolved: LocalizedFile = {
    kind: file.kind,
    initialSrcPath,
    detectedLocale,
    logicalStemPath,
    name,
    match,
    localeSuffix,
    srcPath: match.srcPath,
    absSrcPath: path.join(context.docsDir, match.srcPath),
    destPath,
    absDestPath,
    destLocale: locale,
    url: computeUrl(destPath, locale, context.useDirectoryUrls),
  };

  debug.resolve("file.resolved", {
    initial: initialSrcPath,
    tag: match.tag,
    srcPath: resolved.srcPath,
    destPath,
    url: resolved.url,
  });

  return resolved;
}

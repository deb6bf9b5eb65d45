import type { LocaleCode } from "./locale.js";

/**
 * Closed set of document kinds. Pages are rendered to HTML; assets are
 * copied under their (localized) filename.
 */
export type DocumentKind = "page" | "asset";

/**
 * A file as supplied by the docs walker, before localization.
 */
export interface DiscoveredFile {
  readonly kind: DocumentKind;
  /** Docs-relative path, posix separators (e.g. "guide/intro.fr.md") */
  readonly srcPath: string;
  /** Walker's own un-localized destination (e.g. "guide/intro.fr/index.html") */
  readonly destPath: string;
}

/**
 * Everything a single locale pass shares. Immutable; passed explicitly to
 * the resolver and the collection.
 */
export interface LocaleContext {
  /** Locale being built; governs the output directory and URL prefix */
  readonly requestedLocale: LocaleCode;
  /** Locale whose files stand in when the requested variant is missing */
  readonly defaultLocale: LocaleCode;
  /** Every configured locale, in configuration order */
  readonly allLocales: readonly LocaleCode[];
  /** Absolute docs source directory */
  readonly docsDir: string;
  /** Absolute site output directory */
  readonly siteDir: string;
  readonly useDirectoryUrls: boolean;
}

/**
 * Outcome of the candidate search for one logical document.
 *
 * - `requested` / `default`: the locale-suffixed sibling existed
 * - `none`: only the un-suffixed file existed
 * - `unresolved`: no candidate existed; the walker's paths are kept as given
 */
export type ResolutionMatch =
  | { readonly tag: "requested"; readonly srcPath: string; readonly locale: LocaleCode }
  | { readonly tag: "default"; readonly srcPath: string; readonly locale: LocaleCode }
  | { readonly tag: "none"; readonly srcPath: string }
  | { readonly tag: "unresolved"; readonly srcPath: string };

export type ResolutionTag = ResolutionMatch["tag"];

/**
 * A logical document resolved for one locale pass.
 */
export interface LocalizedFile {
  readonly kind: DocumentKind;
  /** Path exactly as discovered */
  readonly initialSrcPath: string;
  /** Locale suffix embedded in `initialSrcPath`, if any */
  readonly detectedLocale: LocaleCode | null;
  /** `initialSrcPath` without locale suffix and extension */
  readonly logicalStemPath: string;
  /** Destination stem; "index" for index/README documents */
  readonly name: string;
  readonly match: ResolutionMatch;
  /** Locale of the matched sibling, or null for un-suffixed/unresolved */
  readonly localeSuffix: LocaleCode | null;
  readonly srcPath: string;
  readonly absSrcPath: string;
  /** Destination relative to the locale directory */
  readonly destPath: string;
  readonly absDestPath: string;
  readonly destLocale: LocaleCode;
  /** Locale-prefixed, percent-encoded href */
  readonly url: string;
}

import type { LocaleCode } from "@localized-docs/core";

/**
 * Per-language options. A bare string is shorthand for `{ name }`.
 */
export interface LanguageOptions {
  /** Display name (e.g. "Français"). Defaults to the locale code. */
  name?: string;
  /** Link used by language switchers. Defaults to "/<locale>/", "/" for the default. */
  link?: string;
  /**
   * Build this language.
   * @default true
   */
  build?: boolean;
}

/**
 * User-facing i18n options.
 */
export interface I18nOptions {
  /** Fallback locale for missing translations */
  defaultLanguage: LocaleCode;

  /** Configured languages keyed by locale code */
  languages?: Record<LocaleCode, string | LanguageOptions>;

  /**
   * Docs source directory, relative to the project root.
   * @default "docs"
   */
  docsDir?: string;

  /**
   * Site output directory, relative to the project root.
   * @default "site"
   */
  siteDir?: string;

  /**
   * Serve `foo.md` at `foo/` rather than `foo.html`.
   * @default true
   */
  useDirectoryUrls?: boolean;
}

export interface ResolvedLanguage {
  readonly locale: LocaleCode;
  readonly name: string;
  readonly link: string;
  readonly build: boolean;
}

/**
 * I18n options with defaults applied and locales validated.
 */
export interface ResolvedI18nOptions {
  readonly defaultLocale: LocaleCode;
  /** Default locale first, then the other configured locales in order */
  readonly locales: readonly LocaleCode[];
  readonly languages: ReadonlyMap<LocaleCode, ResolvedLanguage>;
  /** Absolute */
  readonly docsDir: string;
  /** Absolute */
  readonly siteDir: string;
  readonly useDirectoryUrls: boolean;
}

/**
 * @localized-docs/config - Options, defaults and per-pass locale contexts
 */

export type {
  I18nOptions,
  LanguageOptions,
  ResolvedI18nOptions,
  ResolvedLanguage,
} from "./types.js";

export {
  DEFAULT_DOCS_DIR,
  DEFAULT_SITE_DIR,
  DEFAULT_USE_DIRECTORY_URLS,
  createLocaleContext,
  getBuildLocales,
  normalizeI18nOptions,
  normalizeLanguage,
} from "./defaults.js";

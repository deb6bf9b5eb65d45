/**
 * Default Values and Normalization
 *
 * This file contains:
 * 1. Default values for the i18n options
 * 2. Normalization (validate locales, fill defaults, absolutize dirs)
 * 3. Per-pass LocaleContext construction
 */

import { resolve as resolvePath } from "node:path";
import {
  debug,
  validateLocale,
  type LocaleCode,
  type LocaleContext,
} from "@localized-docs/core";
import type {
  I18nOptions,
  LanguageOptions,
  ResolvedI18nOptions,
  ResolvedLanguage,
} from "./types.js";

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_DOCS_DIR = "docs";
export const DEFAULT_SITE_DIR = "site";
export const DEFAULT_USE_DIRECTORY_URLS = true;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Normalize a single language entry.
 */
export function normalizeLanguage(
  locale: LocaleCode,
  options: string | LanguageOptions | undefined,
  defaultLocale: LocaleCode,
): ResolvedLanguage {
  const entry: LanguageOptions = typeof options === "string" ? { name: options } : options ?? {};
  return {
    locale,
    name: entry.name ?? locale,
    link: entry.link ?? (locale === defaultLocale ? "/" : `/${locale}/`),
    build: entry.build ?? true,
  };
}

/**
 * Validate locales and apply defaults.
 *
 * @param options - User options
 * @param root - Project root that docsDir/siteDir are resolved against
 * @throws InvalidLocaleError when a locale code is malformed
 */
export function normalizeI18nOptions(
  options: I18nOptions,
  root: string = process.cwd(),
): ResolvedI18nOptions {
  if (typeof options.defaultLanguage !== "string") {
    throw new Error("i18n option 'defaultLanguage' is required and must be a locale code");
  }
  const defaultLocale = validateLocale(options.defaultLanguage);
  const configured = validateLocale<Record<LocaleCode, string | LanguageOptions>>(
    options.languages ?? {},
  );

  const locales: LocaleCode[] = [defaultLocale];
  for (const locale of Object.keys(configured)) {
    if (!locales.includes(locale)) locales.push(locale);
  }

  const languages = new Map<LocaleCode, ResolvedLanguage>();
  for (const locale of locales) {
    languages.set(locale, normalizeLanguage(locale, configured[locale], defaultLocale));
  }

  const resolved: ResolvedI18nOptions = {
    defaultLocale,
    locales,
    languages,
    docsDir: resolvePath(root, options.docsDir ?? DEFAULT_DOCS_DIR),
    siteDir: resolvePath(root, options.siteDir ?? DEFAULT_SITE_DIR),
    useDirectoryUrls: options.useDirectoryUrls ?? DEFAULT_USE_DIRECTORY_URLS,
  };

  debug.config("options.normalized", {
    defaultLocale,
    locales,
    useDirectoryUrls: resolved.useDirectoryUrls,
  });
  return resolved;
}

/**
 * Build the context for one locale pass.
 *
 * @throws Error when `requestedLocale` is not configured
 */
export function createLocaleContext(
  options: ResolvedI18nOptions,
  requestedLocale: LocaleCode,
): LocaleContext {
  if (!options.locales.includes(requestedLocale)) {
    throw new Error(
      `Locale '${requestedLocale}' is not configured; expected one of: ${options.locales.join(", ")}`,
    );
  }
  return {
    requestedLocale,
    defaultLocale: options.defaultLocale,
    allLocales: options.locales,
    docsDir: options.docsDir,
    siteDir: options.siteDir,
    useDirectoryUrls: options.useDirectoryUrls,
  };
}

/**
 * Locales with `build` enabled, default first.
 */
export function getBuildLocales(options: ResolvedI18nOptions): LocaleCode[] {
  return options.locales.filter((locale) => options.languages.get(locale)?.build !== false);
}

import path from "node:path";
import { toPosix } from "./paths.js";
import type { LocaleCode } from "./locale.js";
import type { LocalizedFile } from "./types.js";

/**
 * Percent-encode a URL, leaving "/" and RFC 3986 unreserved characters alone.
 */
export function quoteUrl(url: string): string {
  return url
    .split("/")
    .map((segment) =>
      encodeURIComponent(segment).replace(
        /[!'()*]/g,
        (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
      ),
    )
    .join("/");
}

/**
 * Compute the href of a destination inside a locale directory.
 *
 * Examples (directory URLs on, locale "fr"):
 * - "index.html"             -> "fr/"
 * - "guide/intro/index.html" -> "fr/guide/intro/"
 * - "img/logo.png"           -> "fr/img/logo.png"
 */
export function computeUrl(
  destPath: string,
  locale: LocaleCode,
  useDirectoryUrls: boolean,
): string {
  let url = toPosix(destPath);
  const slash = url.lastIndexOf("/");
  const dirname = slash >= 0 ? url.slice(0, slash) : "";
  const filename = url.slice(slash + 1);

  if (useDirectoryUrls && filename === "index.html") {
    url = dirname === "" ? "." : `${dirname}/`;
  }

  url = url === "." ? `${locale}/` : `${locale}/${url}`;
  return quoteUrl(url);
}

/**
 * Relative href from `other` to `url`.
 *
 * A target whose last segment contains a dot is treated as a file, so its
 * directory is used as the base. A trailing "/" on `url` is kept.
 */
export function getRelativeUrl(url: string, other: string): string {
  let base = other;
  if (base !== ".") {
    const slash = base.lastIndexOf("/");
    const last = base.slice(slash + 1);
    if (last.includes(".")) {
      base = slash >= 0 ? base.slice(0, slash) : "";
    }
  }

  const relative = path.posix.relative(`/${base}`, `/${url}`) || ".";
  return url.endsWith("/") ? `${relative}/` : relative;
}

/**
 * Relative href of `file` as seen from `other` (a file or a URL).
 */
export function urlRelativeTo(file: LocalizedFile, other: LocalizedFile | string): string {
  return getRelativeUrl(file.url, typeof other === "string" ? other : other.url);
}

/**
 * Path utilities for docs-relative paths.
 *
 * Docs-relative paths always use "/" separators. A filename is read as a stem
 * followed by an ordered chain of dot-separated suffix tokens:
 *
 * - `intro.fr.md` -> stem `intro.fr`, suffix `.md`, suffixes `[".fr", ".md"]`
 * - `.nojekyll`   -> no suffixes (a leading dot does not start a suffix)
 * - `notes.`      -> no suffixes
 */

import path from "node:path";

/** Convert host separators to "/". */
export function toPosix(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * Normalize a docs-relative path: posix separators, no "./" segments,
 * no duplicate or trailing slashes. The docs root itself is "".
 */
export function normalizeRelative(p: string): string {
  const normalized = path.posix.normalize(toPosix(p));
  if (normalized === "." || normalized === "./") return "";
  return normalized.replace(/^\.\//, "").replace(/\/+$/, "");
}

/** Final path component. */
export function fileName(p: string): string {
  const posix = toPosix(p);
  return posix.slice(posix.lastIndexOf("/") + 1);
}

/** Parent directory of a docs-relative path; "" for top-level entries. */
export function parentOf(p: string): string {
  const posix = toPosix(p);
  const slash = posix.lastIndexOf("/");
  return slash >= 0 ? posix.slice(0, slash) : "";
}

/** Ordered suffix chain of the final component. */
export function suffixes(p: string): string[] {
  const name = fileName(p);
  if (name.endsWith(".")) return [];
  return name
    .replace(/^\.+/, "")
    .split(".")
    .slice(1)
    .map((token) => `.${token}`);
}

/** Last suffix of the final component, or "". */
export function suffix(p: string): string {
  const chain = suffixes(p);
  return chain[chain.length - 1] ?? "";
}

/** Final component without its last suffix. */
export function stem(p: string): string {
  const name = fileName(p);
  const last = suffix(p);
  return last ? name.slice(0, -last.length) : name;
}

/**
 * Replace the last suffix of `p` with `newSuffix` (append when there is none).
 * An empty `newSuffix` strips the last suffix.
 */
export function withSuffix(p: string, newSuffix: string): string {
  return joinRelative(parentOf(p), stem(p) + newSuffix);
}

/** Join docs-relative segments, ignoring empty ones. */
export function joinRelative(...segments: string[]): string {
  return segments.filter((s) => s !== "").join("/");
}

/**
 * @localized-docs/core - Locale-aware file resolution for static docs builds
 *
 * Primary exports:
 * - resolveLocalizedFile() - Pick the physical variant backing a document
 * - LocalizedFiles / localizeFiles() - Deduplicated per-locale collection
 * - discoverFiles() - Walk a docs tree
 * - validateLocale() - Locale code syntax check
 */

export type {
  DocumentKind,
  DiscoveredFile,
  LocaleContext,
  LocalizedFile,
  ResolutionMatch,
  ResolutionTag,
} from "./types.js";

export {
  InvalidLocaleError,
  isLocaleCode,
  validateLocale,
  type LocaleCode,
} from "./locale.js";

export {
  fileName,
  joinRelative,
  normalizeRelative,
  parentOf,
  stem,
  suffix,
  suffixes,
  toPosix,
  withSuffix,
} from "./paths.js";

export {
  resolveLocalizedFile,
  findLocalizedSource,
  detectLocaleSuffix,
  getLogicalStemPath,
  getDestinationName,
  getDestinationFileName,
} from "./file.js";

export { LocalizedFiles, localizeFiles } from "./files.js";

export {
  discoverFiles,
  getDefaultDestPath,
  getDocumentKind,
  PAGE_EXTENSIONS,
  type DiscoverOptions,
} from "./discover.js";

export { computeUrl, getRelativeUrl, quoteUrl, urlRelativeTo } from "./url.js";

export type { FileSystemContext } from "./fs/context.js";
export { createNodeFileSystem } from "./fs/node-context.js";
export {
  createMockFileSystem,
  type MockFileSystemContext,
  type MockFileSystemOptions,
} from "./fs/mock-context.js";

export {
  debug,
  configureDebug,
  refreshDebugChannels,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

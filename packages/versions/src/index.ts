export { VersionCanonicalizer } from "./canonicalizer.js";
export type { VersionTuple } from "./canonicalizer.js";
export {
  LEGACY_MAGIC_INTS,
  MAGIC_LENGTH,
  formatMagic,
  intToMagic,
  magicKey,
  magicToInt,
  toMagic,
} from "./magic.js";
export type { MagicLike } from "./magic.js";
export { MagicRegistry } from "./magic-registry.js";
export { implementationSuffix, runtimeVersionString } from "./runtime.js";
export type { ReleaseLevel, RuntimeInfo } from "./runtime.js";
export {
  loadVersionCatalog,
  parseVersionCatalog,
  populateVersions,
  versionCatalogSchema,
} from "./catalog.js";
export type {
  AliasEntry,
  MagicEntry,
  SharedMagicEntry,
  VersionCatalog,
  VersionIndex,
} from "./catalog.js";

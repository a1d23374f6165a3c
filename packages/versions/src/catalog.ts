import { readFileSync } from "node:fs";

import { createValidator, deepFreeze } from "@pyc-atlas/core";
import type { SchemaObject } from "ajv";

import { VersionCanonicalizer } from "./canonicalizer.js";
import { MagicRegistry } from "./magic-registry.js";

export interface MagicEntry {
  magic: number;
  version: string;
}

export interface SharedMagicEntry {
  version: string;
  sameAs: string;
}

export interface AliasEntry {
  target: string;
  versions: string[];
}

/**
 * The hand-curated history of magic numbers and version spellings. Entries
 * are only ever appended: old compiled files depend on every historical row.
 */
export interface VersionCatalog {
  magics: MagicEntry[];
  shared: SharedMagicEntry[];
  aliases: AliasEntry[];
  pypy3Magics: number[];
}

const versionString = { type: "string", minLength: 1, pattern: "^\\S+$" };
const magicInt = { type: "integer", minimum: 0, maximum: 65535 };

export const versionCatalogSchema: SchemaObject = {
  $id: "https://pyc-atlas.dev/schema/version-catalog.json",
  type: "object",
  additionalProperties: false,
  required: ["magics", "shared", "aliases", "pypy3Magics"],
  properties: {
    magics: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["magic", "version"],
        properties: { magic: magicInt, version: versionString },
      },
    },
    shared: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["version", "sameAs"],
        properties: { version: versionString, sameAs: versionString },
      },
    },
    aliases: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["target", "versions"],
        properties: {
          target: versionString,
          versions: { type: "array", items: versionString, minItems: 1 },
        },
      },
    },
    pypy3Magics: { type: "array", items: magicInt, uniqueItems: true },
  },
};

export const parseVersionCatalog = createValidator<VersionCatalog>(versionCatalogSchema, "Version catalog");

const DEFAULT_CATALOG_URL = new URL("../data/python-versions.json", import.meta.url);

let defaultCatalog: VersionCatalog | undefined;

/** The shipped catalog, parsed once and deep-frozen; every caller gets the same object. */
export function loadVersionCatalog(): VersionCatalog {
  if (defaultCatalog === undefined) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_CATALOG_URL, "utf-8"));
    defaultCatalog = deepFreeze(parseVersionCatalog(raw));
  }
  return defaultCatalog;
}

export interface VersionIndex {
  readonly canonicalizer: VersionCanonicalizer;
  readonly magics: MagicRegistry;
}

/**
 * Replays a catalog in its own order: magic registrations first (which also
 * make each version canonical), then shared formats, then alias lists.
 * Nothing is frozen here; the caller decides when the build phase ends.
 */
export function populateVersions(catalog: VersionCatalog): VersionIndex {
  const canonicalizer = new VersionCanonicalizer();
  const magics = new MagicRegistry(canonicalizer);
  for (const entry of catalog.magics) {
    magics.register(entry.magic, entry.version);
  }
  for (const entry of catalog.shared) {
    magics.registerShared(entry.version, entry.sameAs);
  }
  for (const entry of catalog.aliases) {
    canonicalizer.registerAlias(entry.versions, entry.target);
  }
  return { canonicalizer, magics };
}

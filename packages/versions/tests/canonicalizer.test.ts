import fc from "fast-check";
import {
  CatalogError,
  RegistryFrozenError,
  UnknownVersionError,
} from "@pyc-atlas/core";
import { describe, expect, it } from "vitest";

import { VersionCanonicalizer, loadVersionCatalog, populateVersions } from "../src/index.js";

function sample(): VersionCanonicalizer {
  return new VersionCanonicalizer()
    .registerCanonical("2.7")
    .registerCanonical("3.6rc1")
    .registerCanonical("3.8pypy")
    .registerAlias(["2.7.17", "2.7.18"], "2.7")
    .registerAlias(["3.6", "3.6.0", "3.6.1"], "3.6rc1");
}

describe("VersionCanonicalizer", () => {
  it("resolves a registered alias to its canonical version", () => {
    const canonicalizer = sample();
    expect(canonicalizer.canonicalize("2.7.18")).toBe("2.7");
    expect(canonicalizer.canonicalize("2.7")).toBe("2.7");
  });

  it("refuses aliases whose target is not canonical", () => {
    const canonicalizer = sample();
    expect(() => canonicalizer.registerAlias(["2.7.99"], "2.7.18")).toThrow(UnknownVersionError);
    expect(canonicalizer.isKnown("2.7.99")).toBe(false);
  });

  it("refuses to rebind an alias to another class", () => {
    const canonicalizer = sample();
    expect(() => canonicalizer.registerAlias(["3.6.1"], "2.7")).toThrow(CatalogError);
    expect(canonicalizer.canonicalize("3.6.1")).toBe("3.6rc1");
  });

  it("binds none of a list when one spelling conflicts", () => {
    const canonicalizer = sample();
    expect(() => canonicalizer.registerAlias(["2.7.99", "3.6.1"], "2.7")).toThrow(
      "conflicting version alias: 3.6.1 already aliases 3.6rc1, not 2.7",
    );
    expect(canonicalizer.isKnown("2.7.99")).toBe(false);
    expect(canonicalizer.aliasesOf("2.7")).toEqual(["2.7.17", "2.7.18"]);
    canonicalizer.registerAlias(["2.7.99"], "2.7");
    expect(canonicalizer.isKnown("2.7.99")).toBe(true);
  });

  it("treats repeating an alias binding as a no-op", () => {
    const canonicalizer = sample();
    canonicalizer.registerAlias(["2.7.18", "2.7.18", "2.7"], "2.7");
    expect(canonicalizer.aliasesOf("2.7")).toEqual(["2.7.17", "2.7.18"]);
  });

  it("keeps canonical versions out of other classes", () => {
    const canonicalizer = sample();
    expect(() => canonicalizer.registerAlias(["2.7"], "3.6rc1")).toThrow(
      "conflicting version alias: 2.7 is canonical and cannot alias 3.6rc1",
    );
    expect(() => canonicalizer.registerCanonical("3.6.0")).toThrow(CatalogError);
  });

  it("rejects blank or spaced version strings", () => {
    const canonicalizer = new VersionCanonicalizer();
    expect(() => canonicalizer.registerCanonical("")).toThrow(CatalogError);
    expect(() => canonicalizer.registerCanonical("3 6")).toThrow(CatalogError);
  });

  it("falls back to major.minor for unlisted micro releases", () => {
    const canonicalizer = sample();
    expect(canonicalizer.canonicalize("3.6.16")).toBe("3.6rc1");
    expect(canonicalizer.canonicalize("3.6b4")).toBe("3.6rc1");
    expect(canonicalizer.canonicalize("2.7.19")).toBe("2.7");
  });

  it("keeps the implementation suffix when falling back", () => {
    const canonicalizer = sample();
    expect(canonicalizer.canonicalize("3.8.99pypy")).toBe("3.8pypy");
    expect(() => canonicalizer.canonicalize("3.8.99")).toThrow(UnknownVersionError);
    expect(() => canonicalizer.canonicalize("2.7.18dropbox")).toThrow(UnknownVersionError);
  });

  it("raises UnknownVersionError for unregistered spellings", () => {
    expect(() => sample().canonicalize("banana")).toThrow("unknown version banana");
  });

  it("extracts numeric tuples from known versions", () => {
    const canonicalizer = sample();
    expect(canonicalizer.versionTuple("3.6.1")).toEqual([3, 6, 1]);
    expect(canonicalizer.versionTuple("3.6rc1")).toEqual([3, 6]);
    expect(canonicalizer.versionTuple("3.8pypy")).toEqual([3, 8]);
    expect(() => canonicalizer.versionTuple("4.0")).toThrow(UnknownVersionError);
  });

  it("lists every spelling it knows", () => {
    const known = sample().allKnownVersions();
    expect([...known].sort()).toEqual(
      ["2.7", "2.7.17", "2.7.18", "3.6", "3.6.0", "3.6.1", "3.6rc1", "3.8pypy"].sort(),
    );
    expect(sample().canonicalVersions()).toEqual(["2.7", "3.6rc1", "3.8pypy"]);
  });

  it("stops accepting registrations once frozen", () => {
    const canonicalizer = sample().freeze();
    expect(canonicalizer.isFrozen).toBe(true);
    expect(() => canonicalizer.registerCanonical("3.12")).toThrow(RegistryFrozenError);
    expect(() => canonicalizer.registerAlias(["2.7.20"], "2.7")).toThrow(RegistryFrozenError);
    expect(canonicalizer.canonicalize("2.7.17")).toBe("2.7");
  });
});

describe("shipped version catalog", () => {
  const { canonicalizer } = populateVersions(loadVersionCatalog());

  it("is idempotent on every canonical version", () => {
    for (const version of canonicalizer.canonicalVersions()) {
      expect(canonicalizer.canonicalize(version)).toBe(version);
    }
  });

  it("is idempotent on every known spelling", () => {
    for (const version of canonicalizer.allKnownVersions()) {
      const canonical = canonicalizer.canonicalize(version);
      expect(canonicalizer.canonicalize(canonical)).toBe(canonical);
      expect(canonicalizer.isCanonical(canonical)).toBe(true);
    }
  });

  it("maps release spellings onto their bytecode classes", () => {
    expect(canonicalizer.canonicalize("3.9")).toBe("3.9.0beta5");
    expect(canonicalizer.canonicalize("3.6b2")).toBe("3.6b2");
    expect(canonicalizer.canonicalize("3.8pypy")).toBe("3.8pypy");
    expect(canonicalizer.canonicalize("3.8.13pypy")).toBe("3.8.12pypy");
    expect(canonicalizer.canonicalize("2.7.15candidate1")).toBe("2.7");
  });

  it("places any 3.10 micro release in the 3.10 class", () => {
    fc.assert(
      fc.property(fc.nat({ max: 999 }), (micro) => {
        expect(canonicalizer.canonicalize(`3.10.${micro}`)).toBe("3.10.0rc2");
      }),
      { seed: 3439, numRuns: 100 },
    );
  });
});

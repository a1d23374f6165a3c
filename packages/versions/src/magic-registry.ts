import {
  RegistryFrozenError,
  UnknownMagicError,
  UnknownVersionError,
  UnresolvedRuntimeError,
  emit,
} from "@pyc-atlas/core";

import type { VersionCanonicalizer, VersionTuple } from "./canonicalizer.js";
import { formatMagic, intToMagic, magicKey, magicToInt, toMagic, type MagicLike } from "./magic.js";
import { runtimeVersionString, type RuntimeInfo } from "./runtime.js";

/**
 * Bidirectional index between magic identifiers and canonical versions.
 *
 * Precedence: when a magic integer or a version is registered more than once,
 * the last registration answers the forward questions (`versionForInt`,
 * `magicFor`). The reverse question (`versionsFor`) keeps every version ever
 * registered under a magic, and `magicsFor` keeps every magic of a version.
 */
export class MagicRegistry {
  private readonly versionsByMagic = new Map<string, Set<string>>();
  private readonly magicsByVersion = new Map<string, Map<string, Uint8Array>>();
  private readonly latestMagic = new Map<string, Uint8Array>();
  private readonly versionByInt = new Map<number, string>();
  private frozen = false;

  constructor(readonly canonicalizer: VersionCanonicalizer) {}

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.versionByInt.size;
  }

  register(magicInt: number, version: string): this {
    this.assertMutable();
    const magic = intToMagic(magicInt);
    this.canonicalizer.registerCanonical(version);
    this.link(magic, version);
    this.versionByInt.set(magicInt, version);
    emit({ kind: "MagicRegistered", magic: magicInt, version, shared: false });
    return this;
  }

  /**
   * Declares `version` canonical with the bytecode format of `sameAs`. The
   * magic integer keeps answering `versionForInt` with its original version.
   */
  registerShared(version: string, sameAs: string): this {
    this.assertMutable();
    const magic = this.magicFor(sameAs);
    this.canonicalizer.registerCanonical(version);
    this.link(magic, version);
    emit({ kind: "MagicRegistered", magic: magicToInt(magic), version, shared: true });
    return this;
  }

  magicFor(version: string): Uint8Array {
    const canonical = this.canonicalizer.canonicalize(version);
    const magic = this.latestMagic.get(canonical);
    if (magic === undefined) {
      throw new UnknownVersionError(version, "no magic registered");
    }
    return magic.slice();
  }

  magicIntFor(version: string): number {
    return magicToInt(this.magicFor(version));
  }

  magicsFor(version: string): Uint8Array[] {
    const canonical = this.canonicalizer.canonicalize(version);
    const magics = this.magicsByVersion.get(canonical);
    if (magics === undefined) {
      throw new UnknownVersionError(version, "no magic registered");
    }
    return [...magics.values()].map((magic) => magic.slice());
  }

  versionsFor(magic: MagicLike): ReadonlySet<string> {
    const bytes = toMagic(magic);
    const versions = this.versionsByMagic.get(magicKey(bytes));
    if (versions === undefined) {
      throw new UnknownMagicError(formatMagic(bytes));
    }
    return new Set(versions);
  }

  hasMagic(magic: MagicLike): boolean {
    return this.versionsByMagic.has(magicKey(toMagic(magic)));
  }

  versionForInt(magicInt: number): string {
    const version = this.versionByInt.get(magicInt);
    if (version === undefined) {
      throw new UnknownMagicError(String(magicInt));
    }
    return version;
  }

  versionTupleForInt(magicInt: number): VersionTuple {
    return this.canonicalizer.versionTuple(this.versionForInt(magicInt));
  }

  magicInts(): readonly number[] {
    return [...this.versionByInt.keys()].sort((a, b) => a - b);
  }

  /** The magic a runtime writes into the bytecode it compiles. */
  currentRuntimeMagic(runtime: RuntimeInfo): Uint8Array {
    const spelled = runtimeVersionString(runtime);
    try {
      return this.magicFor(spelled);
    } catch (err) {
      throw new UnresolvedRuntimeError(spelled, err);
    }
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  private link(magic: Uint8Array, version: string): void {
    const key = magicKey(magic);
    let versions = this.versionsByMagic.get(key);
    if (versions === undefined) {
      versions = new Set();
      this.versionsByMagic.set(key, versions);
    }
    versions.add(version);

    let magics = this.magicsByVersion.get(version);
    if (magics === undefined) {
      magics = new Map();
      this.magicsByVersion.set(version, magics);
    }
    if (!magics.has(key)) {
      magics.set(key, magic);
    }
    this.latestMagic.set(version, magic);
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new RegistryFrozenError("MagicRegistry");
    }
  }
}

import {
  CatalogError,
  RegistryFrozenError,
  UnknownVersionError,
  emit,
} from "@pyc-atlas/core";

export type VersionTuple = readonly number[];

const IMPLEMENTATION_SUFFIX = /(pypy|dropbox)$/;
const VERSION_SHAPE = /^(\d+)\.(\d+)(?:\.(\d+))?/;
const MICRO_TUPLE = /^(\d+)\.(\d+)\.(\d+)/;
const MINOR_TUPLE = /^(\d+)\.(\d+)/;

function assertVersionString(version: string): void {
  if (version.length === 0 || /\s/.test(version)) {
    throw new CatalogError(`invalid version string ${JSON.stringify(version)}`);
  }
}

function splitSuffix(version: string): { core: string; suffix: string } {
  const match = IMPLEMENTATION_SUFFIX.exec(version);
  const suffix = match?.[1] ?? "";
  return { core: version.slice(0, version.length - suffix.length), suffix };
}

/**
 * Maps every known version spelling to the canonical version of its
 * compatibility class.
 *
 * Aliases are flat: each alias points straight at a canonical version, so a
 * lookup is a single map read. Spellings that were never registered get one
 * structural retry (see {@link VersionCanonicalizer.canonicalize}).
 */
export class VersionCanonicalizer {
  private readonly classes = new Map<string, string>();
  private readonly canonical = new Set<string>();
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  registerCanonical(version: string): this {
    this.assertMutable();
    assertVersionString(version);
    const existing = this.classes.get(version);
    if (existing !== undefined && existing !== version) {
      throw new CatalogError(`${version} is already an alias of ${existing}`);
    }
    this.classes.set(version, version);
    this.canonical.add(version);
    return this;
  }

  registerAlias(rawVersions: readonly string[], target: string): this {
    this.assertMutable();
    if (!this.canonical.has(target)) {
      throw new UnknownVersionError(target, "alias target is not a canonical version");
    }
    // Every spelling is checked before any is bound; a rejected list leaves no trace.
    const pending = new Set<string>();
    for (const raw of rawVersions) {
      assertVersionString(raw);
      if (raw === target) continue;
      const existing = this.classes.get(raw);
      if (existing === target) continue;
      if (existing !== undefined) {
        const detail = this.canonical.has(raw)
          ? `${raw} is canonical and cannot alias ${target}`
          : `${raw} already aliases ${existing}, not ${target}`;
        throw new CatalogError("conflicting version alias", [detail]);
      }
      pending.add(raw);
    }
    for (const raw of pending) {
      this.classes.set(raw, target);
    }
    emit({ kind: "AliasBound", target, count: pending.size });
    return this;
  }

  /**
   * Exact lookup first. Failing that, a trailing implementation suffix
   * ("pypy", "dropbox") is set aside, the numeric part is reduced to
   * `major.minor.micro` and then `major.minor`, and each reduction is looked
   * up with the suffix put back. "3.6.16" resolves through "3.6";
   * "3.8.99pypy" through "3.8pypy". Pre-release tags are dropped by the
   * reduction, so "3.11b1" lands in the class of "3.11".
   */
  canonicalize(version: string): string {
    const exact = this.classes.get(version);
    if (exact !== undefined) {
      return exact;
    }
    for (const candidate of this.structuralCandidates(version)) {
      const hit = this.classes.get(candidate);
      if (hit !== undefined) {
        return hit;
      }
    }
    throw new UnknownVersionError(version);
  }

  isCanonical(version: string): boolean {
    return this.canonical.has(version);
  }

  /** True when `version` was registered literally, as a canonical version or an alias. */
  isKnown(version: string): boolean {
    return this.classes.has(version);
  }

  allKnownVersions(): ReadonlySet<string> {
    return new Set(this.classes.keys());
  }

  canonicalVersions(): readonly string[] {
    return [...this.canonical];
  }

  aliasesOf(version: string): readonly string[] {
    const canonical = this.canonicalize(version);
    const out: string[] = [];
    for (const [raw, target] of this.classes) {
      if (target === canonical && raw !== canonical) {
        out.push(raw);
      }
    }
    return out;
  }

  /** "3.6.1" -> [3, 6, 1], "3.6rc1" -> [3, 6], "2.7pypy" -> [2, 7]. */
  versionTuple(version: string): VersionTuple {
    this.canonicalize(version);
    const { core } = splitSuffix(version);
    const micro = MICRO_TUPLE.exec(core);
    if (micro) {
      return [Number(micro[1]), Number(micro[2]), Number(micro[3])];
    }
    const minor = MINOR_TUPLE.exec(core);
    if (minor) {
      return [Number(minor[1]), Number(minor[2])];
    }
    throw new UnknownVersionError(version, "no numeric version components");
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  private structuralCandidates(version: string): string[] {
    const { core, suffix } = splitSuffix(version);
    const match = VERSION_SHAPE.exec(core);
    if (!match) {
      return [];
    }
    const [, major, minor, micro] = match;
    const candidates: string[] = [];
    if (micro !== undefined) {
      candidates.push(`${major}.${minor}.${micro}${suffix}`);
    }
    candidates.push(`${major}.${minor}${suffix}`);
    return candidates.filter((candidate) => candidate !== version);
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new RegistryFrozenError("VersionCanonicalizer");
    }
  }
}

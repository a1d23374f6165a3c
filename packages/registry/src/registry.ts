import { attempt, deepFreeze, UnknownVersionError, type Result } from "@pyc-atlas/core";
import type { InstructionSets, OpcodeTable } from "@pyc-atlas/opcodes";
import {
  formatMagic,
  magicToInt,
  toMagic,
  type MagicLike,
  type MagicRegistry,
  type RuntimeInfo,
  type VersionCanonicalizer,
  type VersionTuple,
} from "@pyc-atlas/versions";

export interface ResolvedVersion {
  readonly canonical: string;
  readonly magic: Uint8Array;
  readonly magicInt: number;
  readonly tuple: VersionTuple;
  /** Absent for versions the registry knows but has no opcode table for. */
  readonly opcodes?: OpcodeTable;
}

/**
 * The frozen result of a registry build. Consumers receive it by reference
 * and only ever read from it.
 */
export class PycRegistry {
  private readonly pypy3Magics: ReadonlySet<number>;

  constructor(
    readonly canonicalizer: VersionCanonicalizer,
    readonly magics: MagicRegistry,
    readonly instructionSets: InstructionSets,
    pypy3Magics: Iterable<number>,
  ) {
    this.pypy3Magics = new Set(pypy3Magics);
    Object.freeze(this);
  }

  canonicalize(version: string): string {
    return this.canonicalizer.canonicalize(version);
  }

  magicFor(version: string): Uint8Array {
    return this.magics.magicFor(version);
  }

  magicIntFor(version: string): number {
    return this.magics.magicIntFor(version);
  }

  versionsFor(magic: MagicLike): ReadonlySet<string> {
    return this.magics.versionsFor(magic);
  }

  versionForInt(magicInt: number): string {
    return this.magics.versionForInt(magicInt);
  }

  versionTupleForInt(magicInt: number): VersionTuple {
    return this.magics.versionTupleForInt(magicInt);
  }

  currentRuntimeMagic(runtime: RuntimeInfo): Uint8Array {
    return this.magics.currentRuntimeMagic(runtime);
  }

  opcodes(version: string): OpcodeTable {
    return this.instructionSets.table(this.canonicalize(version));
  }

  hasOpcodes(version: string): boolean {
    return this.instructionSets.has(version);
  }

  /** The table of the first version registered under `magic` that has one. */
  opcodesForMagic(magic: MagicLike): OpcodeTable {
    const versions = this.versionsFor(magic);
    for (const version of versions) {
      if (this.instructionSets.has(version)) {
        return this.instructionSets.table(version);
      }
    }
    throw new UnknownVersionError(
      [...versions].join(", "),
      `no opcode table for magic ${formatMagic(toMagic(magic))}`,
    );
  }

  isPyPy3Magic(magicInt: number): boolean {
    return this.pypy3Magics.has(magicInt);
  }

  /** Non-throwing lookup: unknown versions come back as a failure value. */
  resolve(version: string): Result<ResolvedVersion> {
    return attempt(() => {
      const canonical = this.canonicalize(version);
      const magic = this.magicFor(canonical);
      const resolved = deepFreeze({
        canonical,
        magic,
        magicInt: magicToInt(magic),
        tuple: this.canonicalizer.versionTuple(version),
      });
      return this.instructionSets.has(canonical)
        ? Object.freeze({ ...resolved, opcodes: this.instructionSets.table(canonical) })
        : resolved;
    });
  }
}

import { TableConsistencyError, UnknownOpcodeError } from "@pyc-atlas/core";

import { OPCODE_FLAGS, type OpcodeFlag } from "./flags.js";

export const OPCODE_SPACE = 256;

export interface OpcodeDefinition {
  readonly name: string;
  readonly code: number;
  readonly flags: readonly OpcodeFlag[];
  /** Alternate spelling of an opcode; excluded from `definedOps()`. */
  readonly alias: boolean;
}

/**
 * A published, immutable opcode table for one canonical version. Names and
 * codes are a bijection; a repeated name or code is a `TableConsistencyError`.
 */
export class OpcodeTable {
  readonly version: string;
  readonly parent: string | null;
  readonly haveArgument: number;
  readonly hasjrel: readonly number[];
  readonly hasjabs: readonly number[];
  readonly hasconst: readonly number[];
  readonly haslocal: readonly number[];
  readonly hasfree: readonly number[];
  readonly hasname: readonly number[];
  readonly hascompare: readonly number[];
  readonly noargs: readonly number[];

  private readonly byName: ReadonlyMap<string, OpcodeDefinition>;
  private readonly byCode: ReadonlyMap<number, OpcodeDefinition>;
  private readonly ordered: readonly OpcodeDefinition[];
  private readonly flagIndex: ReadonlyMap<OpcodeFlag, readonly number[]>;

  constructor(version: string, parent: string | null, definitions: Iterable<OpcodeDefinition>) {
    this.version = version;
    this.parent = parent;

    const ordered = [...definitions]
      .map((def) => Object.freeze({ ...def, flags: Object.freeze([...def.flags]) }))
      .sort((a, b) => a.code - b.code);
    const byName = new Map<string, OpcodeDefinition>();
    const byCode = new Map<number, OpcodeDefinition>();
    const flagIndex = new Map<OpcodeFlag, number[]>(OPCODE_FLAGS.map((flag) => [flag, []]));
    let haveArgument = OPCODE_SPACE;

    for (const def of ordered) {
      const holder = byCode.get(def.code);
      if (holder !== undefined) {
        throw new TableConsistencyError(version, -1, `code ${def.code} is already taken by ${holder.name}`);
      }
      const named = byName.get(def.name);
      if (named !== undefined) {
        throw new TableConsistencyError(version, -1, `${def.name} is already defined at code ${named.code}`);
      }
      byName.set(def.name, def);
      byCode.set(def.code, def);
      for (const flag of def.flags) {
        flagIndex.get(flag)?.push(def.code);
      }
      if (!def.flags.includes("noarg") && def.code < haveArgument) {
        haveArgument = def.code;
      }
    }

    const codesFor = (flag: OpcodeFlag): readonly number[] => Object.freeze(flagIndex.get(flag) ?? []);
    this.ordered = Object.freeze(ordered);
    this.byName = byName;
    this.byCode = byCode;
    this.flagIndex = new Map<OpcodeFlag, readonly number[]>(OPCODE_FLAGS.map((flag) => [flag, codesFor(flag)]));
    this.haveArgument = haveArgument;
    this.hasjrel = codesFor("jrel");
    this.hasjabs = codesFor("jabs");
    this.hasconst = codesFor("const");
    this.haslocal = codesFor("local");
    this.hasfree = codesFor("free");
    this.hasname = codesFor("name");
    this.hascompare = codesFor("compare");
    this.noargs = codesFor("noarg");
    Object.freeze(this);
  }

  get size(): number {
    return this.ordered.length;
  }

  codeOf(name: string): number {
    return this.definition(name).code;
  }

  nameOf(code: number): string {
    return this.definition(code).name;
  }

  flagsOf(code: number): ReadonlySet<OpcodeFlag> {
    return new Set(this.definition(code).flags);
  }

  definition(opcode: string | number): OpcodeDefinition {
    const def = typeof opcode === "number" ? this.byCode.get(opcode) : this.byName.get(opcode);
    if (def === undefined) {
      throw new UnknownOpcodeError(this.version, opcode);
    }
    return def;
  }

  hasName(name: string): boolean {
    return this.byName.has(name);
  }

  hasCode(code: number): boolean {
    return this.byCode.has(code);
  }

  definitions(): readonly OpcodeDefinition[] {
    return this.ordered;
  }

  opmap(): Readonly<Record<string, number>> {
    const out: Record<string, number> = {};
    for (const def of this.ordered) {
      out[def.name] = def.code;
    }
    return Object.freeze(out);
  }

  opnames(): readonly string[] {
    const out: string[] = [];
    for (let code = 0; code < OPCODE_SPACE; code += 1) {
      out.push(this.byCode.get(code)?.name ?? `<${code}>`);
    }
    return Object.freeze(out);
  }

  /** Opcode names as identifiers: "SLICE+1" becomes "SLICE_1". */
  identifierMap(): Readonly<Record<string, number>> {
    const out: Record<string, number> = {};
    for (const def of this.ordered) {
      out[def.name.replace(/\+/g, "_")] = def.code;
    }
    return Object.freeze(out);
  }

  withFlag(flag: OpcodeFlag): readonly number[] {
    return this.flagIndex.get(flag) ?? [];
  }

  jumpOps(): readonly string[] {
    return this.ordered
      .filter((def) => def.flags.includes("jrel") || def.flags.includes("jabs"))
      .map((def) => def.name);
  }

  definedOps(): readonly string[] {
    return this.ordered.filter((def) => !def.alias).map((def) => def.name);
  }
}

import {
  RegistryFrozenError,
  TableConsistencyError,
  UnknownVersionError,
  emit,
  isRegistryError,
} from "@pyc-atlas/core";
import type { VersionCanonicalizer } from "@pyc-atlas/versions";

import { describeEdit, type EditOperation, type OpcodeSpec } from "./edits.js";
import { isOpcodeFlag, sortFlags, type OpcodeFlag } from "./flags.js";
import { OPCODE_SPACE, OpcodeTable, type OpcodeDefinition } from "./table.js";

/** Read-only view over every published table. */
export interface InstructionSets {
  has(version: string): boolean;
  versions(): readonly string[];
  table(version: string): OpcodeTable;
  lookup(version: string, name: string): number;
  lookup(version: string, code: number): string;
  classify(version: string, code: number): ReadonlySet<OpcodeFlag>;
}

export interface InstructionSetBuilderOptions {
  /** When set, every version argument is canonicalized before use. */
  canonicalizer?: VersionCanonicalizer;
}

const prefix = (edit: EditOperation | undefined): string => (edit ? `${describeEdit(edit)}: ` : "");

/**
 * Mutable name/code maps for one table under construction. Every mutation
 * checks the bijection and reports the offending edit by position.
 */
class WorkingTable {
  private readonly byName = new Map<string, OpcodeDefinition>();
  private readonly byCode = new Map<number, OpcodeDefinition>();

  constructor(private readonly version: string) {}

  insert(spec: OpcodeSpec, alias: boolean, index: number, edit?: EditOperation): void {
    const def = this.normalize(spec, alias, index);
    const named = this.byName.get(def.name);
    if (named !== undefined) {
      this.fail(index, `${prefix(edit)}${def.name} is already defined at code ${named.code}`);
    }
    this.claimCode(def, index, edit);
  }

  apply(edit: EditOperation, index: number): void {
    switch (edit.op) {
      case "define":
      case "alias":
        this.insert(edit, edit.op === "alias", index, edit);
        return;
      case "remove": {
        const def = this.byName.get(edit.name);
        if (def === undefined) {
          this.fail(index, `${prefix(edit)}${edit.name} is not defined`);
        }
        if (def.code !== edit.code) {
          this.fail(index, `${prefix(edit)}${edit.name} is at code ${def.code}, not ${edit.code}`);
        }
        this.byName.delete(def.name);
        this.byCode.delete(def.code);
        return;
      }
      case "redefine": {
        const current = this.byName.get(edit.name);
        if (current === undefined) {
          this.fail(index, `${prefix(edit)}${edit.name} is not defined`);
        }
        const def = this.normalize(edit, current.alias, index);
        this.byName.delete(current.name);
        this.byCode.delete(current.code);
        this.claimCode(def, index, edit);
        return;
      }
      default: {
        const unknown: never = edit;
        this.fail(index, `unsupported edit ${JSON.stringify(unknown)}`);
      }
    }
  }

  definitions(): IterableIterator<OpcodeDefinition> {
    return this.byName.values();
  }

  private claimCode(def: OpcodeDefinition, index: number, edit?: EditOperation): void {
    const holder = this.byCode.get(def.code);
    if (holder !== undefined) {
      this.fail(index, `${prefix(edit)}code ${def.code} is already taken by ${holder.name}`);
    }
    this.byName.set(def.name, def);
    this.byCode.set(def.code, def);
  }

  private normalize(spec: OpcodeSpec, alias: boolean, index: number): OpcodeDefinition {
    if (spec.name.length === 0 || /\s/.test(spec.name)) {
      this.fail(index, `invalid opcode name ${JSON.stringify(spec.name)}`);
    }
    if (!Number.isInteger(spec.code) || spec.code < 0 || spec.code >= OPCODE_SPACE) {
      this.fail(index, `opcode code ${spec.code} for ${spec.name} is outside 0..${OPCODE_SPACE - 1}`);
    }
    const flags = spec.flags ?? [];
    for (const flag of flags) {
      if (!isOpcodeFlag(flag)) {
        this.fail(index, `unknown flag ${JSON.stringify(flag)} on ${spec.name}`);
      }
    }
    return { name: spec.name, code: spec.code, flags: sortFlags(flags), alias };
  }

  private fail(index: number, reason: string): never {
    throw new TableConsistencyError(this.version, index, reason);
  }
}

interface Replay {
  parent: string | null;
  working: WorkingTable;
}

/**
 * Builds opcode tables during the registry build phase. A derived table is
 * the parent's definitions replayed through an ordered edit list; parents
 * are never modified, and a table that fails any edit is not published.
 */
export class InstructionSetBuilder implements InstructionSets {
  private readonly tables = new Map<string, OpcodeTable>();
  private readonly canonicalizer: VersionCanonicalizer | undefined;
  private frozen = false;

  constructor(options: InstructionSetBuilderOptions = {}) {
    this.canonicalizer = options.canonicalizer;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  defineRoot(version: string, opcodes: readonly OpcodeSpec[]): OpcodeTable {
    return this.publish(version, 0, (key) => {
      const working = new WorkingTable(key);
      opcodes.forEach((spec) => working.insert(spec, false, -1));
      return { parent: null, working };
    });
  }

  defineTable(version: string, parentVersion: string, edits: readonly EditOperation[]): OpcodeTable {
    return this.publish(version, edits.length, (key) => {
      const parent = this.table(parentVersion);
      const working = new WorkingTable(key);
      for (const def of parent.definitions()) {
        working.insert(def, def.alias, -1);
      }
      edits.forEach((edit, index) => working.apply(edit, index));
      return { parent: parent.version, working };
    });
  }

  has(version: string): boolean {
    try {
      this.table(version);
      return true;
    } catch (err) {
      if (err instanceof UnknownVersionError) return false;
      throw err;
    }
  }

  versions(): readonly string[] {
    return [...this.tables.keys()];
  }

  table(version: string): OpcodeTable {
    const key = this.canonicalizer ? this.canonicalizer.canonicalize(version) : version;
    const table = this.tables.get(key);
    if (table === undefined) {
      throw new UnknownVersionError(version, "no opcode table published");
    }
    return table;
  }

  lookup(version: string, name: string): number;
  lookup(version: string, code: number): string;
  lookup(version: string, opcode: string | number): number | string {
    const table = this.table(version);
    return typeof opcode === "number" ? table.nameOf(opcode) : table.codeOf(opcode);
  }

  classify(version: string, code: number): ReadonlySet<OpcodeFlag> {
    return this.table(version).flagsOf(code);
  }

  freeze(): InstructionSets {
    this.frozen = true;
    return this;
  }

  private prepare(version: string): string {
    if (this.frozen) {
      throw new RegistryFrozenError("InstructionSetBuilder");
    }
    const key = this.canonicalizer ? this.canonicalizer.canonicalize(version) : version;
    if (this.tables.has(key)) {
      throw new TableConsistencyError(key, -1, "a table is already published for this version");
    }
    return key;
  }

  /**
   * Every failure between the version check and publication, parent lookup
   * included, is reported as TableRejected before it propagates.
   */
  private publish(version: string, edits: number, replay: (key: string) => Replay): OpcodeTable {
    let key = version;
    let replayed: Replay;
    try {
      key = this.prepare(version);
      replayed = replay(key);
    } catch (err) {
      if (isRegistryError(err)) {
        emit({ kind: "TableRejected", version: key, code: err.code, reason: err.message });
      }
      throw err;
    }
    const { parent, working } = replayed;
    const table = new OpcodeTable(key, parent, working.definitions());
    this.tables.set(key, table);
    emit({ kind: "TablePublished", version: key, parent, size: table.size, edits });
    return table;
  }
}

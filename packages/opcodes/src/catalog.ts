import { readFileSync } from "node:fs";

import { CatalogError, createValidator, deepFreeze } from "@pyc-atlas/core";
import type { SchemaObject } from "ajv";

import { InstructionSetBuilder } from "./builder.js";
import type { EditOperation, OpcodeSpec } from "./edits.js";
import { OPCODE_FLAGS } from "./flags.js";

export interface RootTableEntry {
  version: string;
  opcodes: OpcodeSpec[];
}

export interface DerivedTableEntry {
  version: string;
  parent: string;
  edits: EditOperation[];
}

export type TableEntry = RootTableEntry | DerivedTableEntry;

export interface InstructionCatalog {
  tables: TableEntry[];
}

export const isRootEntry = (entry: TableEntry): entry is RootTableEntry => "opcodes" in entry;

const versionString = { type: "string", minLength: 1, pattern: "^\\S+$" };
const opcodeName = { type: "string", minLength: 1, pattern: "^\\S+$" };
const opcodeCode = { type: "integer", minimum: 0, maximum: 255 };
const flagList = { type: "array", items: { enum: [...OPCODE_FLAGS] }, uniqueItems: true };

const opcodeSpec = {
  type: "object",
  additionalProperties: false,
  required: ["name", "code"],
  properties: { name: opcodeName, code: opcodeCode, flags: flagList },
};

const editOperation = {
  oneOf: [
    {
      type: "object",
      additionalProperties: false,
      required: ["op", "name", "code"],
      properties: {
        op: { enum: ["define", "alias", "redefine"] },
        name: opcodeName,
        code: opcodeCode,
        flags: flagList,
      },
    },
    {
      type: "object",
      additionalProperties: false,
      required: ["op", "name", "code"],
      properties: { op: { const: "remove" }, name: opcodeName, code: opcodeCode },
    },
  ],
};

export const instructionCatalogSchema: SchemaObject = {
  $id: "https://pyc-atlas.dev/schema/instruction-catalog.json",
  type: "object",
  additionalProperties: false,
  required: ["tables"],
  properties: {
    tables: {
      type: "array",
      items: {
        oneOf: [
          {
            type: "object",
            additionalProperties: false,
            required: ["version", "opcodes"],
            properties: { version: versionString, opcodes: { type: "array", items: opcodeSpec } },
          },
          {
            type: "object",
            additionalProperties: false,
            required: ["version", "parent", "edits"],
            properties: {
              version: versionString,
              parent: versionString,
              edits: { type: "array", items: editOperation },
            },
          },
        ],
      },
    },
  },
};

export const parseInstructionCatalog = createValidator<InstructionCatalog>(
  instructionCatalogSchema,
  "Instruction catalog",
);

const DEFAULT_CATALOG_URL = new URL("../data/instruction-sets.json", import.meta.url);

let defaultCatalog: InstructionCatalog | undefined;

/** The shipped catalog, parsed once and deep-frozen; every caller gets the same object. */
export function loadInstructionCatalog(): InstructionCatalog {
  if (defaultCatalog === undefined) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_CATALOG_URL, "utf-8"));
    defaultCatalog = deepFreeze(parseInstructionCatalog(raw));
  }
  return defaultCatalog;
}

/**
 * Stable topological order of the derivation forest: each table comes after
 * its parent, and otherwise keeps its catalog position.
 */
export function orderTables(catalog: InstructionCatalog): TableEntry[] {
  const declared = new Set<string>();
  const duplicates: string[] = [];
  for (const entry of catalog.tables) {
    if (declared.has(entry.version)) duplicates.push(entry.version);
    declared.add(entry.version);
  }
  if (duplicates.length > 0) {
    throw new CatalogError("duplicate table versions", duplicates);
  }

  const orphans = catalog.tables
    .filter((entry): entry is DerivedTableEntry => !isRootEntry(entry) && !declared.has(entry.parent))
    .map((entry) => `${entry.version} derives from unknown parent ${entry.parent}`);
  if (orphans.length > 0) {
    throw new CatalogError("unknown parent tables", orphans);
  }

  const placed = new Set<string>();
  const ordered: TableEntry[] = [];
  let pending = [...catalog.tables];
  while (pending.length > 0) {
    const ready = pending.filter((entry) => isRootEntry(entry) || placed.has(entry.parent));
    if (ready.length === 0) {
      throw new CatalogError("cyclic table derivation", pending.map((entry) => entry.version));
    }
    // Earliest ready entry first.
    const next = ready[0];
    ordered.push(next);
    placed.add(next.version);
    pending = pending.filter((entry) => entry !== next);
  }
  return ordered;
}

/** Publishes every table of `catalog` into `builder` in derivation order. */
export function populateInstructionSets(
  catalog: InstructionCatalog,
  builder: InstructionSetBuilder = new InstructionSetBuilder(),
): InstructionSetBuilder {
  for (const entry of orderTables(catalog)) {
    if (isRootEntry(entry)) {
      builder.defineRoot(entry.version, entry.opcodes);
    } else {
      builder.defineTable(entry.version, entry.parent, entry.edits);
    }
  }
  return builder;
}

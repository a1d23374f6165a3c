import { TableConsistencyError, UnknownOpcodeError } from "@pyc-atlas/core";
import { describe, expect, it } from "vitest";

import { InstructionSetBuilder, OpcodeTable } from "../src/index.js";

function sampleTable(): OpcodeTable {
  return new InstructionSetBuilder().defineRoot("R", [
    { name: "LOAD_FAST", code: 124, flags: ["local"] },
    { name: "STOP_CODE", code: 0, flags: ["noarg"] },
    { name: "POP_TOP", code: 1, flags: ["noarg"] },
    { name: "SLICE+1", code: 31, flags: ["noarg"] },
    { name: "LOAD_CONST", code: 100, flags: ["const"] },
    { name: "LOAD_NAME", code: 101, flags: ["name"] },
    { name: "COMPARE_OP", code: 107, flags: ["compare"] },
    { name: "JUMP_FORWARD", code: 110, flags: ["jrel"] },
    { name: "JUMP_ABSOLUTE", code: 113, flags: ["name", "jabs"] },
    { name: "LOAD_DEREF", code: 136, flags: ["free"] },
  ]);
}

describe("OpcodeTable", () => {
  it("answers lookups both ways", () => {
    const table = sampleTable();
    expect(table.version).toBe("R");
    expect(table.parent).toBeNull();
    expect(table.size).toBe(10);
    expect(table.codeOf("LOAD_CONST")).toBe(100);
    expect(table.nameOf(136)).toBe("LOAD_DEREF");
    expect(table.hasName("SLICE+1")).toBe(true);
    expect(table.hasCode(2)).toBe(false);
  });

  it("raises UnknownOpcodeError for missing names and codes", () => {
    const table = sampleTable();
    expect(() => table.nameOf(2)).toThrow(UnknownOpcodeError);
    expect(() => table.nameOf(2)).toThrow("opcode code 2 is not defined in R");
    expect(() => table.codeOf("NOP")).toThrow("opcode name NOP is not defined in R");
  });

  it("lists definitions by ascending code", () => {
    const codes = sampleTable()
      .definitions()
      .map((def) => def.code);
    expect(codes).toEqual([0, 1, 31, 100, 101, 107, 110, 113, 124, 136]);
  });

  it("reports flags in a fixed order", () => {
    const table = sampleTable();
    expect(table.definition("JUMP_ABSOLUTE").flags).toEqual(["jabs", "name"]);
    expect(table.flagsOf(113)).toEqual(new Set(["jabs", "name"]));
  });

  it("derives the category sets", () => {
    const table = sampleTable();
    expect(table.hasjrel).toEqual([110]);
    expect(table.hasjabs).toEqual([113]);
    expect(table.hasconst).toEqual([100]);
    expect(table.haslocal).toEqual([124]);
    expect(table.hasfree).toEqual([136]);
    expect(table.hasname).toEqual([101, 113]);
    expect(table.hascompare).toEqual([107]);
    expect(table.noargs).toEqual([0, 1, 31]);
    expect(table.withFlag("noarg")).toEqual([0, 1, 31]);
    expect(table.jumpOps()).toEqual(["JUMP_FORWARD", "JUMP_ABSOLUTE"]);
  });

  it("finds the first code that takes an argument", () => {
    expect(sampleTable().haveArgument).toBe(100);
    const argless = new InstructionSetBuilder().defineRoot("N", [{ name: "NOP", code: 9, flags: ["noarg"] }]);
    expect(argless.haveArgument).toBe(256);
  });

  it("spells all 256 codes in opnames", () => {
    const names = sampleTable().opnames();
    expect(names).toHaveLength(256);
    expect(names[0]).toBe("STOP_CODE");
    expect(names[2]).toBe("<2>");
    expect(names[255]).toBe("<255>");
  });

  it("maps names to codes", () => {
    const opmap = sampleTable().opmap();
    expect(opmap["SLICE+1"]).toBe(31);
    expect(Object.keys(opmap)).toHaveLength(10);
  });

  it("spells names as identifiers", () => {
    const identifiers = sampleTable().identifierMap();
    expect(identifiers.SLICE_1).toBe(31);
    expect("SLICE+1" in identifiers).toBe(false);
    expect(identifiers.LOAD_FAST).toBe(124);
  });

  it("refuses definitions that are not a bijection", () => {
    const sharedCode = [
      { name: "A", code: 1, flags: [], alias: false },
      { name: "B", code: 1, flags: [], alias: false },
    ];
    expect(() => new OpcodeTable("R", null, sharedCode)).toThrow(TableConsistencyError);
    expect(() => new OpcodeTable("R", null, sharedCode)).toThrow(
      "inconsistent opcode table for R: code 1 is already taken by A",
    );

    const sharedName = [
      { name: "A", code: 2, flags: [], alias: false },
      { name: "A", code: 1, flags: [], alias: false },
    ];
    expect(() => new OpcodeTable("R", null, sharedName)).toThrow(
      "inconsistent opcode table for R: A is already defined at code 1",
    );
  });

  it("is immutable", () => {
    const table = sampleTable();
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.opmap())).toBe(true);
    expect(Object.isFrozen(table.definitions())).toBe(true);
    expect(Object.isFrozen(table.definition(0))).toBe(true);
    expect(Object.isFrozen(table.hasjrel)).toBe(true);
  });
});

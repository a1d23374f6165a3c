import type { OpcodeFlag } from "./flags.js";

export interface OpcodeSpec {
  readonly name: string;
  readonly code: number;
  readonly flags?: readonly OpcodeFlag[];
}

export interface DefineEdit extends OpcodeSpec {
  readonly op: "define";
}

/** Like define, but the opcode is an alternate spelling left out of `definedOps()`. */
export interface AliasEdit extends OpcodeSpec {
  readonly op: "alias";
}

/** Moves an existing name to another code or changes its flags. */
export interface RedefineEdit extends OpcodeSpec {
  readonly op: "redefine";
}

export interface RemoveEdit {
  readonly op: "remove";
  readonly name: string;
  readonly code: number;
}

export type EditOperation = DefineEdit | AliasEdit | RedefineEdit | RemoveEdit;

export const define = (name: string, code: number, flags: readonly OpcodeFlag[] = []): DefineEdit => ({
  op: "define",
  name,
  code,
  flags,
});

export const alias = (name: string, code: number, flags: readonly OpcodeFlag[] = []): AliasEdit => ({
  op: "alias",
  name,
  code,
  flags,
});

export const redefine = (name: string, code: number, flags: readonly OpcodeFlag[] = []): RedefineEdit => ({
  op: "redefine",
  name,
  code,
  flags,
});

export const remove = (name: string, code: number): RemoveEdit => ({ op: "remove", name, code });

export function describeEdit(edit: EditOperation): string {
  return `${edit.op}(${edit.name}, ${edit.code})`;
}

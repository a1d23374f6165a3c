/**
 * Operand categories an opcode can carry. The order here is the order flags
 * are reported in, whatever order a catalog lists them.
 */
export const OPCODE_FLAGS = [
  "jrel",
  "jabs",
  "const",
  "local",
  "free",
  "name",
  "compare",
  "noarg",
] as const;

export type OpcodeFlag = (typeof OPCODE_FLAGS)[number];

const FLAG_SET: ReadonlySet<string> = new Set(OPCODE_FLAGS);

export function isOpcodeFlag(value: string): value is OpcodeFlag {
  return FLAG_SET.has(value);
}

export function sortFlags(flags: Iterable<OpcodeFlag>): OpcodeFlag[] {
  const present = new Set(flags);
  return OPCODE_FLAGS.filter((flag) => present.has(flag));
}

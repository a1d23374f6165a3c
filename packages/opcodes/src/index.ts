export { OPCODE_FLAGS, isOpcodeFlag, sortFlags } from "./flags.js";
export type { OpcodeFlag } from "./flags.js";
export { alias, define, describeEdit, redefine, remove } from "./edits.js";
export type {
  AliasEdit,
  DefineEdit,
  EditOperation,
  OpcodeSpec,
  RedefineEdit,
  RemoveEdit,
} from "./edits.js";
export { OPCODE_SPACE, OpcodeTable } from "./table.js";
export type { OpcodeDefinition } from "./table.js";
export { InstructionSetBuilder } from "./builder.js";
export type { InstructionSetBuilderOptions, InstructionSets } from "./builder.js";
export {
  instructionCatalogSchema,
  isRootEntry,
  loadInstructionCatalog,
  orderTables,
  parseInstructionCatalog,
  populateInstructionSets,
} from "./catalog.js";
export type {
  DerivedTableEntry,
  InstructionCatalog,
  RootTableEntry,
  TableEntry,
} from "./catalog.js";

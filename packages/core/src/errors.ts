export type RegistryErrorCode =
  | "E_UNKNOWN_VERSION"
  | "E_UNKNOWN_MAGIC"
  | "E_UNRESOLVED_RUNTIME"
  | "E_UNKNOWN_OPCODE"
  | "E_TABLE_CONSISTENCY"
  | "E_CATALOG"
  | "E_MAGIC_FORMAT"
  | "E_REGISTRY_FROZEN";

/**
 * Base class for every failure raised while building or querying the
 * registry. `code` is stable and safe to branch on; `message` is not.
 */
export abstract class RegistryError extends Error {
  abstract readonly code: RegistryErrorCode;
}

export class UnknownVersionError extends RegistryError {
  readonly code = "E_UNKNOWN_VERSION" as const;
  readonly version: string;

  constructor(version: string, detail?: string) {
    super(detail ? `unknown version ${version}: ${detail}` : `unknown version ${version}`);
    this.name = "UnknownVersionError";
    this.version = version;
  }
}

export class UnknownMagicError extends RegistryError {
  readonly code = "E_UNKNOWN_MAGIC" as const;
  readonly magic: string;

  constructor(magic: string) {
    super(`no version registered for magic ${magic}`);
    this.name = "UnknownMagicError";
    this.magic = magic;
  }
}

export class UnresolvedRuntimeError extends RegistryError {
  readonly code = "E_UNRESOLVED_RUNTIME" as const;
  readonly version: string;

  constructor(version: string, cause: unknown) {
    super(`cannot resolve a bytecode magic for runtime ${version}`, { cause });
    this.name = "UnresolvedRuntimeError";
    this.version = version;
  }
}

export class UnknownOpcodeError extends RegistryError {
  readonly code = "E_UNKNOWN_OPCODE" as const;
  readonly version: string;
  readonly opcode: string | number;

  constructor(version: string, opcode: string | number) {
    const label = typeof opcode === "number" ? `code ${opcode}` : `name ${opcode}`;
    super(`opcode ${label} is not defined in ${version}`);
    this.name = "UnknownOpcodeError";
    this.version = version;
    this.opcode = opcode;
  }
}

export class TableConsistencyError extends RegistryError {
  readonly code = "E_TABLE_CONSISTENCY" as const;
  readonly version: string;
  /** Position of the offending edit, or -1 for root catalogs and table-level problems. */
  readonly editIndex: number;
  readonly reason: string;

  constructor(version: string, editIndex: number, reason: string) {
    const where = editIndex >= 0 ? ` (edit #${editIndex})` : "";
    super(`inconsistent opcode table for ${version}${where}: ${reason}`);
    this.name = "TableConsistencyError";
    this.version = version;
    this.editIndex = editIndex;
    this.reason = reason;
  }
}

export class CatalogError extends RegistryError {
  readonly code = "E_CATALOG" as const;
  readonly details: readonly string[];

  constructor(message: string, details: readonly string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join(", ")}` : message);
    this.name = "CatalogError";
    this.details = details;
  }
}

export class MagicFormatError extends RegistryError {
  readonly code = "E_MAGIC_FORMAT" as const;

  constructor(message: string) {
    super(message);
    this.name = "MagicFormatError";
  }
}

export class RegistryFrozenError extends RegistryError {
  readonly code = "E_REGISTRY_FROZEN" as const;

  constructor(component: string) {
    super(`${component} is frozen; registrations are only accepted during the build phase`);
    this.name = "RegistryFrozenError";
  }
}

export const isRegistryError = (value: unknown): value is RegistryError =>
  value instanceof RegistryError;

export {
  CatalogError,
  MagicFormatError,
  RegistryError,
  RegistryFrozenError,
  TableConsistencyError,
  UnknownMagicError,
  UnknownOpcodeError,
  UnknownVersionError,
  UnresolvedRuntimeError,
  isRegistryError,
} from "./errors.js";
export type { RegistryErrorCode } from "./errors.js";
export { attempt, failure, formatFailure, isOk, mapValue, ok } from "./result.js";
export type { Result, ResultError, ResultFailure, ResultOk } from "./result.js";
export { deepFreeze } from "./freeze.js";
export { createValidator } from "./schema.js";
export type { CatalogValidator } from "./schema.js";
export {
  TRACE_FLAG,
  TRACE_STDOUT_FLAG,
  resetEnvCacheForTests,
  traceEnabled,
  traceToStdout,
} from "./env.js";
export { emit, take } from "./trace.js";
export type {
  AliasBound,
  MagicRegistered,
  RegistryBuilt,
  TablePublished,
  TableRejected,
  TraceEvent,
} from "./trace.js";

import { emit } from "@pyc-atlas/core";
import {
  InstructionSetBuilder,
  loadInstructionCatalog,
  parseInstructionCatalog,
  populateInstructionSets,
  type InstructionCatalog,
} from "@pyc-atlas/opcodes";
import {
  loadVersionCatalog,
  parseVersionCatalog,
  populateVersions,
  type VersionCatalog,
} from "@pyc-atlas/versions";

import { PycRegistry } from "./registry.js";

export interface RegistryOptions {
  /** Replaces the shipped version catalog; validated before use. */
  versionCatalog?: VersionCatalog;
  /** Replaces the shipped instruction catalog; validated before use. */
  instructionCatalog?: InstructionCatalog;
}

/**
 * Runs the whole build phase: versions and magics, then opcode tables keyed
 * by canonical version. Any error aborts the build and nothing is returned.
 */
export function buildRegistry(options: RegistryOptions = {}): PycRegistry {
  const versionCatalog = options.versionCatalog
    ? parseVersionCatalog(options.versionCatalog)
    : loadVersionCatalog();
  const instructionCatalog = options.instructionCatalog
    ? parseInstructionCatalog(options.instructionCatalog)
    : loadInstructionCatalog();

  const { canonicalizer, magics } = populateVersions(versionCatalog);
  canonicalizer.freeze();
  magics.freeze();

  const builder = populateInstructionSets(instructionCatalog, new InstructionSetBuilder({ canonicalizer }));
  const instructionSets = builder.freeze();

  emit({
    kind: "RegistryBuilt",
    versions: canonicalizer.canonicalVersions().length,
    magics: magics.size,
    tables: instructionSets.versions().length,
  });
  return new PycRegistry(canonicalizer, magics, instructionSets, versionCatalog.pypy3Magics);
}

let cached: PycRegistry | undefined;

/** Builds the registry from the shipped catalogs on first use. */
export function defaultRegistry(): PycRegistry {
  if (cached === undefined) {
    cached = buildRegistry();
  }
  return cached;
}

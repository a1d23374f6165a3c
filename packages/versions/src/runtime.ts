export type ReleaseLevel = "alpha" | "beta" | "candidate" | "final";

/** Version details of the interpreter that produced (or will read) bytecode. */
export interface RuntimeInfo {
  readonly version: readonly number[];
  readonly releaseLevel: ReleaseLevel;
  readonly serial?: number;
  readonly implementation?: string;
}

const IMPLEMENTATION_SUFFIXES: Readonly<Record<string, string>> = Object.freeze({
  cpython: "",
  pypy: "pypy",
  jython: "Jython",
  pyston: "Pyston",
  graalpy: "Graal",
  graalvm: "Graal",
});

export function implementationSuffix(implementation: string | undefined): string {
  if (implementation === undefined || implementation.length === 0) {
    return "";
  }
  return IMPLEMENTATION_SUFFIXES[implementation.toLowerCase()] ?? implementation;
}

/**
 * Spells runtime info the way the version catalog does:
 * `{ version: [3, 7, 0], releaseLevel: "alpha", serial: 3 }` -> "3.7.0alpha3",
 * `{ version: [2, 7, 18], releaseLevel: "final", implementation: "PyPy" }` -> "2.7.18pypy".
 */
export function runtimeVersionString(runtime: RuntimeInfo): string {
  let spelled = runtime.version.slice(0, 3).join(".");
  if (runtime.releaseLevel !== "final") {
    spelled += `${runtime.releaseLevel}${runtime.serial ?? 0}`;
  }
  return spelled + implementationSuffix(runtime.implementation);
}

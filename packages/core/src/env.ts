// Environment flags, read once and cached for the life of the process.
export const TRACE_FLAG = "PYC_ATLAS_TRACE";
export const TRACE_STDOUT_FLAG = "PYC_ATLAS_TRACE_STDOUT";

const cache = new Map<string, boolean>();

function readFlag(name: string): boolean {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }
  const raw = (process.env[name] ?? "").toLowerCase();
  const enabled = raw === "1" || raw === "true";
  cache.set(name, enabled);
  return enabled;
}

export function traceEnabled(): boolean {
  return readFlag(TRACE_FLAG);
}

export function traceToStdout(): boolean {
  return readFlag(TRACE_STDOUT_FLAG);
}

// For tests only: forget cached flags so the next read sees process.env again.
export function resetEnvCacheForTests(): void {
  cache.clear();
}

import { traceEnabled, traceToStdout } from "./env.js";

export interface MagicRegistered {
  kind: "MagicRegistered";
  magic: number;
  version: string;
  shared: boolean;
}

export interface AliasBound {
  kind: "AliasBound";
  target: string;
  count: number;
}

export interface TablePublished {
  kind: "TablePublished";
  version: string;
  parent: string | null;
  size: number;
  edits: number;
}

export interface TableRejected {
  kind: "TableRejected";
  version: string;
  code: string;
  reason: string;
}

export interface RegistryBuilt {
  kind: "RegistryBuilt";
  versions: number;
  magics: number;
  tables: number;
}

export type TraceEvent =
  | MagicRegistered
  | AliasBound
  | TablePublished
  | TableRejected
  | RegistryBuilt;

const events: TraceEvent[] = [];

export function emit(event: TraceEvent): void {
  if (!traceEnabled()) return;
  if (traceToStdout()) {
    process.stdout.write(`${JSON.stringify({ ts: Date.now(), event })}\n`);
  }
  events.push({ ...event });
}

export function take(): TraceEvent[] {
  return events.splice(0, events.length);
}

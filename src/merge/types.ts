import type { DeathRecord } from "../deaths/types.js";
import type { AllocationRecord, Diagnostic, PassthroughLine, RecordLine } from "../trace/types.js";

export type AllocationLink =
  | { kind: "allocated"; allocation: AllocationRecord }
  | { kind: "phantom" };

export type AllocationTable = Map<string, AllocationRecord>;

export interface TraceEntry {
  kind: "trace";
  line: RecordLine | PassthroughLine;
}

export interface DeathEntry {
  kind: "death";
  death: DeathRecord;
  link: AllocationLink;
  // position of the trace record the death follows; undefined when appended at the end
  anchor: number | undefined;
}

export type MergedEntry = TraceEntry | DeathEntry;

export interface MergeResult {
  entries: MergedEntry[];
  diagnostics: Diagnostic[];
}

import { buildTimeToLastPosition } from "../clock/logicalClock.js";
import type { LogicalClockMap } from "../clock/logicalClock.js";
import type { DeathRecord } from "../deaths/types.js";
import type { Diagnostic, TraceLine } from "../trace/types.js";
import { isAllocation } from "../trace/types.js";
import type { AllocationLink, AllocationTable, DeathEntry, MergedEntry, MergeResult } from "./types.js";

export interface MergeInput {
  // trace lines without inline deaths; malformed lines are dropped from the output
  lines: TraceLine[];
  clock: LogicalClockMap;
  deaths: DeathRecord[];
  allocations: AllocationTable;
}

/** Latest allocation of each object id wins. */
export function buildAllocationTable(lines: TraceLine[]): AllocationTable {
  const table: AllocationTable = new Map();
  lines.forEach((line) => {
    if (line.kind === "record" && isAllocation(line.record)) {
      table.set(line.record.objectId, line.record);
    }
  });
  return table;
}

export const compareDeaths = (a: DeathRecord, b: DeathRecord): number =>
  a.timestamp - b.timestamp || a.sequence - b.sequence;

export function linkAllocation(
  death: DeathRecord,
  allocations: AllocationTable,
  diagnostics: Diagnostic[]
): AllocationLink {
  const allocation = allocations.get(death.objectId);
  if (allocation) {
    return { kind: "allocated", allocation };
  }
  diagnostics.push({
    kind: "unmatched-death",
    message: `Death at time ${death.timestamp} references unknown object ${death.objectId}; keeping it as a phantom`
  });
  return { kind: "phantom" };
}

/**
 * Interleaves deaths into the trace: a death at time T follows the last record
 * whose position maps to T. Deaths at a time no record carries go to the end.
 */
export function mergeDeaths(input: MergeInput): MergeResult {
  const { lines, clock, allocations } = input;
  const diagnostics: Diagnostic[] = [];
  const timeToLastPosition = buildTimeToLastPosition(clock);

  const groups = new Map<number, DeathEntry[]>();
  const orphans: DeathEntry[] = [];

  [...input.deaths].sort(compareDeaths).forEach((death) => {
    const link = linkAllocation(death, allocations, diagnostics);
    const anchor = timeToLastPosition.get(death.timestamp);
    if (anchor === undefined) {
      diagnostics.push({
        kind: "orphan-timestamp",
        message: `Death of object ${death.objectId} at time ${death.timestamp} has no trace position (max time ${clock.maxTime}); appending at end`
      });
      orphans.push({ kind: "death", death, link, anchor: undefined });
      return;
    }
    const group = groups.get(anchor);
    const entry: DeathEntry = { kind: "death", death, link, anchor };
    if (group !== undefined) {
      group.push(entry);
    } else {
      groups.set(anchor, [entry]);
    }
  });

  const entries: MergedEntry[] = [];
  lines.forEach((line) => {
    if (line.kind === "malformed") {
      return;
    }
    entries.push({ kind: "trace", line });
    const group = groups.get(line.position);
    if (group !== undefined) {
      entries.push(...group);
    }
  });
  entries.push(...orphans);

  return { entries, diagnostics };
}

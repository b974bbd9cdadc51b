import { ALLOCATION_SEQUENCE_TIMELINE, LogicalClock } from "../clock/logicalClock.js";
import type { LogicalClockMap } from "../clock/logicalClock.js";
import { deathFromTraceRecord } from "../deaths/deathParser.js";
import type { DeathRecord } from "../deaths/types.js";
import { buildAllocationTable, linkAllocation } from "../merge/temporalMerger.js";
import type { AllocationLink, MergeResult } from "../merge/types.js";
import type { AllocationRecord, Diagnostic, TraceLine } from "../trace/types.js";
import { isAllocation } from "../trace/types.js";
import type { AllocEvent, EventStream, FreeEvent, OracleEvent } from "./types.js";

const KIND_RANK: Record<OracleEvent["kind"], number> = { alloc: 0, free: 1 };

// Array.prototype.sort is stable, so source order survives within each rank.
export const compareEvents = (a: OracleEvent, b: OracleEvent): number =>
  a.time - b.time || KIND_RANK[a.kind] - KIND_RANK[b.kind];

export const allocEvent = (allocation: AllocationRecord, time: number): AllocEvent => ({
  kind: "alloc",
  time,
  objectId: allocation.objectId,
  size: allocation.size,
  siteId: allocation.siteId,
  threadId: allocation.threadId,
  typeId: allocation.typeId,
  isArray: allocation.isArray,
  arrayLength: allocation.arrayLength
});

export const freeEvent = (death: DeathRecord, time: number, origin: AllocationLink): FreeEvent => {
  const fallbackSize = origin.kind === "allocated" ? origin.allocation.size : 0;
  return {
    kind: "free",
    time,
    objectId: death.objectId,
    size: death.size ?? fallbackSize,
    threadId: death.threadId,
    origin
  };
};

/**
 * Walks a merged trace on the method timeline. Allocations take the clock time
 * of their position; frees take the death timestamp.
 */
export function buildEventsFromMerge(merge: MergeResult, clock: LogicalClockMap): EventStream {
  const events: OracleEvent[] = [];

  merge.entries.forEach((entry) => {
    if (entry.kind === "death") {
      events.push(freeEvent(entry.death, entry.death.timestamp, entry.link));
      return;
    }
    const { line } = entry;
    if (line.kind !== "record" || !isAllocation(line.record)) {
      return;
    }
    const time = clock.times.get(line.position);
    if (time === undefined) {
      throw new Error(`Allocation at line ${line.position + 1} has no logical time on the ${clock.timeline} timeline`);
    }
    events.push(allocEvent(line.record, time));
  });

  events.sort(compareEvents);
  return { timeline: clock.timeline, events, diagnostics: [...merge.diagnostics] };
}

export interface ScratchInput {
  // may hold inline D records; those are timed by their sequence index
  lines: TraceLine[];
  // deaths from a separate report keep their reported timestamp
  reportDeaths: DeathRecord[];
}

/**
 * Builds the oracle straight from the allocation and death tables on the
 * allocation-sequence timeline.
 */
export function buildScratchEvents(input: ScratchInput): EventStream {
  const clock = new LogicalClock(ALLOCATION_SEQUENCE_TIMELINE);
  const allocations = buildAllocationTable(input.lines);
  const diagnostics: Diagnostic[] = [];
  const events: OracleEvent[] = [];
  let deathSequence = 0;

  input.lines.forEach((line) => {
    if (line.kind !== "record") {
      return;
    }
    const { record } = line;
    const time = clock.stamp(record);
    if (isAllocation(record)) {
      events.push(allocEvent(record, time));
    } else if (record.kind === "death") {
      const death = deathFromTraceRecord(record, deathSequence++);
      events.push(freeEvent(death, time, linkAllocation(death, allocations, diagnostics)));
    }
  });

  input.reportDeaths.forEach((death) => {
    events.push(freeEvent(death, death.timestamp, linkAllocation(death, allocations, diagnostics)));
  });

  events.sort(compareEvents);
  return { timeline: clock.timeline.name, events, diagnostics };
}

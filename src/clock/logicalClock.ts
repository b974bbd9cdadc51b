import type { RecordKind, TraceLine, TraceRecord } from "../trace/types.js";

export type TimelineName = "method" | "allocation-sequence";

export interface Timeline {
  name: TimelineName;
  advancesOn: ReadonlySet<RecordKind>;
}

// Trace rewriting and the oracle built from a merged trace.
export const METHOD_TIMELINE: Timeline = {
  name: "method",
  advancesOn: new Set<RecordKind>(["method-entry", "method-exit", "exception-exit"])
};

// Scratch oracle: a record's time is its index among allocation and death records.
export const ALLOCATION_SEQUENCE_TIMELINE: Timeline = {
  name: "allocation-sequence",
  advancesOn: new Set<RecordKind>(["object-alloc", "array-alloc", "death"])
};

export class LogicalClock {
  private current = 0;

  constructor(readonly timeline: Timeline) {}

  /**
   * Returns the time at which `record` occurs, then advances the clock when the
   * record kind ticks this timeline.
   */
  stamp(record: TraceRecord): number {
    const time = this.current;
    if (this.timeline.advancesOn.has(record.kind)) {
      this.current += 1;
    }
    return time;
  }

  now(): number {
    return this.current;
  }
}

export interface LogicalClockMap {
  timeline: TimelineName;
  // source position -> logical time, in position order
  times: Map<number, number>;
  // greatest stamped time, -1 when no record was stamped
  maxTime: number;
  finalTime: number;
}

export function buildClockMap(lines: TraceLine[], timeline: Timeline): LogicalClockMap {
  const clock = new LogicalClock(timeline);
  const times = new Map<number, number>();
  let maxTime = -1;

  lines.forEach((line) => {
    if (line.kind !== "record") {
      return;
    }
    const time = clock.stamp(line.record);
    times.set(line.position, time);
    maxTime = Math.max(maxTime, time);
  });

  return { timeline: timeline.name, times, maxTime, finalTime: clock.now() };
}

export function buildTimeToLastPosition(clockMap: LogicalClockMap): Map<number, number> {
  const lastPosition = new Map<number, number>();
  clockMap.times.forEach((time, position) => {
    const existing = lastPosition.get(time);
    if (existing === undefined || position > existing) {
      lastPosition.set(time, position);
    }
  });
  return lastPosition;
}

import { describe, expect, it } from "vitest";
import { METHOD_TIMELINE, buildClockMap } from "../../clock/logicalClock.js";
import { parseDeathReport } from "../../deaths/deathParser.js";
import { buildAllocationTable, mergeDeaths } from "../../merge/temporalMerger.js";
import { parseTraceText } from "../../trace/recordParser.js";
import { buildEventsFromMerge, buildScratchEvents, compareEvents } from "../eventStream.js";
import { formatEventLine } from "../format.js";
import type { OracleEvent } from "../types.js";

const EXAMPLE_TRACE = "N 1 32 0 5 0 100\nM\nM\nN 2 16 0 6 0 100";

const fromMerge = (trace: string, deathText: string) => {
  const lines = parseTraceText(trace);
  const clock = buildClockMap(lines, METHOD_TIMELINE);
  const { deaths } = parseDeathReport(deathText, "0");
  const merge = mergeDeaths({ lines, clock, deaths, allocations: buildAllocationTable(lines) });
  return buildEventsFromMerge(merge, clock);
};

describe("buildEventsFromMerge", () => {
  it("times allocations by their method-clock position and frees by death time", () => {
    const stream = fromMerge(EXAMPLE_TRACE, "D 1 100 1 32");
    expect(stream.timeline).toBe("method");
    expect(stream.events.map(formatEventLine)).toEqual([
      "t0: alloc(id=1, size=32, site=5, thread=100)",
      "t1: free(id=1, size=32)",
      "t2: alloc(id=2, size=16, site=6, thread=100)"
    ]);
  });

  it("copies every allocation field into its alloc event", () => {
    const stream = fromMerge("A 4 72 11 3 8 55", "");
    expect(stream.events).toEqual([
      {
        kind: "alloc",
        time: 0,
        objectId: "4",
        size: 72,
        siteId: 3,
        threadId: "55",
        typeId: 11,
        isArray: true,
        arrayLength: 8
      }
    ]);
  });

  it("falls back to the allocation size, then zero, when a death reports none", () => {
    const stream = fromMerge(EXAMPLE_TRACE, "D 2 100 2\nD 999 100 2");
    const frees = stream.events.filter((event) => event.kind === "free");
    expect(frees.map((event) => [event.objectId, event.size])).toEqual([
      ["2", 16],
      ["999", 0]
    ]);
    expect(stream.diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(["unmatched-death"]);
  });
});

describe("compareEvents", () => {
  it("puts allocations before frees at the same time", () => {
    const events: OracleEvent[] = [
      { kind: "free", time: 1, objectId: "9", size: 8, threadId: "0", origin: { kind: "phantom" } },
      {
        kind: "alloc",
        time: 1,
        objectId: "3",
        size: 8,
        siteId: 1,
        threadId: "0",
        typeId: 0,
        isArray: false,
        arrayLength: 0
      },
      { kind: "free", time: 0, objectId: "5", size: 4, threadId: "0", origin: { kind: "phantom" } }
    ];
    expect(events.sort(compareEvents).map((event) => event.objectId)).toEqual(["5", "3", "9"]);
  });
});

describe("buildScratchEvents", () => {
  it("uses the allocation-sequence timeline and keeps phantom deaths", () => {
    const lines = parseTraceText("M\nN 1 32 0 5 0 100\nM\nA 2 64 1 6 4 100\nD 1 100 9");
    const { deaths } = parseDeathReport("D 2 at time 1 (size: 64 bytes)\nD 999 100 0 8", "0");
    const stream = buildScratchEvents({ lines, reportDeaths: deaths });

    expect(stream.timeline).toBe("allocation-sequence");
    expect(stream.events.map(formatEventLine)).toEqual([
      "t0: alloc(id=1, size=32, site=5, thread=100)",
      "t0: free(id=999, size=8)",
      "t1: alloc(id=2, size=64, site=6, thread=100)",
      "t1: free(id=2, size=64)",
      "t2: free(id=1, size=32)"
    ]);
    expect(stream.diagnostics).toEqual([
      {
        kind: "unmatched-death",
        message: "Death at time 0 references unknown object 999; keeping it as a phantom"
      }
    ]);
  });
});

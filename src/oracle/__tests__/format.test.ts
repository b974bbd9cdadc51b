import { describe, expect, it } from "vitest";
import { formatOracle, formatTabular, toTabularRow } from "../format.js";
import { parseOracleLine } from "../oracleReader.js";
import type { EventStream, TabularRow } from "../types.js";

const stream: EventStream = {
  timeline: "method",
  diagnostics: [],
  events: [
    {
      kind: "alloc",
      time: 0,
      objectId: "1",
      size: 32,
      siteId: 5,
      threadId: "100",
      typeId: 0,
      isArray: false,
      arrayLength: 0
    },
    { kind: "free", time: 1, objectId: "1", size: 32, threadId: "100", origin: { kind: "phantom" } }
  ]
};

describe("formatOracle", () => {
  it("writes the count header and one line per event", () => {
    expect(formatOracle(stream)).toEqual([
      "# Oracle Event Stream",
      "# Timeline: method",
      "# Format: t<time>: alloc(id=<obj_id>, size=<bytes>, site=<site_id>, thread=<thread_id>)",
      "#         t<time>: free(id=<obj_id>, size=<bytes>)",
      "# Total events: 2",
      "# Allocations: 1",
      "# Frees: 1",
      "",
      "t0: alloc(id=1, size=32, site=5, thread=100)",
      "t1: free(id=1, size=32)"
    ]);
  });
});

describe("formatTabular", () => {
  it("writes a header row and leaves allocation columns empty for frees", () => {
    expect(formatTabular(stream.events.map(toTabularRow))).toEqual([
      "timestamp,event_type,object_id,size,site_id,thread_id,type_id",
      "0,alloc,1,32,5,100,0",
      "1,free,1,32,,,"
    ]);
  });

  it("quotes cells holding separators", () => {
    const row: TabularRow = { timestamp: 2, eventType: "free", objectId: 'a,"b"', size: 1 };
    expect(formatTabular([row])[1]).toBe('2,free,"a,""b""",1,,,');
  });
});

describe("parseOracleLine", () => {
  it("reads formatted events back into tabular rows", () => {
    const rows = formatOracle(stream)
      .map(parseOracleLine)
      .flatMap((result) => (result.kind === "row" ? [result.row] : []));
    expect(rows).toEqual([
      { timestamp: 0, eventType: "alloc", objectId: "1", size: 32, siteId: 5, threadId: "100" },
      { timestamp: 1, eventType: "free", objectId: "1", size: 32 }
    ]);
  });

  it("skips headers and flags unknown lines", () => {
    expect(parseOracleLine("# Frees: 1")).toEqual({ kind: "skip" });
    expect(parseOracleLine("t1: resize(id=1)")).toEqual({ kind: "malformed" });
  });
});

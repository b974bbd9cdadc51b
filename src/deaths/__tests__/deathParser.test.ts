import { describe, expect, it } from "vitest";
import { parseTraceLine } from "../../trace/recordParser.js";
import { deathFromTraceRecord, parseDeathReport, parseDeathReportLine } from "../deathParser.js";

describe("parseDeathReportLine", () => {
  it("extracts id, time, size and type from a narrative line", () => {
    const result = parseDeathReportLine(
      "D 458209687 at time 2 (size: 24 bytes, type: java.lang.String)",
      0,
      "0"
    );
    expect(result).toEqual({
      kind: "death",
      death: {
        objectId: "458209687",
        threadId: "0",
        timestamp: 2,
        size: 24,
        typeName: "java.lang.String",
        source: "report",
        sequence: 0
      }
    });
  });

  it("drops the end marker from the type name", () => {
    const result = parseDeathReportLine("D 5 at time 3 (size: 16 bytes, type: Foo [end])", 1, "0");
    expect(result.kind === "death" && result.death.typeName).toBe("Foo");
  });

  it("reads narrative lines without a type", () => {
    const result = parseDeathReportLine("D 9 at time 4 (size: 8 bytes)", 2, "7");
    expect(result.kind === "death" && result.death.typeName).toBeUndefined();
    expect(result.kind === "death" && result.death.threadId).toBe("7");
  });

  it("reads fixed-field lines with and without the D tag", () => {
    expect(parseDeathReportLine("D 1 100 1 32", 3, "0")).toEqual({
      kind: "death",
      death: { objectId: "1", threadId: "100", timestamp: 1, size: 32, source: "report", sequence: 3 }
    });
    const bare = parseDeathReportLine("1 100 1", 4, "0");
    expect(bare.kind === "death" && bare.death.size).toBeUndefined();
  });

  it("reports non-numeric timestamps and sizes", () => {
    expect(parseDeathReportLine("D 1 100 soon", 0, "0")).toEqual({
      kind: "malformed",
      reason: "timestamp is not a non-negative integer: soon"
    });
    expect(parseDeathReportLine("D 1 100 1 big", 0, "0")).toEqual({
      kind: "malformed",
      reason: "size is not a non-negative integer: big"
    });
  });
});

describe("parseDeathReportLine on other record shapes", () => {
  it("rejects trace records of other kinds", () => {
    expect(parseDeathReportLine("N 1 32 0 5 0 100", 0, "0")).toEqual({
      kind: "malformed",
      reason: "object-alloc record is not a death"
    });
    expect(parseDeathReportLine("M 4 5 6", 0, "0")).toEqual({
      kind: "malformed",
      reason: "method-entry record is not a death"
    });
  });

  it("rejects lines with more than four fields", () => {
    expect(parseDeathReportLine("D 1 100 1 32 9", 0, "0")).toEqual({
      kind: "malformed",
      reason: "expected <object-id> <thread-id> <timestamp> [size], found 5 fields"
    });
    expect(parseDeathReportLine("7 1 2 3 4", 0, "0").kind).toBe("malformed");
  });
});

describe("parseDeathReport", () => {
  it("numbers deaths from the first sequence and skips noise", () => {
    const report = parseDeathReport(
      "# deaths\nD 1 100 1 32\n\nD 2 at time 0 (size: 8 bytes)\nMerlin final analysis\n",
      "0",
      5
    );
    expect(report.deaths.map((death) => [death.objectId, death.sequence])).toEqual([
      ["1", 5],
      ["2", 6]
    ]);
    expect(report.diagnostics).toEqual([
      {
        kind: "malformed-record",
        message:
          "Skipping death report line 5: timestamp is not a non-negative integer: analysis (Merlin final analysis)"
      }
    ]);
  });
});

describe("deathFromTraceRecord", () => {
  it("keeps the source position of an inline death", () => {
    const line = parseTraceLine("D 4 9 12 40", 17);
    if (line.kind !== "record" || line.record.kind !== "death") {
      throw new Error("expected a death record");
    }
    expect(deathFromTraceRecord(line.record, 2)).toEqual({
      objectId: "4",
      threadId: "9",
      timestamp: 12,
      size: 40,
      source: "trace",
      sequence: 2,
      position: 17
    });
  });
});

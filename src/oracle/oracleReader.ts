import { COMMENT_MARKER, parseCount } from "../trace/recordParser.js";
import { readTextFile } from "../trace/traceReader.js";
import type { Diagnostic } from "../trace/types.js";
import type { TabularRow } from "./types.js";

// t3: alloc(id=458209687, size=24, site=62, thread=1950409828)
const ALLOC_PATTERN = /^t(\d+): alloc\(id=([^,\s]+), size=(\d+), site=(\d+), thread=([^)\s]+)\)$/;
// t8: free(id=38997010, size=40)
const FREE_PATTERN = /^t(\d+): free\(id=([^,\s]+), size=(\d+)\)$/;

export type OracleLineResult =
  | { kind: "row"; row: TabularRow }
  | { kind: "skip" }
  | { kind: "malformed" };

export function parseOracleLine(rawLine: string): OracleLineResult {
  const line = rawLine.trim();
  if (line.length === 0 || line.startsWith(COMMENT_MARKER)) {
    return { kind: "skip" };
  }

  const alloc = ALLOC_PATTERN.exec(line);
  if (alloc) {
    const timestamp = parseCount(alloc[1]);
    const size = parseCount(alloc[3]);
    const siteId = parseCount(alloc[4]);
    if (timestamp === undefined || size === undefined || siteId === undefined) {
      return { kind: "malformed" };
    }
    return {
      kind: "row",
      row: { timestamp, eventType: "alloc", objectId: alloc[2], size, siteId, threadId: alloc[5] }
    };
  }

  const free = FREE_PATTERN.exec(line);
  if (free) {
    const timestamp = parseCount(free[1]);
    const size = parseCount(free[3]);
    if (timestamp === undefined || size === undefined) {
      return { kind: "malformed" };
    }
    return { kind: "row", row: { timestamp, eventType: "free", objectId: free[2], size } };
  }

  return { kind: "malformed" };
}

export function readOracleFile(oracleFile: string): { rows: TabularRow[]; diagnostics: Diagnostic[] } {
  const rows: TabularRow[] = [];
  const diagnostics: Diagnostic[] = [];

  readTextFile(oracleFile, "oracle file")
    .split("\n")
    .forEach((line, idx) => {
      const result = parseOracleLine(line);
      if (result.kind === "row") {
        rows.push(result.row);
      } else if (result.kind === "malformed") {
        diagnostics.push({
          kind: "malformed-record",
          message: `Skipping oracle line ${idx + 1}: ${line.trim()}`
        });
      }
    });

  return { rows, diagnostics };
}

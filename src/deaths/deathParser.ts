import { COMMENT_MARKER, parseCount, recordKindOf } from "../trace/recordParser.js";
import { readTextFile } from "../trace/traceReader.js";
import type { DeathLineRecord, Diagnostic } from "../trace/types.js";
import type { DeathRecord, DeathReport } from "./types.js";

// D 458209687 at time 2 (size: 24 bytes, type: java.lang.String)
const NARRATIVE_PATTERN = /^D\s+(\S+)\s+at\s+time\s+(\d+)\s+\(size:\s*(\d+)\s+bytes(?:,\s*type:\s*(.+?))?\)/;

const END_MARKER = " [end]";

export type DeathLineResult =
  | { kind: "death"; death: DeathRecord }
  | { kind: "skip" }
  | { kind: "malformed"; reason: string };

const parseNarrative = (
  text: string,
  sequence: number,
  defaultThreadId: string
): DeathRecord | undefined => {
  const match = NARRATIVE_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const timestamp = parseCount(match[2]);
  const size = parseCount(match[3]);
  if (timestamp === undefined || size === undefined) {
    return undefined;
  }
  const typeName = match[4]?.replace(END_MARKER, "");
  return {
    objectId: match[1],
    threadId: defaultThreadId,
    timestamp,
    size,
    typeName,
    source: "report",
    sequence
  };
};

const parseFixedFields = (
  text: string,
  sequence: number
): DeathRecord | string => {
  const tokens = text.split(/\s+/);
  const tagKind = recordKindOf(tokens[0]);
  if (tagKind !== undefined && tagKind !== "death") {
    return `${tagKind} record is not a death`;
  }
  const fields = tagKind === "death" ? tokens.slice(1) : tokens;
  if (fields.length < 3 || fields.length > 4) {
    return `expected <object-id> <thread-id> <timestamp> [size], found ${fields.length} fields`;
  }
  const [objectId, threadId, timeToken, sizeToken] = fields;
  const timestamp = parseCount(timeToken);
  if (timestamp === undefined) {
    return `timestamp is not a non-negative integer: ${timeToken}`;
  }
  const size = parseCount(sizeToken);
  if (sizeToken !== undefined && size === undefined) {
    return `size is not a non-negative integer: ${sizeToken}`;
  }
  return { objectId, threadId, timestamp, size, source: "report", sequence };
};

export function parseDeathReportLine(
  rawLine: string,
  sequence: number,
  defaultThreadId: string
): DeathLineResult {
  const text = rawLine.trim();
  if (text.length === 0 || text.startsWith(COMMENT_MARKER)) {
    return { kind: "skip" };
  }

  const narrative = parseNarrative(text, sequence, defaultThreadId);
  if (narrative) {
    return { kind: "death", death: narrative };
  }

  const fixed = parseFixedFields(text, sequence);
  if (typeof fixed === "string") {
    return { kind: "malformed", reason: fixed };
  }
  return { kind: "death", death: fixed };
}

/**
 * Parses a death report. Narrative and fixed-field lines may be mixed;
 * `firstSequence` lets report deaths follow deaths already taken from the trace.
 */
export function parseDeathReport(
  content: string,
  defaultThreadId: string,
  firstSequence = 0
): DeathReport {
  const deaths: DeathRecord[] = [];
  const diagnostics: Diagnostic[] = [];

  content.split("\n").forEach((line, idx) => {
    const result = parseDeathReportLine(line, firstSequence + deaths.length, defaultThreadId);
    if (result.kind === "death") {
      deaths.push(result.death);
    } else if (result.kind === "malformed") {
      diagnostics.push({
        kind: "malformed-record",
        message: `Skipping death report line ${idx + 1}: ${result.reason} (${line.trim()})`
      });
    }
  });

  return { deaths, diagnostics };
}

export function readDeathReport(
  deathsFile: string,
  defaultThreadId: string,
  firstSequence = 0
): DeathReport {
  return parseDeathReport(readTextFile(deathsFile, "death report"), defaultThreadId, firstSequence);
}

export const deathFromTraceRecord = (record: DeathLineRecord, sequence: number): DeathRecord => ({
  objectId: record.objectId,
  threadId: record.threadId,
  timestamp: record.timestamp,
  size: record.size,
  source: "trace",
  sequence,
  position: record.position
});

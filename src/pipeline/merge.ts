import { METHOD_TIMELINE, buildClockMap } from "../clock/logicalClock.js";
import type { LogicalClockMap } from "../clock/logicalClock.js";
import { deathFromTraceRecord, readDeathReport } from "../deaths/deathParser.js";
import type { DeathRecord } from "../deaths/types.js";
import { buildAllocationTable, mergeDeaths } from "../merge/temporalMerger.js";
import type { MergeResult } from "../merge/types.js";
import { validateMergedTrace } from "../merge/validate.js";
import type { ToolConfig } from "../config/types.js";
import { parseTraceText } from "../trace/recordParser.js";
import { collectMalformed, readTraceFile } from "../trace/traceReader.js";
import { formatMergedTrace, writeLines } from "../trace/traceWriter.js";
import type { Diagnostic, TraceLine } from "../trace/types.js";
import { logger } from "../util/logging.js";
import { reportDiagnostics } from "./diagnostics.js";

export interface SplitTrace {
  lines: TraceLine[];
  inlineDeaths: DeathRecord[];
}

/** Pulls inline D records out of the trace, numbering them in source order. */
export function splitInlineDeaths(lines: TraceLine[]): SplitTrace {
  const kept: TraceLine[] = [];
  const inlineDeaths: DeathRecord[] = [];
  lines.forEach((line) => {
    if (line.kind === "record" && line.record.kind === "death") {
      inlineDeaths.push(deathFromTraceRecord(line.record, inlineDeaths.length));
    } else {
      kept.push(line);
    }
  });
  return { lines: kept, inlineDeaths };
}

export interface TraceMerge {
  clock: LogicalClockMap;
  merge: MergeResult;
}

/** Method-timeline merge of `deaths` into trace lines that hold no inline deaths. */
export function mergeTrace(lines: TraceLine[], deaths: DeathRecord[]): TraceMerge {
  const clock = buildClockMap(lines, METHOD_TIMELINE);
  const merge = mergeDeaths({ lines, clock, deaths, allocations: buildAllocationTable(lines) });
  return { clock, merge };
}

export interface MergeSummary {
  records: number;
  deaths: number;
  anchored: number;
  orphaned: number;
  phantoms: number;
  maxTime: number;
}

export const summarizeMerge = ({ clock, merge }: TraceMerge): MergeSummary => {
  const summary: MergeSummary = {
    records: clock.times.size,
    deaths: 0,
    anchored: 0,
    orphaned: 0,
    phantoms: 0,
    maxTime: clock.maxTime
  };
  merge.entries.forEach((entry) => {
    if (entry.kind !== "death") return;
    summary.deaths++;
    if (entry.anchor === undefined) summary.orphaned++;
    else summary.anchored++;
    if (entry.link.kind === "phantom") summary.phantoms++;
  });
  return summary;
};

const writeMergedTrace = (
  traceMerge: TraceMerge,
  outputFile: string,
  config: ToolConfig,
  inputDiagnostics: Diagnostic[]
): MergeSummary => {
  reportDiagnostics(inputDiagnostics.concat(traceMerge.merge.diagnostics));

  const output = formatMergedTrace(traceMerge.merge.entries);
  writeLines(outputFile, output);

  const summary = summarizeMerge(traceMerge);
  logger.info(
    `Merged ${summary.deaths} deaths into ${summary.records} trace records ` +
      `(${summary.anchored} placed, ${summary.orphaned} appended, max logical time ${summary.maxTime}) -> ${outputFile}`
  );

  if (config.validate) {
    const report = validateMergedTrace(parseTraceText(output.join("\n")));
    report.violations.forEach((violation) => logger.warn(`ERROR: ${violation}`));
    logger.info("=== Validation Results ===");
    logger.info(`Deaths correctly ordered: ${report.deathsInOrder}`);
    logger.info(`Deaths after allocation: ${report.deathsAfterAllocation}`);
    logger.info(`Total objects allocated: ${report.allocatedObjects}`);
  }

  return summary;
};

export function runMerge(
  traceFile: string,
  deathsFile: string,
  outputFile: string,
  config: ToolConfig
): MergeSummary {
  const traceLines = readTraceFile(traceFile);
  const { lines, inlineDeaths } = splitInlineDeaths(traceLines);
  const report = readDeathReport(deathsFile, config.deathThreadId, inlineDeaths.length);
  logger.debug(`Parsed ${report.deaths.length} death records from ${deathsFile}`);

  const traceMerge = mergeTrace(lines, inlineDeaths.concat(report.deaths));
  return writeMergedTrace(
    traceMerge,
    outputFile,
    config,
    collectMalformed(traceLines).concat(report.diagnostics)
  );
}

export function runReorder(inputTrace: string, outputTrace: string, config: ToolConfig): MergeSummary {
  const traceLines = readTraceFile(inputTrace);
  const { lines, inlineDeaths } = splitInlineDeaths(traceLines);
  logger.debug(`Found ${inlineDeaths.length} death records to reorder in ${inputTrace}`);

  return writeMergedTrace(
    mergeTrace(lines, inlineDeaths),
    outputTrace,
    config,
    collectMalformed(traceLines)
  );
}

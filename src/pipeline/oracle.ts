import type { ToolConfig } from "../config/types.js";
import { readDeathReport } from "../deaths/deathParser.js";
import { buildEventsFromMerge, buildScratchEvents } from "../oracle/eventStream.js";
import { formatOracle, formatTabular, toTabularRow } from "../oracle/format.js";
import { readOracleFile } from "../oracle/oracleReader.js";
import { computeStatistics, formatStatistics } from "../oracle/statistics.js";
import type { EventStream } from "../oracle/types.js";
import { collectMalformed, readTraceFile } from "../trace/traceReader.js";
import { writeLines } from "../trace/traceWriter.js";
import { logger } from "../util/logging.js";
import { reportDiagnostics } from "./diagnostics.js";
import { mergeTrace, splitInlineDeaths } from "./merge.js";

const buildStream = (traceFile: string, deathsFile: string, config: ToolConfig): EventStream => {
  const traceLines = readTraceFile(traceFile);
  const malformed = collectMalformed(traceLines);

  if (config.scratch) {
    const report = readDeathReport(deathsFile, config.deathThreadId);
    const stream = buildScratchEvents({ lines: traceLines, reportDeaths: report.deaths });
    reportDiagnostics(malformed.concat(report.diagnostics, stream.diagnostics));
    return stream;
  }

  const { lines, inlineDeaths } = splitInlineDeaths(traceLines);
  const report = readDeathReport(deathsFile, config.deathThreadId, inlineDeaths.length);
  const { clock, merge } = mergeTrace(lines, inlineDeaths.concat(report.deaths));
  const stream = buildEventsFromMerge(merge, clock);
  reportDiagnostics(malformed.concat(report.diagnostics, stream.diagnostics));
  return stream;
};

export function runOracle(
  traceFile: string,
  deathsFile: string,
  outputFile: string,
  config: ToolConfig
): EventStream {
  const stream = buildStream(traceFile, deathsFile, config);
  writeLines(outputFile, formatOracle(stream));
  logger.info(`Oracle event stream (${stream.timeline} timeline) written to ${outputFile}`);

  if (config.csvPath) {
    writeLines(config.csvPath, formatTabular(stream.events.map(toTabularRow)));
    logger.debug(`CSV exported to ${config.csvPath}`);
  }

  if (config.stats) {
    formatStatistics(computeStatistics(stream.events)).forEach((line) => logger.info(line));
  }

  return stream;
}

export function runCsv(oracleFile: string, csvFile: string): number {
  const { rows, diagnostics } = readOracleFile(oracleFile);
  reportDiagnostics(diagnostics);
  writeLines(csvFile, formatTabular(rows));
  logger.info(`Wrote ${rows.length} events to ${csvFile}`);
  return rows.length;
}

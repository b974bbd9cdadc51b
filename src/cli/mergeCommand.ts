import path from "node:path";
import { Command } from "commander";
import { buildToolConfig } from "../config/loadConfig.js";
import type { CliOptions } from "../config/types.js";
import { runMerge, runReorder } from "../pipeline/merge.js";
import { setVerbose } from "../util/logging.js";

export const registerMergeCommand = (program: Command): Command => {
  return program
    .command("merge")
    .description("Interleave death records into a trace at their logical-clock position.")
    .argument("<traceFile>", "Trace file with allocation and method records")
    .argument("<deathsFile>", "Death report (narrative or fixed-field lines)")
    .argument("<outputFile>", "Path of the merged trace")
    .option("-v, --verbose", "Report skipped lines and placement details")
    .option("--validate", "Check the merged trace ordering after writing it")
    .action((traceFile: string, deathsFile: string, outputFile: string, options: CliOptions) => {
      const config = buildToolConfig(options);
      setVerbose(config.verbose);
      runMerge(path.resolve(traceFile), path.resolve(deathsFile), path.resolve(outputFile), config);
    });
};

export const registerReorderCommand = (program: Command): Command => {
  return program
    .command("reorder")
    .description("Move death records appended to a trace back to their logical-clock position.")
    .argument("<inputTrace>", "Trace file with death records out of place")
    .argument("<outputTrace>", "Path of the reordered trace")
    .option("-v, --verbose", "Report skipped lines and placement details")
    .option("--validate", "Check the reordered trace after writing it")
    .action((inputTrace: string, outputTrace: string, options: CliOptions) => {
      const config = buildToolConfig(options);
      setVerbose(config.verbose);
      runReorder(path.resolve(inputTrace), path.resolve(outputTrace), config);
    });
};

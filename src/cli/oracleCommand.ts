import path from "node:path";
import { Command } from "commander";
import { buildToolConfig } from "../config/loadConfig.js";
import type { CliOptions } from "../config/types.js";
import { runCsv, runOracle } from "../pipeline/oracle.js";
import { setVerbose } from "../util/logging.js";

export const registerOracleCommand = (program: Command): Command => {
  return program
    .command("oracle")
    .description("Build the time-ordered alloc/free oracle event stream.")
    .argument("<traceFile>", "Trace file with allocation and method records")
    .argument("<deathsFile>", "Death report (narrative or fixed-field lines)")
    .argument("<outputFile>", "Path of the oracle event stream")
    .option("--csv <file>", "Also export the events as CSV")
    .option("-s, --stats", "Print oracle statistics")
    .option("-v, --verbose", "Report skipped lines")
    .option("--scratch", "Time allocations by their index among allocation/death records")
    .action((traceFile: string, deathsFile: string, outputFile: string, options: CliOptions) => {
      const config = buildToolConfig(options);
      setVerbose(config.verbose);
      runOracle(path.resolve(traceFile), path.resolve(deathsFile), path.resolve(outputFile), config);
    });
};

export const registerCsvCommand = (program: Command): Command => {
  return program
    .command("csv")
    .description("Convert an oracle event stream to CSV.")
    .argument("<oracleFile>", "Oracle event stream file")
    .argument("<csvFile>", "Path of the CSV file")
    .option("-v, --verbose", "Report skipped lines")
    .action((oracleFile: string, csvFile: string, options: CliOptions) => {
      setVerbose(buildToolConfig(options).verbose);
      runCsv(path.resolve(oracleFile), path.resolve(csvFile));
    });
};

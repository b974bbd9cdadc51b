import { Command } from "commander";
import { registerMergeCommand, registerReorderCommand } from "./mergeCommand.js";
import { registerCsvCommand, registerOracleCommand } from "./oracleCommand.js";

export const buildProgram = (): Command => {
  const program = new Command();

  program.name("heap-oracle");
  registerMergeCommand(program);
  registerReorderCommand(program);
  registerOracleCommand(program);
  registerCsvCommand(program);

  return program;
};

export const runCli = async (argv: string[] = process.argv): Promise<void> => {
  const program = buildProgram();
  await program.parseAsync(argv);
};

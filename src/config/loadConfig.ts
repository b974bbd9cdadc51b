import path from "node:path";
import { DEATH_THREAD_ENV, VERBOSE_ENV, getDefaultToolConfig } from "./defaults.js";
import type { CliOptions, ToolConfig } from "./types.js";

const isEnabled = (value: string | undefined): boolean =>
  value !== undefined && ["1", "true", "yes"].includes(value.toLowerCase());

export function buildToolConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): ToolConfig {
  const defaults = getDefaultToolConfig();
  const deathThreadId = env[DEATH_THREAD_ENV]?.trim();

  return {
    verbose: cliOptions.verbose ?? (isEnabled(env[VERBOSE_ENV]) || defaults.verbose),
    validate: cliOptions.validate ?? defaults.validate,
    csvPath: cliOptions.csv ? path.resolve(cliOptions.csv) : defaults.csvPath,
    stats: cliOptions.stats ?? defaults.stats,
    scratch: cliOptions.scratch ?? defaults.scratch,
    deathThreadId: deathThreadId && /^\S+$/.test(deathThreadId) ? deathThreadId : defaults.deathThreadId
  };
}

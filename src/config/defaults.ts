import type { ToolConfig } from "./types.js";

export const DEATH_THREAD_ENV = "HEAP_ORACLE_DEATH_THREAD";
export const VERBOSE_ENV = "HEAP_ORACLE_VERBOSE";

export const getDefaultToolConfig = (): ToolConfig => ({
  verbose: false,
  validate: false,
  csvPath: undefined,
  stats: false,
  scratch: false,
  deathThreadId: "0"
});

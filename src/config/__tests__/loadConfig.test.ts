import path from "node:path";
import { describe, expect, it } from "vitest";
import { getDefaultToolConfig } from "../defaults.js";
import { buildToolConfig } from "../loadConfig.js";

describe("buildToolConfig", () => {
  it("falls back to defaults", () => {
    expect(buildToolConfig({}, {})).toEqual(getDefaultToolConfig());
  });

  it("reads the death thread and verbosity from the environment", () => {
    const config = buildToolConfig({}, { HEAP_ORACLE_DEATH_THREAD: "1950409828", HEAP_ORACLE_VERBOSE: "true" });
    expect(config.deathThreadId).toBe("1950409828");
    expect(config.verbose).toBe(true);
  });

  it("lets command-line options win over the environment", () => {
    const config = buildToolConfig({ verbose: false, csv: "out.csv" }, { HEAP_ORACLE_VERBOSE: "1" });
    expect(config.verbose).toBe(false);
    expect(config.csvPath).toBe(path.resolve("out.csv"));
  });

  it("ignores a death thread id containing whitespace", () => {
    expect(buildToolConfig({}, { HEAP_ORACLE_DEATH_THREAD: "a b" }).deathThreadId).toBe("0");
  });
});

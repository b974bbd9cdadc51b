import fs from "fs-extra";
import path from "node:path";
import type { DeathRecord } from "../deaths/types.js";
import type { MergedEntry } from "../merge/types.js";

export const formatDeathLine = (death: DeathRecord): string => {
  const fields = ["D", death.objectId, death.threadId, String(death.timestamp)];
  if (death.size !== undefined) {
    fields.push(String(death.size));
  }
  return fields.join(" ");
};

export function formatMergedTrace(entries: MergedEntry[]): string[] {
  return entries.map((entry) => {
    if (entry.kind === "death") {
      return formatDeathLine(entry.death);
    }
    return entry.line.kind === "record" ? entry.line.record.text : entry.line.text;
  });
}

export function writeLines(filePath: string, lines: string[]): void {
  fs.ensureDirSync(path.dirname(filePath));
  fs.writeFileSync(filePath, lines.map((line) => `${line}\n`).join(""));
}

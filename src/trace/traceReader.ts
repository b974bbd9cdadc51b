import fs from "fs-extra";
import { parseTraceText } from "./recordParser.js";
import type { Diagnostic, TraceLine } from "./types.js";

export function readTextFile(filePath: string, label: string): string {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Cannot read ${label} ${filePath}: file does not exist`);
  }
  return fs.readFileSync(filePath, "utf8");
}

export function readTraceFile(traceFile: string): TraceLine[] {
  return parseTraceText(readTextFile(traceFile, "trace file"));
}

export function collectMalformed(lines: TraceLine[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  lines.forEach((line) => {
    if (line.kind === "malformed") {
      diagnostics.push({
        kind: "malformed-record",
        message: `Skipping line ${line.position + 1}: ${line.reason} (${line.text})`
      });
    }
  });
  return diagnostics;
}

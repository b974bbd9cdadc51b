import type { Diagnostic } from "../trace/types.js";

export type DeathSource = "trace" | "report";

export interface DeathRecord {
  objectId: string;
  threadId: string;
  timestamp: number;
  size?: number;
  typeName?: string;
  source: DeathSource;
  // input order across every death source of one run; breaks timestamp ties
  sequence: number;
  // line index of an inline trace death
  position?: number;
}

export interface DeathReport {
  deaths: DeathRecord[];
  diagnostics: Diagnostic[];
}

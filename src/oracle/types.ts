import type { TimelineName } from "../clock/logicalClock.js";
import type { AllocationLink } from "../merge/types.js";
import type { Diagnostic } from "../trace/types.js";

export interface AllocEvent {
  kind: "alloc";
  time: number;
  objectId: string;
  size: number;
  siteId: number;
  threadId: string;
  typeId: number;
  isArray: boolean;
  arrayLength: number;
}

export interface FreeEvent {
  kind: "free";
  time: number;
  objectId: string;
  size: number;
  threadId: string;
  origin: AllocationLink;
}

export type OracleEvent = AllocEvent | FreeEvent;

export interface EventStream {
  timeline: TimelineName;
  events: OracleEvent[];
  diagnostics: Diagnostic[];
}

export interface TabularRow {
  timestamp: number;
  eventType: OracleEvent["kind"];
  objectId: string;
  size: number;
  siteId?: number;
  threadId?: string;
  typeId?: number;
}

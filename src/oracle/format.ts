import type { EventStream, OracleEvent, TabularRow } from "./types.js";

export const TABULAR_COLUMNS = [
  "timestamp",
  "event_type",
  "object_id",
  "size",
  "site_id",
  "thread_id",
  "type_id"
] as const;

export const formatEventLine = (event: OracleEvent): string => {
  switch (event.kind) {
    case "alloc":
      return `t${event.time}: alloc(id=${event.objectId}, size=${event.size}, site=${event.siteId}, thread=${event.threadId})`;
    case "free":
      return `t${event.time}: free(id=${event.objectId}, size=${event.size})`;
  }
};

export function formatOracle(stream: EventStream): string[] {
  const allocations = stream.events.filter((event) => event.kind === "alloc").length;
  const header = [
    "# Oracle Event Stream",
    `# Timeline: ${stream.timeline}`,
    "# Format: t<time>: alloc(id=<obj_id>, size=<bytes>, site=<site_id>, thread=<thread_id>)",
    "#         t<time>: free(id=<obj_id>, size=<bytes>)",
    `# Total events: ${stream.events.length}`,
    `# Allocations: ${allocations}`,
    `# Frees: ${stream.events.length - allocations}`,
    ""
  ];
  return header.concat(stream.events.map(formatEventLine));
}

export const toTabularRow = (event: OracleEvent): TabularRow => {
  if (event.kind === "alloc") {
    return {
      timestamp: event.time,
      eventType: event.kind,
      objectId: event.objectId,
      size: event.size,
      siteId: event.siteId,
      threadId: event.threadId,
      typeId: event.typeId
    };
  }
  return { timestamp: event.time, eventType: event.kind, objectId: event.objectId, size: event.size };
};

const escapeCell = (value: string | number | undefined): string => {
  if (value === undefined) return "";
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export function formatTabular(rows: TabularRow[]): string[] {
  const body = rows.map((row) =>
    [row.timestamp, row.eventType, row.objectId, row.size, row.siteId, row.threadId, row.typeId]
      .map(escapeCell)
      .join(",")
  );
  return [TABULAR_COLUMNS.join(",")].concat(body);
}

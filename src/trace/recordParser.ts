import type { RecordKind, TraceLine, TraceRecord } from "./types.js";
import { assertNever } from "./types.js";

export const COMMENT_MARKER = "#";

const RECORD_TAGS = new Map<string, RecordKind>([
  ["M", "method-entry"],
  ["E", "method-exit"],
  ["X", "exception-exit"],
  ["N", "object-alloc"],
  ["A", "array-alloc"],
  ["D", "death"],
  ["U", "field-update"],
  ["W", "witness"]
]);

export const recordKindOf = (tag: string): RecordKind | undefined => RECORD_TAGS.get(tag);

// Fields required after the tag.
const MIN_FIELDS: Record<RecordKind, number> = {
  "method-entry": 0,
  "method-exit": 0,
  "exception-exit": 0,
  "object-alloc": 6,
  "array-alloc": 6,
  death: 3,
  "field-update": 4,
  witness: 3
};

export const parseCount = (token: string | undefined): number | undefined => {
  if (token === undefined || !/^\d+$/.test(token)) {
    return undefined;
  }
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
};

class FieldError extends Error {}

const requireCount = (fields: string[], index: number, name: string): number => {
  const value = parseCount(fields[index]);
  if (value === undefined) {
    throw new FieldError(`${name} is not a non-negative integer: ${fields[index] ?? "<missing>"}`);
  }
  return value;
};

const requireField = (fields: string[], index: number, name: string): string => {
  const value = fields[index];
  if (value === undefined) {
    throw new FieldError(`missing ${name}`);
  }
  return value;
};

const buildRecord = (
  kind: RecordKind,
  fields: string[],
  position: number,
  text: string
): TraceRecord => {
  switch (kind) {
    case "method-entry":
      return {
        kind,
        position,
        text,
        methodId: fields[0],
        receiverId: fields[1],
        threadId: fields[2]
      };
    case "method-exit":
      return { kind, position, text, methodId: fields[0], threadId: fields[1] };
    case "exception-exit":
      return {
        kind,
        position,
        text,
        methodId: fields[0],
        receiverId: fields[1],
        exceptionId: fields[2],
        threadId: fields[3]
      };
    case "object-alloc":
    case "array-alloc":
      return {
        kind,
        position,
        text,
        objectId: requireField(fields, 0, "object id"),
        size: requireCount(fields, 1, "size"),
        typeId: requireCount(fields, 2, "type id"),
        siteId: requireCount(fields, 3, "site id"),
        arrayLength: requireCount(fields, 4, "length"),
        threadId: requireField(fields, 5, "thread id"),
        isArray: kind === "array-alloc"
      };
    case "death": {
      const size = fields[3] === undefined ? undefined : requireCount(fields, 3, "size");
      return {
        kind,
        position,
        text,
        objectId: requireField(fields, 0, "object id"),
        threadId: requireField(fields, 1, "thread id"),
        timestamp: requireCount(fields, 2, "timestamp"),
        size
      };
    }
    case "field-update":
      return {
        kind,
        position,
        text,
        objectId: requireField(fields, 0, "object id"),
        targetId: requireField(fields, 1, "target id"),
        fieldId: requireField(fields, 2, "field id"),
        threadId: requireField(fields, 3, "thread id")
      };
    case "witness":
      return {
        kind,
        position,
        text,
        objectId: requireField(fields, 0, "object id"),
        classId: requireField(fields, 1, "class id"),
        threadId: requireField(fields, 2, "thread id")
      };
    default:
      return assertNever(kind);
  }
};

export function parseTraceLine(rawLine: string, position: number): TraceLine {
  const text = rawLine.trim();
  if (text.length === 0 || text.startsWith(COMMENT_MARKER)) {
    return { kind: "passthrough", position, text: rawLine };
  }

  const [tag, ...fields] = text.split(/\s+/);
  const kind = recordKindOf(tag);
  if (kind === undefined) {
    return { kind: "malformed", position, text, reason: `unknown record tag "${tag}"` };
  }

  const required = MIN_FIELDS[kind];
  if (fields.length < required) {
    return {
      kind: "malformed",
      position,
      text,
      reason: `${kind} needs ${required} fields, found ${fields.length}`
    };
  }

  try {
    return { kind: "record", position, record: buildRecord(kind, fields, position, text) };
  } catch (error) {
    if (error instanceof FieldError) {
      return { kind: "malformed", position, text, reason: `${kind}: ${error.message}` };
    }
    throw error;
  }
}

export function parseTraceText(content: string): TraceLine[] {
  const lines = content.split("\n").map((line) => line.replace(/\r$/, ""));
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line, idx) => parseTraceLine(line, idx));
}

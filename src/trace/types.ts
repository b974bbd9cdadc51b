export type RecordKind =
  | "method-entry"
  | "method-exit"
  | "exception-exit"
  | "object-alloc"
  | "array-alloc"
  | "death"
  | "field-update"
  | "witness";

interface RecordBase {
  // 0-based line index in the source file
  position: number;
  text: string;
}

export interface MethodEntryRecord extends RecordBase {
  kind: "method-entry";
  methodId?: string;
  receiverId?: string;
  threadId?: string;
}

export interface MethodExitRecord extends RecordBase {
  kind: "method-exit";
  methodId?: string;
  threadId?: string;
}

export interface ExceptionExitRecord extends RecordBase {
  kind: "exception-exit";
  methodId?: string;
  receiverId?: string;
  exceptionId?: string;
  threadId?: string;
}

export interface AllocationRecord extends RecordBase {
  kind: "object-alloc" | "array-alloc";
  objectId: string;
  size: number;
  typeId: number;
  siteId: number;
  threadId: string;
  isArray: boolean;
  arrayLength: number;
}

export interface DeathLineRecord extends RecordBase {
  kind: "death";
  objectId: string;
  threadId: string;
  timestamp: number;
  size?: number;
}

export interface FieldUpdateRecord extends RecordBase {
  kind: "field-update";
  objectId: string;
  targetId: string;
  fieldId: string;
  threadId: string;
}

export interface WitnessRecord extends RecordBase {
  kind: "witness";
  objectId: string;
  classId: string;
  threadId: string;
}

export type TraceRecord =
  | MethodEntryRecord
  | MethodExitRecord
  | ExceptionExitRecord
  | AllocationRecord
  | DeathLineRecord
  | FieldUpdateRecord
  | WitnessRecord;

export interface RecordLine {
  kind: "record";
  position: number;
  record: TraceRecord;
}

// Blank and comment lines: kept verbatim when a trace is rewritten.
export interface PassthroughLine {
  kind: "passthrough";
  position: number;
  text: string;
}

export interface MalformedLine {
  kind: "malformed";
  position: number;
  text: string;
  reason: string;
}

export type TraceLine = RecordLine | PassthroughLine | MalformedLine;

export type DiagnosticKind = "malformed-record" | "unmatched-death" | "orphan-timestamp";

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
}

export const isAllocation = (record: TraceRecord): record is AllocationRecord =>
  record.kind === "object-alloc" || record.kind === "array-alloc";

export const assertNever = (value: never): never => {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
};

import {
  LOG_SEVERITIES,
  type LogPayload,
  type LogSeverity,
  type RawLogRecord,
} from "@cloudlog/adapters-common";

/**
 * Shapes of the Cloud Logging API objects this converter reads.
 * They mirror the generated `google.logging.v2.ILogEntry` interfaces, where
 * every field may be absent or null, longs may arrive as strings or Long
 * objects and enums as names or numbers.
 */
type Nullable<T> = T | null | undefined;
type LongLike = number | string | { toString(): string };

export interface TimestampLike {
  seconds?: Nullable<LongLike>;
  nanos?: Nullable<number>;
}

export interface StructValueLike {
  nullValue?: Nullable<number | string>;
  numberValue?: Nullable<number>;
  stringValue?: Nullable<string>;
  boolValue?: Nullable<boolean>;
  structValue?: Nullable<StructLike>;
  listValue?: Nullable<{ values?: Nullable<StructValueLike[]> }>;
}

export interface StructLike {
  fields?: Nullable<Record<string, StructValueLike>>;
}

export interface LogEntryLike {
  insertId?: Nullable<string>;
  logName?: Nullable<string>;
  timestamp?: Nullable<TimestampLike>;
  receiveTimestamp?: Nullable<TimestampLike>;
  severity?: Nullable<number | string>;
  resource?: Nullable<{ type?: Nullable<string>; labels?: Nullable<Record<string, string>> }>;
  labels?: Nullable<Record<string, string>>;
  trace?: Nullable<string>;
  textPayload?: Nullable<string>;
  jsonPayload?: Nullable<StructLike>;
  protoPayload?: Nullable<{ type_url?: Nullable<string>; value?: Nullable<Uint8Array | string> }>;
}

export function toRawLogRecord(entry: LogEntryLike): RawLogRecord {
  const timestamp = toDate(entry.timestamp) ?? toDate(entry.receiveTimestamp) ?? new Date(0);

  const record: RawLogRecord = {
    id: entry.insertId ?? "",
    timestamp,
    severity: toSeverity(entry.severity),
    labels: { ...(entry.labels ?? {}) },
    payload: toPayload(entry),
  };

  const receiveTimestamp = toDate(entry.receiveTimestamp);
  if (receiveTimestamp) record.receiveTimestamp = receiveTimestamp;
  if (entry.logName) record.logName = entry.logName;
  if (entry.trace) record.trace = entry.trace;
  if (entry.resource) {
    record.resource = {
      type: entry.resource.type ?? "",
      labels: { ...(entry.resource.labels ?? {}) },
    };
  }

  return record;
}

export function toDate(timestamp: Nullable<TimestampLike>): Date | undefined {
  if (!timestamp || timestamp.seconds === null || timestamp.seconds === undefined) {
    return undefined;
  }
  const seconds = Number(String(timestamp.seconds));
  if (Number.isNaN(seconds)) return undefined;
  const nanos = timestamp.nanos ?? 0;
  return new Date(seconds * 1000 + Math.floor(nanos / 1_000_000));
}

export function toSeverity(severity: Nullable<number | string>): LogSeverity {
  if (typeof severity === "number") {
    const index = severity / 100;
    return Number.isInteger(index) && index >= 0 && index < LOG_SEVERITIES.length
      ? LOG_SEVERITIES[index]
      : "DEFAULT";
  }
  if (typeof severity === "string") {
    const upper = severity.toUpperCase();
    const match = LOG_SEVERITIES.find((name) => name === upper);
    if (match) return match;
  }
  return "DEFAULT";
}

function toPayload(entry: LogEntryLike): LogPayload {
  if (typeof entry.textPayload === "string") {
    return { kind: "text", text: entry.textPayload };
  }
  if (entry.jsonPayload) {
    return { kind: "json", value: structToObject(entry.jsonPayload) };
  }
  if (entry.protoPayload) {
    const raw = entry.protoPayload.value ?? new Uint8Array();
    return {
      kind: "proto",
      typeUrl: entry.protoPayload.type_url ?? "",
      value: typeof raw === "string" ? Buffer.from(raw, "base64") : raw,
    };
  }
  return { kind: "none" };
}

/**
 * Convert a `google.protobuf.Struct` into a plain object.
 */
export function structToObject(struct: Nullable<StructLike>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(struct?.fields ?? {})) {
    result[key] = structValueToJs(value);
  }
  return result;
}

function structValueToJs(value: StructValueLike): unknown {
  if (value.structValue) return structToObject(value.structValue);
  if (value.listValue) return (value.listValue.values ?? []).map(structValueToJs);
  if (typeof value.stringValue === "string") return value.stringValue;
  if (typeof value.numberValue === "number") return value.numberValue;
  if (typeof value.boolValue === "boolean") return value.boolValue;
  return null;
}

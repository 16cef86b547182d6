import {
  DecodeError,
  errorMessage,
  type IPayloadDecoder,
  type LogPayload,
  type NormalizedRecord,
  type RawLogRecord,
} from "@cloudlog/adapters-common";

/**
 * Reduce a raw record to a display body and a flat label map.
 *
 * @param decoder - Decoder for proto payloads; proto records fail without one
 * @throws DecodeError when the payload cannot be turned into a body
 */
export function normalizeRecord(record: RawLogRecord, decoder?: IPayloadDecoder): NormalizedRecord {
  return {
    id: record.id,
    timestamp: record.timestamp,
    body: payloadBody(record, decoder),
    labels: recordLabels(record),
  };
}

function payloadBody(record: RawLogRecord, decoder: IPayloadDecoder | undefined): string {
  const payload = record.payload;
  switch (payload.kind) {
    case "text":
      return payload.text;
    case "json":
      return structuredBody(record.id, payload.value);
    case "proto":
      return protoBody(record.id, payload, decoder);
    case "none":
      throw new DecodeError("log entry has no payload", record.id);
  }
}

function structuredBody(recordId: string, value: Record<string, unknown>): string {
  try {
    return canonicalJson(value);
  } catch (err) {
    throw new DecodeError(`cannot serialize payload: ${errorMessage(err)}`, recordId, err);
  }
}

function protoBody(
  recordId: string,
  payload: Extract<LogPayload, { kind: "proto" }>,
  decoder: IPayloadDecoder | undefined
): string {
  if (!decoder) {
    throw new DecodeError(`no decoder for payload type "${payload.typeUrl}"`, recordId);
  }

  let decoded: Record<string, unknown>;
  try {
    decoded = decoder.decode(payload.typeUrl, payload.value);
  } catch (err) {
    throw new DecodeError(`cannot decode payload: ${errorMessage(err)}`, recordId, err);
  }
  return structuredBody(recordId, decoded);
}

export function recordLabels(record: RawLogRecord): Record<string, string> {
  const labels: Record<string, string> = {
    id: record.id,
    level: record.severity.toLowerCase(),
  };

  if (record.resource) {
    labels["resource.type"] = record.resource.type;
    for (const [key, value] of Object.entries(record.resource.labels)) {
      labels[userLabelKey(key)] = value;
    }
  }
  for (const [key, value] of Object.entries(record.labels)) {
    labels[userLabelKey(key)] = value;
  }

  if (record.payload.kind === "text") {
    labels.textPayload = record.payload.text;
  }

  if (record.trace) {
    labels.trace = record.trace;
    labels.traceId = traceIdOf(record.trace);
  }

  return labels;
}

/**
 * Quote user label keys so they cannot collide with reserved names
 * such as `level` or `resource.type`.
 */
export function userLabelKey(key: string): string {
  return `labels.${JSON.stringify(key)}`;
}

/**
 * Last path segment of a trace reference: `projects/p/traces/abc` → `abc`.
 */
export function traceIdOf(trace: string): string {
  return trace.slice(trace.lastIndexOf("/") + 1);
}

/**
 * JSON with object keys sorted at every level.
 */
export function canonicalJson(value: unknown): string {
  const json = JSON.stringify(sortKeys(value));
  if (json === undefined) {
    throw new Error("value has no JSON representation");
  }
  return json;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !(value instanceof Date);
}

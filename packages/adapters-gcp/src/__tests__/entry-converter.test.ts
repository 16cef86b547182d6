import { describe, it, expect } from "vitest";
import { toRawLogRecord, toDate, toSeverity, structToObject } from "../logging/entry-converter";

describe("toRawLogRecord", () => {
  it("converts a text entry", () => {
    const record = toRawLogRecord({
      insertId: "b6f39be2",
      logName: "projects/test-project/logs/syslog",
      timestamp: { seconds: "1660920349", nanos: 373000000 },
      receiveTimestamp: { seconds: 1660920350, nanos: 0 },
      severity: "INFO",
      resource: { type: "gce_instance", labels: { zone: "us-central1-a" } },
      labels: { instance_id: "unique" },
      trace: "projects/test-project/traces/abc",
      textPayload: "hello",
    });

    expect(record).toEqual({
      id: "b6f39be2",
      logName: "projects/test-project/logs/syslog",
      timestamp: new Date(1660920349373),
      receiveTimestamp: new Date(1660920350000),
      severity: "INFO",
      resource: { type: "gce_instance", labels: { zone: "us-central1-a" } },
      labels: { instance_id: "unique" },
      trace: "projects/test-project/traces/abc",
      payload: { kind: "text", text: "hello" },
    });
  });

  it("converts a structured payload to a plain object", () => {
    const record = toRawLogRecord({
      insertId: "json-1",
      timestamp: { seconds: 10 },
      jsonPayload: {
        fields: {
          message: { stringValue: "started" },
          attempt: { numberValue: 2 },
          ok: { boolValue: true },
          tags: { listValue: { values: [{ stringValue: "a" }, { nullValue: "NULL_VALUE" }] } },
          nested: { structValue: { fields: { depth: { numberValue: 1 } } } },
        },
      },
    });

    expect(record.payload).toEqual({
      kind: "json",
      value: { message: "started", attempt: 2, ok: true, tags: ["a", null], nested: { depth: 1 } },
    });
  });

  it("keeps proto payload bytes and decodes base64 strings", () => {
    const record = toRawLogRecord({
      insertId: "proto-1",
      timestamp: { seconds: 10 },
      protoPayload: { type_url: "type.googleapis.com/test.Message", value: "AQI=" },
    });

    expect(record.payload.kind).toBe("proto");
    if (record.payload.kind === "proto") {
      expect(record.payload.typeUrl).toBe("type.googleapis.com/test.Message");
      expect(Array.from(record.payload.value)).toEqual([1, 2]);
    }
  });

  it("falls back to the receive timestamp and empty values", () => {
    const record = toRawLogRecord({
      receiveTimestamp: { seconds: 20 },
      labels: null,
      resource: null,
    });

    expect(record.id).toBe("");
    expect(record.timestamp).toEqual(new Date(20000));
    expect(record.severity).toBe("DEFAULT");
    expect(record.labels).toEqual({});
    expect(record.resource).toBeUndefined();
    expect(record.payload).toEqual({ kind: "none" });
  });
});

describe("toDate", () => {
  it("accepts Long-like seconds", () => {
    const long = { toString: () => "1700000000" };
    expect(toDate({ seconds: long, nanos: 999999999 })).toEqual(new Date(1700000000999));
  });

  it("returns undefined without seconds", () => {
    expect(toDate({ nanos: 5 })).toBeUndefined();
    expect(toDate(null)).toBeUndefined();
  });
});

describe("toSeverity", () => {
  it("maps enum numbers and names", () => {
    expect(toSeverity(0)).toBe("DEFAULT");
    expect(toSeverity(500)).toBe("ERROR");
    expect(toSeverity(800)).toBe("EMERGENCY");
    expect(toSeverity("warning")).toBe("WARNING");
  });

  it("defaults unknown values", () => {
    expect(toSeverity(450)).toBe("DEFAULT");
    expect(toSeverity("LOUD")).toBe("DEFAULT");
    expect(toSeverity(undefined)).toBe("DEFAULT");
  });
});

describe("structToObject", () => {
  it("returns an empty object for an empty struct", () => {
    expect(structToObject({})).toEqual({});
    expect(structToObject(null)).toEqual({});
  });
});

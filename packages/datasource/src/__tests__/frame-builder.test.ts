import { describe, it, expect, vi } from "vitest";
import type { ILogger } from "@cloudlog/adapters-common";
import { buildFrames, encodeFrame } from "../frames/frame-builder";
import { textRecord } from "./fake-client";

function fakeLogger(): ILogger & { warn: ReturnType<typeof vi.fn> } {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe("buildFrames", () => {
  it("builds one two-column frame per record in provider order", () => {
    const frames = buildFrames([
      textRecord({ id: "second", timestamp: new Date(2000) }),
      textRecord({ id: "first", timestamp: new Date(1000) }),
    ]);

    expect(frames.map((f) => f.name)).toEqual(["second", "first"]);
    for (const frame of frames) {
      expect(frame.fields).toHaveLength(2);
      expect(frame.fields[0].name).toBe("time");
      expect(frame.fields[1].name).toBe("content");
      expect(frame.meta.preferredVisualisationType).toBe("logs");
    }
    expect(frames[0].fields[0].values).toEqual([new Date(2000)]);
  });

  it("skips records that fail to decode and keeps going", () => {
    const logger = fakeLogger();

    const frames = buildFrames(
      [
        textRecord({ id: "ok-1" }),
        textRecord({ id: "bad", payload: { kind: "proto", typeUrl: "t", value: new Uint8Array() } }),
        textRecord({ id: "ok-2" }),
      ],
      { logger }
    );

    expect(frames.map((f) => f.name)).toEqual(["ok-1", "ok-2"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("failed getting log message", {
      id: "bad",
      error: 'no decoder for payload type "t"',
    });
  });

  it("returns no frames for no records", () => {
    expect(buildFrames([])).toEqual([]);
  });
});

describe("encodeFrame", () => {
  it("encodes data frame JSON with sorted labels", () => {
    const [frame] = buildFrames([
      textRecord({
        id: "b6f39be2-b298-44da-9001-1f04e5756fa0",
        timestamp: new Date(1660920349373),
        severity: "INFO",
        resource: { type: "gce_instance", labels: {} },
        labels: { instance_id: "unique", custom_label: "custom_value" },
        trace: "projects/xxx/traces/c0e331eab1515bbcd1b8306029902ff7",
        payload: { kind: "text", text: "Full log message from this GCE instance" },
      }),
    ]);

    expect(JSON.stringify(encodeFrame(frame))).toBe(
      '{"schema":{"name":"b6f39be2-b298-44da-9001-1f04e5756fa0","meta":{"typeVersion":[0,0],"preferredVisualisationType":"logs"},"fields":[{"name":"time","type":"time","typeInfo":{"frame":"time.Time"}},{"name":"content","type":"string","typeInfo":{"frame":"string"},"labels":{"id":"b6f39be2-b298-44da-9001-1f04e5756fa0","labels.\\"custom_label\\"":"custom_value","labels.\\"instance_id\\"":"unique","level":"info","resource.type":"gce_instance","textPayload":"Full log message from this GCE instance","trace":"projects/xxx/traces/c0e331eab1515bbcd1b8306029902ff7","traceId":"c0e331eab1515bbcd1b8306029902ff7"}}]},"data":{"values":[[1660920349373],["Full log message from this GCE instance"]]}}'
    );
  });
});

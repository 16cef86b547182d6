import {
  DecodeError,
  silentLogger,
  type ILogger,
  type IPayloadDecoder,
  type NormalizedRecord,
  type RawLogRecord,
} from "@cloudlog/adapters-common";
import { normalizeRecord } from "../logs/normalizer";
import type { EncodedFrame, OutputFrame } from "./frame";

export interface BuildFramesOptions {
  decoder?: IPayloadDecoder;
  logger?: ILogger;
}

export function toFrame(record: NormalizedRecord): OutputFrame {
  return {
    name: record.id,
    fields: [
      { name: "time", type: "time", values: [record.timestamp] },
      { name: "content", type: "string", labels: record.labels, values: [record.body] },
    ],
    meta: { preferredVisualisationType: "logs" },
  };
}

/**
 * Build one frame per record, keeping provider order. Records whose
 * payload cannot be decoded are skipped with a warning.
 */
export function buildFrames(records: RawLogRecord[], options: BuildFramesOptions = {}): OutputFrame[] {
  const logger = options.logger ?? silentLogger;
  const frames: OutputFrame[] = [];

  for (const record of records) {
    let normalized: NormalizedRecord;
    try {
      normalized = normalizeRecord(record, options.decoder);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      logger.warn("failed getting log message", { id: err.recordId, error: err.message });
      continue;
    }
    frames.push(toFrame(normalized));
  }

  return frames;
}

/**
 * Encode a frame as data frame JSON. Label keys are sorted.
 */
export function encodeFrame(frame: OutputFrame): EncodedFrame {
  const [time, content] = frame.fields;
  const labels: Record<string, string> = {};
  for (const key of Object.keys(content.labels).sort()) {
    labels[key] = content.labels[key];
  }

  return {
    schema: {
      name: frame.name,
      meta: {
        typeVersion: [0, 0],
        preferredVisualisationType: frame.meta.preferredVisualisationType,
      },
      fields: [
        { name: "time", type: "time", typeInfo: { frame: "time.Time" } },
        { name: "content", type: "string", typeInfo: { frame: "string" }, labels },
      ],
    },
    data: {
      values: [[time.values[0].getTime()], [content.values[0]]],
    },
  };
}

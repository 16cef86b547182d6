/**
 * Output frames: one single-row table per log record.
 *
 * The two-column shape (time, content) and the "logs" visualisation hint
 * are what the log panel expects; labels ride on the content field.
 */

export interface TimeField {
  name: "time";
  type: "time";
  values: [Date];
}

export interface ContentField {
  name: "content";
  type: "string";
  labels: Record<string, string>;
  values: [string];
}

export interface FrameMeta {
  preferredVisualisationType: "logs";
}

export interface OutputFrame {
  /** Record id */
  name: string;
  fields: [TimeField, ContentField];
  meta: FrameMeta;
}

/**
 * Data frame JSON as exchanged with the visualization tool.
 */
export interface EncodedFrame {
  schema: {
    name: string;
    meta: {
      typeVersion: [number, number];
      preferredVisualisationType: "logs";
    };
    fields: [
      { name: "time"; type: "time"; typeInfo: { frame: "time.Time" } },
      { name: "content"; type: "string"; typeInfo: { frame: "string" }; labels: Record<string, string> },
    ];
  };
  data: {
    values: [[number], [string]];
  };
}

/**
 * Severity names used by the log provider, in ascending order.
 * The numeric value of each is its index times 100.
 */
export const LOG_SEVERITIES = [
  "DEFAULT",
  "DEBUG",
  "INFO",
  "NOTICE",
  "WARNING",
  "ERROR",
  "CRITICAL",
  "ALERT",
  "EMERGENCY",
] as const;

export type LogSeverity = (typeof LOG_SEVERITIES)[number];

/**
 * Monitored resource that produced a log record.
 */
export interface LogResource {
  type: string;
  labels: Record<string, string>;
}

/**
 * Payload of a log record. Exactly one variant per record.
 */
export type LogPayload =
  | { kind: "text"; text: string }
  | { kind: "json"; value: Record<string, unknown> }
  | { kind: "proto"; typeUrl: string; value: Uint8Array }
  | { kind: "none" };

/**
 * A log record as returned by the provider, converted to plain values.
 */
export interface RawLogRecord {
  /** Provider-assigned unique id (insert id) */
  id: string;
  /** When the event happened */
  timestamp: Date;
  /** When the provider received the event */
  receiveTimestamp?: Date;
  severity: LogSeverity;
  logName?: string;
  resource?: LogResource;
  labels: Record<string, string>;
  /** Trace reference, e.g. projects/<id>/traces/<trace-id> */
  trace?: string;
  payload: LogPayload;
}

/**
 * A log record reduced to a display body and a flat label map.
 */
export interface NormalizedRecord {
  id: string;
  timestamp: Date;
  body: string;
  labels: Record<string, string>;
}

/**
 * Request for one page of log entries.
 */
export interface ListLogsPageRequest {
  resourceNames: string[];
  filter: string;
  orderBy: string;
  /** Omitted to use the provider's default page size */
  pageSize?: number;
  pageToken?: string;
}

/**
 * One page of log entries.
 */
export interface LogPage {
  records: RawLogRecord[];
  /** Token for the next page, absent on the last page */
  nextPageToken?: string;
}

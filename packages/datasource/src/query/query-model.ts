import { z } from "zod";
import { ClientInputError } from "@cloudlog/adapters-common";

/**
 * Query fields saved by the query editor.
 */
export const QueryModelSchema = z.object({
  queryText: z.string().default(""),
  projectId: z.string().min(1, "projectId is required"),
  /** Bucket path as listed by discovery, e.g. locations/global/buckets/_Default */
  bucketId: z.string().optional(),
  /** View path as listed by discovery, e.g. views/_AllLogs */
  viewId: z.string().optional(),
});
export type QueryModel = z.infer<typeof QueryModelSchema>;

export interface TimeRange {
  from: Date;
  to: Date;
}

/**
 * One query of a multi-query request.
 */
export interface DataQuery {
  refId: string;
  timeRange: TimeRange;
  maxDataPoints: number;
  /** Query editor fields, as an object or a raw JSON string */
  model: unknown;
}

/**
 * Parse and validate the editor fields of a query.
 *
 * @throws ClientInputError when the payload is not JSON or fails validation
 */
export function parseQueryModel(raw: unknown): QueryModel {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      throw new ClientInputError("invalid query: payload is not valid JSON", err);
    }
  }

  const result = QueryModelSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ClientInputError(`invalid query: ${issues}`, result.error);
  }
  return result.data;
}

export function assertValidTimeRange(timeRange: TimeRange): void {
  if (Number.isNaN(timeRange.from.getTime()) || Number.isNaN(timeRange.to.getTime())) {
    throw new ClientInputError("invalid query: time range bounds must be valid dates");
  }
}

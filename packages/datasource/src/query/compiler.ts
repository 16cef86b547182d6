import type { QueryModel, TimeRange } from "./query-model";

/**
 * Provider request for one query, before paging.
 */
export interface ListLogsRequest {
  resourceNames: string[];
  filter: string;
  orderBy: string;
  /** Maximum number of records; undefined reads one page of the provider default size */
  limit?: number;
  /** Bounds rendered by formatTimestamp */
  timeRange: {
    from: string;
    to: string;
  };
}

export const DEFAULT_ORDER_BY = "timestamp desc";

/**
 * Render an instant as RFC 3339 in UTC at second precision, e.g. 2022-08-19T14:45:49Z.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Resource the query reads from: the project, or one view of a bucket
 * when both are selected.
 */
export function resourceNameFor(model: QueryModel): string {
  const project = `projects/${model.projectId}`;
  if (model.bucketId && model.viewId) {
    return `${project}/${model.bucketId}/${model.viewId}`;
  }
  return project;
}

export function compileQuery(model: QueryModel, timeRange: TimeRange, maxDataPoints: number): ListLogsRequest {
  const from = formatTimestamp(timeRange.from);
  const to = formatTimestamp(timeRange.to);

  // Cloud Logging joins newline-separated clauses with AND
  const filter = [model.queryText.trim(), `timestamp >= "${from}"`, `timestamp <= "${to}"`]
    .filter((clause) => clause.length > 0)
    .join("\n");

  return {
    resourceNames: [resourceNameFor(model)],
    filter,
    orderBy: DEFAULT_ORDER_BY,
    limit: maxDataPoints > 0 ? maxDataPoints : undefined,
    timeRange: { from, to },
  };
}

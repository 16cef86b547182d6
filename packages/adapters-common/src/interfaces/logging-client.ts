import type { ListLogsPageRequest, LogPage } from "../types/logging";

/**
 * Per-call options shared by every provider read.
 */
export interface CallOptions {
  /** Cancels the call; also carries the caller's deadline */
  signal?: AbortSignal;
}

/**
 * Authenticated client for a cloud log provider.
 * Implemented by the GCP CloudLoggingClient and by test doubles.
 *
 * Implementations are stateless between calls and safe to share across
 * concurrent queries. Network and permission failures reject the returned
 * promise.
 */
export interface ICloudLoggingClient {
  /**
   * Read one page of log entries.
   * @param request - Resource names, filter, ordering and paging
   */
  listLogs(request: ListLogsPageRequest, options?: CallOptions): Promise<LogPage>;

  /** List the ids of the projects visible to the credentials. */
  listProjects(options?: CallOptions): Promise<string[]>;

  /**
   * List the log buckets of a project, as `locations/<loc>/buckets/<id>`.
   */
  listBuckets(projectId: string, options?: CallOptions): Promise<string[]>;

  /**
   * List the views of a log bucket, as `views/<id>`.
   * @param bucketId - Bucket path as returned by listBuckets
   */
  listViews(projectId: string, bucketId: string, options?: CallOptions): Promise<string[]>;

  /**
   * Check that logs in the project can be read.
   */
  testConnection(projectId: string, options?: CallOptions): Promise<void>;

  /** Release the underlying connections. */
  close(): Promise<void>;
}

/**
 * Resolves the project the process runs in (e.g. from the metadata server).
 */
export type DefaultProjectResolver = (options?: CallOptions) => Promise<string>;

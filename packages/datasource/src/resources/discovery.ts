import {
  CancelledError,
  MissingParameterError,
  ProviderError,
  throwIfCancelled,
  withAbort,
  type CallOptions,
  type ICloudLoggingClient,
} from "@cloudlog/adapters-common";

export interface LogBucketsParams {
  projectId: string;
}

export interface LogViewsParams {
  projectId: string;
  bucketId: string;
}

/**
 * List the projects visible to the datasource credentials.
 */
export async function listProjects(client: ICloudLoggingClient, options: CallOptions = {}): Promise<string[]> {
  return read("listing projects", options, () => client.listProjects(options));
}

/**
 * List the log buckets of a project.
 *
 * @throws MissingParameterError when projectId is empty
 */
export async function listLogBuckets(
  client: ICloudLoggingClient,
  params: LogBucketsParams,
  options: CallOptions = {}
): Promise<string[]> {
  requireParam("projectId", params.projectId);
  return read("listing log buckets", options, () => client.listBuckets(params.projectId, options));
}

/**
 * List the views of a log bucket.
 *
 * @throws MissingParameterError when projectId or bucketId is empty
 */
export async function listLogViews(
  client: ICloudLoggingClient,
  params: LogViewsParams,
  options: CallOptions = {}
): Promise<string[]> {
  requireParam("projectId", params.projectId);
  requireParam("bucketId", params.bucketId);
  return read("listing log views", options, () =>
    client.listViews(params.projectId, params.bucketId, options)
  );
}

function requireParam(name: string, value: string | undefined): void {
  if (!value) {
    throw new MissingParameterError(name);
  }
}

async function read(
  operation: string,
  options: CallOptions,
  call: () => Promise<string[]>
): Promise<string[]> {
  throwIfCancelled(options.signal, operation);
  try {
    return await withAbort(call(), options.signal, operation);
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    throw new ProviderError(operation, err);
  }
}

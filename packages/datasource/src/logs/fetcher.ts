import {
  CancelledError,
  ProviderError,
  throwIfCancelled,
  withAbort,
  type CallOptions,
  type ICloudLoggingClient,
  type LogPage,
  type RawLogRecord,
} from "@cloudlog/adapters-common";
import type { ListLogsRequest } from "../query/compiler";

/** Largest page the Logging API returns */
export const MAX_PAGE_SIZE = 1000;

const OPERATION = "listing logs";

/**
 * Read the records of a compiled query, following page tokens until the
 * limit is reached or the provider has no more pages. Without a limit one
 * page is read.
 *
 * @throws CancelledError when the signal fires; records read so far are dropped
 * @throws ProviderError when a provider call fails
 */
export async function fetchLogs(
  client: ICloudLoggingClient,
  request: ListLogsRequest,
  options: CallOptions = {}
): Promise<RawLogRecord[]> {
  const { signal } = options;
  const limit = request.limit;
  const records: RawLogRecord[] = [];
  let pageToken: string | undefined;

  for (;;) {
    throwIfCancelled(signal, OPERATION);

    const pageSize = limit === undefined ? undefined : Math.min(limit - records.length, MAX_PAGE_SIZE);
    const page = await readPage(
      client,
      {
        resourceNames: request.resourceNames,
        filter: request.filter,
        orderBy: request.orderBy,
        pageSize,
        pageToken,
      },
      signal
    );

    records.push(...page.records);
    pageToken = page.nextPageToken;

    if (limit === undefined) {
      return records;
    }
    if (records.length >= limit) {
      return records.slice(0, limit);
    }
    if (!pageToken) {
      return records;
    }
  }
}

async function readPage(
  client: ICloudLoggingClient,
  request: Parameters<ICloudLoggingClient["listLogs"]>[0],
  signal: AbortSignal | undefined
): Promise<LogPage> {
  try {
    return await withAbort(client.listLogs(request, { signal }), signal, OPERATION);
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    throw new ProviderError(OPERATION, err);
  }
}

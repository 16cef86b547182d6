import { v2 } from "@google-cloud/logging";
import type {
  ConfigServiceV2Client,
  LoggingServiceV2Client,
} from "@google-cloud/logging/build/src/v2";
import { ProjectsClient } from "@google-cloud/resource-manager";
import {
  withAbort,
  type CallOptions,
  type ICloudLoggingClient,
  type ListLogsPageRequest,
  type LogPage,
} from "@cloudlog/adapters-common";
import { toRawLogRecord } from "./entry-converter";

export type CloudLoggingClientConfig = {
  /** Project used for quota and billing; ADC decides when omitted */
  projectId?: string;
  keyFilename?: string;
  credentials?: {
    client_email: string;
    private_key: string;
  };
};

/**
 * Client for GCP Cloud Logging.
 * Reads log entries, buckets and views through the Logging API and lists
 * projects through the Resource Manager API.
 */
export class CloudLoggingClient implements ICloudLoggingClient {
  private readonly logging: LoggingServiceV2Client;
  private readonly config: ConfigServiceV2Client;
  private readonly projects: ProjectsClient;

  constructor(config: CloudLoggingClientConfig = {}) {
    const clientOptions: CloudLoggingClientConfig = {};

    if (config.projectId) {
      clientOptions.projectId = config.projectId;
    }
    if (config.keyFilename) {
      clientOptions.keyFilename = config.keyFilename;
    } else if (config.credentials) {
      clientOptions.credentials = config.credentials;
    }

    this.logging = new v2.LoggingServiceV2Client(clientOptions);
    this.config = new v2.ConfigServiceV2Client(clientOptions);
    this.projects = new ProjectsClient(clientOptions);
  }

  async listLogs(request: ListLogsPageRequest, options?: CallOptions): Promise<LogPage> {
    const [entries, , response] = await withAbort(
      this.logging.listLogEntries(
        {
          resourceNames: request.resourceNames,
          filter: request.filter,
          orderBy: request.orderBy,
          pageSize: request.pageSize,
          pageToken: request.pageToken,
        },
        { autoPaginate: false }
      ),
      options?.signal,
      "listing logs"
    );

    return {
      records: entries.map((entry) => toRawLogRecord(entry)),
      nextPageToken: response?.nextPageToken || undefined,
    };
  }

  async listProjects(options?: CallOptions): Promise<string[]> {
    const [projects] = await withAbort(
      this.projects.searchProjects({}),
      options?.signal,
      "listing projects"
    );

    const ids: string[] = [];
    for (const project of projects) {
      if (project.projectId) ids.push(project.projectId);
    }
    return ids;
  }

  /**
   * List buckets in every location of the project.
   *
   * @returns Bucket paths relative to the project, e.g. "locations/global/buckets/_Default"
   */
  async listBuckets(projectId: string, options?: CallOptions): Promise<string[]> {
    const [buckets] = await withAbort(
      this.config.listBuckets({ parent: `projects/${projectId}/locations/-` }),
      options?.signal,
      "listing log buckets"
    );
    return relativeNames(buckets, `projects/${projectId}/`);
  }

  /**
   * @returns View paths relative to the bucket, e.g. "views/_AllLogs"
   */
  async listViews(projectId: string, bucketId: string, options?: CallOptions): Promise<string[]> {
    const parent = `projects/${projectId}/${bucketId}`;
    const [views] = await withAbort(
      this.config.listViews({ parent }),
      options?.signal,
      "listing log views"
    );
    return relativeNames(views, `${parent}/`);
  }

  async testConnection(projectId: string, options?: CallOptions): Promise<void> {
    await withAbort(
      this.logging.listLogEntries(
        { resourceNames: [`projects/${projectId}`], pageSize: 1 },
        { autoPaginate: false }
      ),
      options?.signal,
      "testing connection"
    );
  }

  async close(): Promise<void> {
    await Promise.all([this.logging.close(), this.config.close(), this.projects.close()]);
  }
}

function relativeNames(resources: { name?: string | null }[], prefix: string): string[] {
  const names: string[] = [];
  for (const resource of resources) {
    if (!resource.name) continue;
    names.push(
      resource.name.startsWith(prefix) ? resource.name.slice(prefix.length) : resource.name
    );
  }
  return names;
}

import {
  ClientInputError,
  DatasourceSettingsSchema,
  errorMessage,
  silentLogger,
  type CallOptions,
  type DatasourceSettings,
  type DefaultProjectResolver,
  type ICloudLoggingClient,
  type ILogger,
  type IPayloadDecoder,
} from "@cloudlog/adapters-common";
import { compileQuery, type ListLogsRequest } from "./query/compiler";
import { assertValidTimeRange, parseQueryModel, type DataQuery } from "./query/query-model";
import { fetchLogs } from "./logs/fetcher";
import { buildFrames } from "./frames/frame-builder";
import type { OutputFrame } from "./frames/frame";
import { callResource, type ResourceRequest, type ResourceResponse } from "./resources/router";

export interface QueryDataRequest {
  queries: DataQuery[];
}

export interface DataResponse {
  error?: string;
  frames: OutputFrame[];
}

export interface QueryDataResponse {
  /** Keyed by query refId */
  responses: Record<string, DataResponse>;
}

export type HealthStatus = "ok" | "error";

export interface HealthCheckResult {
  status: HealthStatus;
  message: string;
}

export interface CloudLoggingDatasourceOptions {
  /** Already authenticated; owned and closed by the caller */
  client: ICloudLoggingClient;
  settings?: Partial<DatasourceSettings>;
  decoder?: IPayloadDecoder;
  resolveDefaultProject?: DefaultProjectResolver;
  logger?: ILogger;
}

/**
 * A configured datasource instance: runs log queries, answers resource
 * requests and health checks with one provider client.
 */
export class CloudLoggingDatasource {
  private readonly client: ICloudLoggingClient;
  private readonly settings: DatasourceSettings;
  private readonly decoder?: IPayloadDecoder;
  private readonly resolveDefaultProject?: DefaultProjectResolver;
  private readonly logger: ILogger;

  constructor(options: CloudLoggingDatasourceOptions) {
    this.client = options.client;
    this.settings = DatasourceSettingsSchema.parse(options.settings ?? {});
    this.decoder = options.decoder;
    this.resolveDefaultProject = options.resolveDefaultProject;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run every query of the request. Each query is independent: a bad
   * query only fails its own response.
   */
  async queryData(request: QueryDataRequest, options: CallOptions = {}): Promise<QueryDataResponse> {
    const entries: [string, DataResponse][] = [];

    for (const query of request.queries) {
      entries.push([query.refId, await this.query(query, options)]);
    }

    // fromEntries defines own properties, so any refId is a plain key
    return { responses: Object.fromEntries(entries) };
  }

  private async query(query: DataQuery, options: CallOptions): Promise<DataResponse> {
    let request: ListLogsRequest;
    try {
      const model = parseQueryModel(query.model);
      assertValidTimeRange(query.timeRange);
      request = compileQuery(model, query.timeRange, query.maxDataPoints);
    } catch (err) {
      if (!(err instanceof ClientInputError)) throw err;
      return { error: err.message, frames: [] };
    }

    try {
      const records = await fetchLogs(this.client, request, options);
      return { frames: buildFrames(records, { decoder: this.decoder, logger: this.logger }) };
    } catch (err) {
      this.logger.warn("query failed", { refId: query.refId, error: errorMessage(err) });
      return { error: `query: ${errorMessage(err)}`, frames: [] };
    }
  }

  async callResource(request: ResourceRequest, options: CallOptions = {}): Promise<ResourceResponse> {
    return callResource(
      {
        client: this.client,
        resolveDefaultProject: this.resolveDefaultProject,
        logger: this.logger,
      },
      request,
      options
    );
  }

  /**
   * Project used when the configuration names none: the GCE project for
   * GCE authentication, the configured default otherwise.
   */
  async getDefaultProject(options: CallOptions = {}): Promise<string> {
    if (this.settings.defaultProject || this.settings.authenticationType !== "gce") {
      return this.settings.defaultProject;
    }
    if (!this.resolveDefaultProject) {
      throw new Error("no default project resolver configured");
    }
    return this.resolveDefaultProject(options);
  }

  /**
   * Run a one-entry query against the default project.
   */
  async checkHealth(options: CallOptions = {}): Promise<HealthCheckResult> {
    let project: string;
    try {
      project = await this.getDefaultProject(options);
    } catch (err) {
      return { status: "error", message: `failed to get GCE default project: ${errorMessage(err)}` };
    }

    try {
      await this.client.testConnection(project, options);
    } catch (err) {
      return { status: "error", message: `failed to run test query: ${errorMessage(err)}` };
    }

    return { status: "ok", message: `Successfully queried logs from GCP project ${project}` };
  }
}

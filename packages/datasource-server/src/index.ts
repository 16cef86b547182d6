export { DatasourceServer } from "./datasource-server";
export type { DatasourceServerOptions } from "./datasource-server";
export { RequestHandler } from "./request-handler";
export type { RequestHandlerOptions } from "./request-handler";
export { ServerConfigSchema, loadConfig } from "./server-config";
export type { ServerConfig, LoadedConfig } from "./server-config";
export { QueryBatchSchema, BatchQuerySchema, formatIssues } from "./query-request";
export type { QueryBatch, BatchQuery } from "./query-request";

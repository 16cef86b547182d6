export * from "./datasource";
export * from "./encoding";

// Query pipeline
export { QueryModelSchema, parseQueryModel, assertValidTimeRange } from "./query/query-model";
export type { QueryModel, DataQuery, TimeRange } from "./query/query-model";
export { compileQuery, formatTimestamp, resourceNameFor, DEFAULT_ORDER_BY } from "./query/compiler";
export type { ListLogsRequest } from "./query/compiler";
export { modifyQuery, escapeLabelValue } from "./query/filters";
export type { QueryFixAction } from "./query/filters";
export { fetchLogs, MAX_PAGE_SIZE } from "./logs/fetcher";
export { normalizeRecord, recordLabels, userLabelKey, traceIdOf, canonicalJson } from "./logs/normalizer";

// Frames
export { buildFrames, toFrame, encodeFrame } from "./frames/frame-builder";
export type { BuildFramesOptions } from "./frames/frame-builder";
export type { OutputFrame, EncodedFrame, TimeField, ContentField, FrameMeta } from "./frames/frame";

// Resources
export { listProjects, listLogBuckets, listLogViews } from "./resources/discovery";
export type { LogBucketsParams, LogViewsParams } from "./resources/discovery";
export { callResource } from "./resources/router";
export type { ResourceRequest, ResourceResponse, ResourceRouterDeps } from "./resources/router";

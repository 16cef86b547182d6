import {
  CancelledError,
  EncodingError,
  errorMessage,
  silentLogger,
  type CallOptions,
  type DefaultProjectResolver,
  type ICloudLoggingClient,
  type ILogger,
} from "@cloudlog/adapters-common";
import { encodeJson } from "../encoding";
import { listLogBuckets, listLogViews, listProjects } from "./discovery";

export interface ResourceRequest {
  /** Path below the resource root, without leading slash */
  path: string;
  query: Record<string, string | undefined>;
}

export interface ResourceResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface ResourceRouterDeps {
  client: ICloudLoggingClient;
  resolveDefaultProject?: DefaultProjectResolver;
  logger?: ILogger;
}

/**
 * What a route answers when its call fails: a fixed 502 body, or a
 * fallback value sent as a normal result.
 */
type RouteFailure =
  | { kind: "bad-gateway"; body: string }
  | { kind: "fallback"; value: unknown };

interface ResourceRoute {
  /** Query parameters that must be present and non-empty */
  params: readonly string[];
  /** Logged with the underlying error */
  description: string;
  failure: RouteFailure;
  invoke(deps: ResourceRouterDeps, params: Record<string, string>, options: CallOptions): Promise<unknown>;
}

const ROUTES: ReadonlyMap<string, ResourceRoute> = new Map<string, ResourceRoute>([
  [
    "projects",
    {
      params: [],
      description: "problem listing projects",
      failure: {
        kind: "bad-gateway",
        body: '{"error": "Failed to list projects. Please check your permissions and authentication configuration."}',
      },
      invoke: (deps, _params, options) => listProjects(deps.client, options),
    },
  ],
  [
    "gceDefaultProject",
    {
      params: [],
      description: "problem getting GCE default project",
      failure: { kind: "fallback", value: "" },
      invoke: (deps, _params, options) => {
        if (!deps.resolveDefaultProject) {
          return Promise.reject(new Error("no default project resolver configured"));
        }
        return deps.resolveDefaultProject(options);
      },
    },
  ],
  [
    "logbuckets",
    {
      params: ["ProjectId"],
      description: "problem listing log buckets",
      failure: {
        kind: "bad-gateway",
        body: '{"error": "Failed to list log buckets. Please check your project ID and permissions."}',
      },
      invoke: (deps, params, options) =>
        listLogBuckets(deps.client, { projectId: params.ProjectId }, options),
    },
  ],
  [
    "logviews",
    {
      params: ["ProjectId", "BucketId"],
      description: "problem listing log views",
      failure: {
        kind: "bad-gateway",
        body: '{"error": "Failed to list log views. Please check your bucket ID and permissions."}',
      },
      invoke: (deps, params, options) =>
        listLogViews(deps.client, { projectId: params.ProjectId, bucketId: params.BucketId }, options),
    },
  ],
]);

const JSON_HEADERS = { "Content-Type": "application/json" };
const TEXT_HEADERS = { "Content-Type": "text/plain; charset=utf-8" };

const EXACT_PATHS = new Set(["gceDefaultProject"]);

/**
 * Look up the route for a resource path. Discovery paths match
 * case-insensitively (`logBuckets` and `logbuckets` alike);
 * `gceDefaultProject` only matches exactly.
 */
function findRoute(path: string): ResourceRoute | undefined {
  return ROUTES.get(EXACT_PATHS.has(path) ? path : path.toLowerCase());
}

/**
 * Answer a resource request: discovery lists for the query editor and
 * template variables.
 */
export async function callResource(
  deps: ResourceRouterDeps,
  request: ResourceRequest,
  options: CallOptions = {}
): Promise<ResourceResponse> {
  const logger = deps.logger ?? silentLogger;
  const route = findRoute(request.path);
  if (!route) {
    return { status: 404, headers: TEXT_HEADERS, body: "No such path" };
  }

  const params: Record<string, string> = {};
  for (const name of route.params) {
    const value = request.query[name];
    if (!value) {
      return {
        status: 400,
        headers: JSON_HEADERS,
        body: JSON.stringify({ error: `Missing required parameter: ${name}` }),
      };
    }
    params[name] = value;
  }

  let result: unknown;
  try {
    result = await route.invoke(deps, params, options);
  } catch (err) {
    if (err instanceof CancelledError) {
      logger.warn("resource request cancelled", { path: request.path });
    } else {
      logger.warn(route.description, { error: errorMessage(err) });
    }
    if (route.failure.kind === "bad-gateway") {
      return { status: 502, headers: JSON_HEADERS, body: route.failure.body };
    }
    result = route.failure.value;
  }

  return encodeResult(result, logger);
}

function encodeResult(result: unknown, logger: ILogger): ResourceResponse {
  try {
    return { status: 200, headers: JSON_HEADERS, body: encodeJson(result) };
  } catch (err) {
    if (!(err instanceof EncodingError)) throw err;
    logger.error(err.message, { cause: err.originalError });
    return { status: 500, headers: TEXT_HEADERS, body: "Unable to create response" };
  }
}

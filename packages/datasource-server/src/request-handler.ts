import type * as http from "node:http";
import { URL } from "node:url";
import { EncodingError, errorMessage, type ILogger } from "@cloudlog/adapters-common";
import {
  encodeFrame,
  encodeJson,
  type CloudLoggingDatasource,
  type DataQuery,
  type EncodedFrame,
} from "@cloudlog/datasource";
import { BatchQuerySchema, QueryBatchSchema, formatIssues } from "./query-request";

const RESOURCE_PREFIX = "/resources/";
const JSON_HEADERS = { "Content-Type": "application/json" };

export interface RequestHandlerOptions {
  datasource: CloudLoggingDatasource;
  logger: ILogger;
  requestTimeoutMs: number;
}

interface Reply {
  status: number;
  headers: Record<string, string>;
  body: string;
}

interface QueryResult {
  error?: string;
  frames: EncodedFrame[];
}

/**
 * Routes HTTP requests to the datasource. Every request gets its own
 * abort signal, fired on timeout or when the client goes away.
 */
export class RequestHandler {
  constructor(private readonly options: RequestHandlerOptions) {}

  async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`request timed out after ${this.options.requestTimeoutMs}ms`)),
      this.options.requestTimeoutMs
    );
    res.on("close", () => {
      if (!res.writableFinished) controller.abort(new Error("client disconnected"));
    });

    try {
      const reply = await this.route(req, controller.signal);
      res.writeHead(reply.status, reply.headers);
      res.end(reply.body);
    } finally {
      clearTimeout(timer);
    }
  }

  private async route(req: http.IncomingMessage, signal: AbortSignal): Promise<Reply> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    if (url.pathname === "/query") {
      if (method !== "POST") return methodNotAllowed();
      return this.query(await collectBody(req), signal);
    }

    if (url.pathname === "/health") {
      if (method !== "GET") return methodNotAllowed();
      const result = await this.options.datasource.checkHealth({ signal });
      return jsonReply(result.status === "ok" ? 200 : 503, JSON.stringify(result));
    }

    if (url.pathname.startsWith(RESOURCE_PREFIX)) {
      if (method !== "GET") return methodNotAllowed();
      return this.options.datasource.callResource(
        {
          path: url.pathname.slice(RESOURCE_PREFIX.length),
          query: Object.fromEntries(url.searchParams.entries()),
        },
        { signal }
      );
    }

    return jsonReply(404, JSON.stringify({ error: "Not found" }));
  }

  private async query(body: Buffer, signal: AbortSignal): Promise<Reply> {
    let raw: unknown;
    try {
      raw = JSON.parse(body.toString("utf8"));
    } catch {
      return jsonReply(400, JSON.stringify({ error: "invalid request: body is not valid JSON" }));
    }

    const batch = QueryBatchSchema.safeParse(raw);
    if (!batch.success) {
      return jsonReply(400, JSON.stringify({ error: `invalid request: ${formatIssues(batch.error)}` }));
    }

    const invalid = new Map<string, string>();
    const queries: DataQuery[] = [];
    for (const item of batch.data.queries) {
      const query = BatchQuerySchema.safeParse(item);
      if (query.success) {
        queries.push({ ...query.data, model: query.data.model });
      } else {
        invalid.set(item.refId, `invalid query: ${formatIssues(query.error)}`);
      }
    }

    const { responses } = await this.options.datasource.queryData({ queries }, { signal });

    const entries: [string, QueryResult][] = [];
    for (const { refId } of batch.data.queries) {
      const error = invalid.get(refId);
      if (error !== undefined) {
        entries.push([refId, { error, frames: [] }]);
        continue;
      }
      if (!Object.hasOwn(responses, refId)) continue;
      const response = responses[refId];
      entries.push([
        refId,
        {
          ...(response.error !== undefined ? { error: response.error } : {}),
          frames: response.frames.map(encodeFrame),
        },
      ]);
    }
    const results = Object.fromEntries(entries);

    try {
      return jsonReply(200, encodeJson({ results }));
    } catch (err) {
      if (!(err instanceof EncodingError)) throw err;
      this.options.logger.error(err.message, { cause: errorMessage(err.originalError) });
      return { status: 500, headers: { "Content-Type": "text/plain; charset=utf-8" }, body: "Unable to create response" };
    }
  }
}

function jsonReply(status: number, body: string): Reply {
  return { status, headers: JSON_HEADERS, body };
}

function methodNotAllowed(): Reply {
  return jsonReply(405, JSON.stringify({ error: "Method not allowed" }));
}

function collectBody(stream: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));
    stream.on("end", () => resolve(Buffer.concat(chunks)));
    stream.on("error", reject);
  });
}

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import type { ICloudLoggingClient, ILogger, RawLogRecord } from "@cloudlog/adapters-common";
import { CloudLoggingDatasource } from "@cloudlog/datasource";
import { DatasourceServer } from "../datasource-server";

type FakeClient = { [K in keyof ICloudLoggingClient]: Mock };

function createFakeClient(): FakeClient {
  return {
    listLogs: vi.fn(),
    listProjects: vi.fn(),
    listBuckets: vi.fn(),
    listViews: vi.fn(),
    testConnection: vi.fn(),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

const record: RawLogRecord = {
  id: "entry-1",
  timestamp: new Date(1700000000000),
  severity: "ERROR",
  labels: { env: "test" },
  payload: { kind: "text", text: "disk full" },
};

describe("DatasourceServer", () => {
  let client: FakeClient;
  let logger: ILogger;
  let server: DatasourceServer;
  let baseUrl: string;

  beforeEach(async () => {
    client = createFakeClient();
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const datasource = new CloudLoggingDatasource({
      client,
      settings: { defaultProject: "test-project" },
      logger,
    });
    server = new DatasourceServer({ datasource, logger, port: 0 });
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  it("runs queries and encodes frames", async () => {
    client.listLogs.mockResolvedValue({ records: [record] });

    const res = await fetch(`${baseUrl}/query`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        queries: [
          {
            refId: "A",
            timeRange: { from: "2023-11-14T21:00:00Z", to: 1700000400000 },
            maxDataPoints: 50,
            model: { projectId: "test-project", queryText: 'severity="ERROR"' },
          },
        ],
      }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      results: {
        A: {
          frames: [
            {
              schema: {
                name: "entry-1",
                meta: { typeVersion: [0, 0], preferredVisualisationType: "logs" },
                fields: [
                  { name: "time", type: "time", typeInfo: { frame: "time.Time" } },
                  {
                    name: "content",
                    type: "string",
                    typeInfo: { frame: "string" },
                    labels: { id: "entry-1", 'labels."env"': "test", level: "error", textPayload: "disk full" },
                  },
                ],
              },
              data: { values: [[1700000000000], ["disk full"]] },
            },
          ],
        },
      },
    });
    expect(client.listLogs.mock.calls[0][0]).toEqual({
      resourceNames: ["projects/test-project"],
      filter: 'severity="ERROR"\ntimestamp >= "2023-11-14T21:00:00Z"\ntimestamp <= "2023-11-14T22:20:00Z"',
      orderBy: "timestamp desc",
      pageSize: 50,
      pageToken: undefined,
    });
  });

  it("reports query errors per refId", async () => {
    const res = await fetch(`${baseUrl}/query`, {
      method: "POST",
      body: JSON.stringify({
        queries: [{ refId: "A", timeRange: { from: 0, to: 1000 }, model: "Not JSON" }],
      }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      results: { A: { error: "invalid query: payload is not valid JSON", frames: [] } },
    });
  });

  it("answers sibling queries when one is malformed", async () => {
    client.listLogs.mockResolvedValue({ records: [] });

    const res = await fetch(`${baseUrl}/query`, {
      method: "POST",
      body: JSON.stringify({
        queries: [
          { refId: "A", timeRange: { from: 0, to: 1000 }, maxDataPoints: 10, model: { projectId: "test-project" } },
          { refId: "B", timeRange: { from: 0, to: 1000 }, maxDataPoints: 12.5, model: { projectId: "test-project" } },
          { refId: "C", timeRange: { from: 0, to: 1000 }, model: { projectId: "test-project" } },
        ],
      }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      results: {
        A: { frames: [] },
        B: { error: "invalid query: maxDataPoints: Expected integer, received float", frames: [] },
        C: { frames: [] },
      },
    });
    expect(client.listLogs).toHaveBeenCalledTimes(2);
  });

  it("rejects a body that is not JSON", async () => {
    const res = await fetch(`${baseUrl}/query`, { method: "POST", body: "nope" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "invalid request: body is not valid JSON" });
  });

  it("rejects a malformed batch", async () => {
    const res = await fetch(`${baseUrl}/query`, { method: "POST", body: JSON.stringify({ queries: "all" }) });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "invalid request: queries: Expected array, received string" });
  });

  it("serves resource lists", async () => {
    client.listViews.mockResolvedValue(["views/_AllLogs"]);

    const res = await fetch(
      `${baseUrl}/resources/logviews?ProjectId=test-project&BucketId=locations%2Fglobal%2Fbuckets%2F_Default`
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(await res.text()).toBe('["views/_AllLogs"]');
    expect(client.listViews).toHaveBeenCalledWith(
      "test-project",
      "locations/global/buckets/_Default",
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it("passes resource errors through", async () => {
    const res = await fetch(`${baseUrl}/resources/unknown`);

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("No such path");
  });

  it("reports health", async () => {
    client.testConnection.mockResolvedValue(undefined);

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      message: "Successfully queried logs from GCP project test-project",
    });
  });

  it("reports failed health checks as unavailable", async () => {
    client.testConnection.mockRejectedValue(new Error("permission denied"));

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ status: "error", message: "failed to run test query: permission denied" });
  });

  it("rejects other methods and paths", async () => {
    expect((await fetch(`${baseUrl}/query`)).status).toBe(405);
    expect((await fetch(`${baseUrl}/nowhere`)).status).toBe(404);
  });

  it("leaves the client open when stopped", async () => {
    await server.stop();
    expect(client.close).not.toHaveBeenCalled();
  });
});

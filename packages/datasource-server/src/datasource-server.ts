import * as http from "node:http";
import type { AddressInfo } from "node:net";
import { errorMessage, type ILogger } from "@cloudlog/adapters-common";
import type { CloudLoggingDatasource } from "@cloudlog/datasource";
import { RequestHandler } from "./request-handler";

export interface DatasourceServerOptions {
  datasource: CloudLoggingDatasource;
  logger: ILogger;
  port: number;
  host?: string;
  requestTimeoutMs?: number;
}

export class DatasourceServer {
  private readonly port: number;
  private readonly host: string;
  private readonly logger: ILogger;
  private readonly handler: RequestHandler;
  private httpServer: http.Server | null = null;

  constructor(options: DatasourceServerOptions) {
    this.port = options.port;
    this.host = options.host ?? "127.0.0.1";
    this.logger = options.logger;
    this.handler = new RequestHandler({
      datasource: options.datasource,
      logger: options.logger,
      requestTimeoutMs: options.requestTimeoutMs ?? 30_000,
    });
  }

  /**
   * Start listening. Resolves with the bound port, which differs from the
   * configured one when that is 0.
   */
  async start(): Promise<number> {
    const server = http.createServer((req, res) => {
      this.handler.handle(req, res).catch((err: unknown) => {
        this.logger.error("Request failed:", errorMessage(err));
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "application/json" });
        }
        res.end(JSON.stringify({ error: "Internal server error" }));
      });
    });
    this.httpServer = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        const address = server.address();
        resolve(isAddressInfo(address) ? address.port : this.port);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = null;
    if (!server) return;

    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === "object";
}

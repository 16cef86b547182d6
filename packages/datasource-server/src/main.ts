import { createConsoleLogger } from "@cloudlog/adapters-common";
import { createGcpDatasourceDeps } from "@cloudlog/adapters-gcp";
import { CloudLoggingDatasource } from "@cloudlog/datasource";
import { loadConfig } from "./server-config";
import { DatasourceServer } from "./datasource-server";

const logger = createConsoleLogger("CloudLogging");

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const deps = createGcpDatasourceDeps(config.settings, config.secure);
  logger.info(
    `Config: auth=${deps.settings.authenticationType}, defaultProject=${deps.settings.defaultProject || "(none)"}`
  );

  const datasource = new CloudLoggingDatasource({
    client: deps.client,
    settings: deps.settings,
    decoder: deps.decoder,
    resolveDefaultProject: deps.resolveDefaultProject,
    logger,
  });

  const server = new DatasourceServer({
    datasource,
    logger,
    port: config.server.port,
    host: config.server.host,
    requestTimeoutMs: config.server.requestTimeoutMs,
  });

  const port = await server.start();
  logger.info(`Ready on ${config.server.host}:${port}`);

  const shutdown = async () => {
    logger.info("Shutting down...");
    await server.stop();
    await deps.client.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error("Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err: unknown) => {
  logger.error("Fatal:", err);
  process.exit(1);
});

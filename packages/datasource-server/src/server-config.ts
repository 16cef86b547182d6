import { z } from "zod";

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().default("127.0.0.1"),
  /** Upper bound for one request, provider calls included */
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export interface LoadedConfig {
  server: ServerConfig;
  /** Datasource settings JSON, validated when the GCP client is built */
  settings: unknown;
  secure: { privateKey?: string };
}

/**
 * Read the server configuration from the environment.
 *
 * CLOUDLOG_SETTINGS holds the datasource settings as JSON and
 * CLOUDLOG_PRIVATE_KEY the service account key.
 */
export function loadConfig(env: NodeJS.ProcessEnv): LoadedConfig {
  let settings: unknown = {};
  if (env.CLOUDLOG_SETTINGS) {
    try {
      settings = JSON.parse(env.CLOUDLOG_SETTINGS);
    } catch (err) {
      throw new Error("Failed to parse CLOUDLOG_SETTINGS as JSON", { cause: err });
    }
  }

  const server = ServerConfigSchema.parse({
    port: env.CLOUDLOG_PORT,
    host: env.CLOUDLOG_HOST,
    requestTimeoutMs: env.CLOUDLOG_REQUEST_TIMEOUT_MS,
  });

  const secure = env.CLOUDLOG_PRIVATE_KEY ? { privateKey: env.CLOUDLOG_PRIVATE_KEY } : {};

  return { server, settings, secure };
}

import type { DatasourceSettings, DefaultProjectResolver } from "@cloudlog/adapters-common";
import { CloudLoggingClient } from "./logging/cloud-logging-client";
import { ProtoPayloadDecoder } from "./logging/proto-payload-decoder";
import { resolveClientConfig } from "./auth/credentials";
import { createGceDefaultProjectResolver } from "./auth/default-project";

// Re-export classes
export { CloudLoggingClient } from "./logging/cloud-logging-client";
export { ProtoPayloadDecoder, AUDIT_LOG_TYPE_URL, loadPayloadProtos } from "./logging/proto-payload-decoder";
export { MissingCredentialsError, resolveClientConfig } from "./auth/credentials";
export { createGceDefaultProjectResolver } from "./auth/default-project";
export { toRawLogRecord, structToObject, toDate, toSeverity } from "./logging/entry-converter";

// Re-export types
export type { CloudLoggingClientConfig } from "./logging/cloud-logging-client";
export type { LogEntryLike, StructLike, StructValueLike, TimestampLike } from "./logging/entry-converter";

/**
 * Everything a datasource instance needs from GCP.
 */
export interface GcpDatasourceDeps {
  settings: DatasourceSettings;
  client: CloudLoggingClient;
  decoder: ProtoPayloadDecoder;
  resolveDefaultProject: DefaultProjectResolver;
}

/**
 * Create the GCP collaborators for a datasource from its saved settings.
 *
 * @param rawSettings - Settings JSON from the configuration editor
 * @param rawSecure - Decrypted secure settings (private key)
 * @throws MissingCredentialsError when JWT auth has no private key
 */
export function createGcpDatasourceDeps(rawSettings: unknown, rawSecure: unknown): GcpDatasourceDeps {
  const { settings, clientConfig } = resolveClientConfig(rawSettings, rawSecure);
  return {
    settings,
    client: new CloudLoggingClient(clientConfig),
    decoder: new ProtoPayloadDecoder(),
    resolveDefaultProject: createGceDefaultProjectResolver(),
  };
}

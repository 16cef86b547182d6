import {
  DatasourceSettingsSchema,
  SecureSettingsSchema,
  type DatasourceSettings,
  type SecureSettings,
} from "@cloudlog/adapters-common";
import type { CloudLoggingClientConfig } from "../logging/cloud-logging-client";

export class MissingCredentialsError extends Error {
  constructor() {
    super("missing credentials");
    this.name = "MissingCredentialsError";
  }
}

/**
 * Build client options from the datasource settings.
 *
 * JWT authentication uses the configured service account and requires the
 * private key; GCE authentication falls back to Application Default Credentials.
 *
 * @throws MissingCredentialsError when JWT is selected without a private key
 */
export function resolveClientConfig(
  rawSettings: unknown,
  rawSecure: unknown
): { settings: DatasourceSettings; clientConfig: CloudLoggingClientConfig } {
  const settings = DatasourceSettingsSchema.parse(rawSettings ?? {});
  const secure: SecureSettings = SecureSettingsSchema.parse(rawSecure ?? {});

  if (settings.authenticationType === "gce") {
    return { settings, clientConfig: {} };
  }

  if (!secure.privateKey) {
    throw new MissingCredentialsError();
  }

  const clientConfig: CloudLoggingClientConfig = {
    credentials: {
      client_email: settings.clientEmail,
      private_key: secure.privateKey,
    },
  };
  if (settings.defaultProject) {
    clientConfig.projectId = settings.defaultProject;
  }

  return { settings, clientConfig };
}

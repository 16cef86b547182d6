// Interfaces
export type {
  ICloudLoggingClient,
  CallOptions,
  DefaultProjectResolver,
} from "./interfaces/logging-client";
export type { IPayloadDecoder } from "./interfaces/payload-decoder";

// Types
export { LOG_SEVERITIES } from "./types/logging";
export type {
  LogSeverity,
  LogResource,
  LogPayload,
  RawLogRecord,
  NormalizedRecord,
  ListLogsPageRequest,
  LogPage,
} from "./types/logging";
export {
  AuthenticationTypeSchema,
  DatasourceSettingsSchema,
  SecureSettingsSchema,
} from "./types/settings";
export type {
  AuthenticationType,
  DatasourceSettings,
  SecureSettings,
} from "./types/settings";

// Errors
export {
  DatasourceError,
  DatasourceErrorCode,
  ClientInputError,
  MissingParameterError,
  ProviderError,
  DecodeError,
  EncodingError,
  CancelledError,
  errorMessage,
} from "./errors";

// Logging
export { createConsoleLogger, silentLogger } from "./logger";
export type { ILogger } from "./logger";

// Utilities
export { throwIfCancelled, withAbort } from "./utils/abort";

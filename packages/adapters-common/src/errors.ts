/**
 * Error kinds raised by the datasource pipeline.
 */
export enum DatasourceErrorCode {
  CLIENT_INPUT = "CLIENT_INPUT",
  MISSING_PARAMETER = "MISSING_PARAMETER",
  PROVIDER = "PROVIDER",
  DECODE = "DECODE",
  ENCODING = "ENCODING",
  CANCELLED = "CANCELLED",
}

export class DatasourceError extends Error {
  constructor(
    message: string,
    public readonly code: DatasourceErrorCode,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "DatasourceError";
  }
}

/**
 * A query payload that could not be parsed or validated.
 */
export class ClientInputError extends DatasourceError {
  constructor(message: string, originalError?: unknown) {
    super(message, DatasourceErrorCode.CLIENT_INPUT, originalError);
    this.name = "ClientInputError";
  }
}

/**
 * A resource call without one of its required parameters.
 */
export class MissingParameterError extends DatasourceError {
  constructor(public readonly parameter: string) {
    super(`Missing required parameter: ${parameter}`, DatasourceErrorCode.MISSING_PARAMETER);
    this.name = "MissingParameterError";
  }
}

/**
 * A failed call to the log provider. The message names the operation
 * followed by the provider's own message, e.g. "listing logs: permission denied".
 */
export class ProviderError extends DatasourceError {
  constructor(
    public readonly operation: string,
    originalError: unknown
  ) {
    super(`${operation}: ${errorMessage(originalError)}`, DatasourceErrorCode.PROVIDER, originalError);
    this.name = "ProviderError";
  }
}

/**
 * A single log record whose payload could not be turned into a body.
 */
export class DecodeError extends DatasourceError {
  constructor(
    message: string,
    public readonly recordId: string,
    originalError?: unknown
  ) {
    super(message, DatasourceErrorCode.DECODE, originalError);
    this.name = "DecodeError";
  }
}

export class EncodingError extends DatasourceError {
  constructor(message: string, originalError?: unknown) {
    super(message, DatasourceErrorCode.ENCODING, originalError);
    this.name = "EncodingError";
  }
}

/**
 * The caller's signal fired before the operation finished.
 */
export class CancelledError extends DatasourceError {
  constructor(operation: string, reason?: unknown) {
    super(`${operation}: cancelled`, DatasourceErrorCode.CANCELLED, reason);
    this.name = "CancelledError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

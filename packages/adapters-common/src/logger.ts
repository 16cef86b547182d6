/** Logger used across the datasource packages */
export interface ILogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(prefix: string): ILogger {
  const tag = `[${prefix}]`;
  return {
    info: (msg, ...args) => console.log(tag, msg, ...args),
    warn: (msg, ...args) => console.warn(tag, msg, ...args),
    error: (msg, ...args) => console.error(tag, msg, ...args),
    debug: (msg, ...args) => console.debug(tag, msg, ...args),
  };
}

/** Discards everything. */
export const silentLogger: ILogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

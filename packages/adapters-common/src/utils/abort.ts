import { CancelledError } from "../errors";

/**
 * Throw a CancelledError if the signal has already fired.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation, signal.reason);
  }
}

/**
 * Settle with `promise`, or reject with a CancelledError as soon as the
 * signal fires. The underlying call is abandoned, not stopped.
 */
export async function withAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  operation: string
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // abandoned: nobody awaits it after this
    promise.catch(() => undefined);
    throw new CancelledError(operation, signal.reason);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CancelledError(operation, signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  }
}

import { ERRORS } from "./constants";
import { networkError } from "./errors";
import type { ProtocolError } from "./errors";

export function abortedError(signal?: AbortSignal): ProtocolError {
  return networkError(ERRORS.ABORTED, {
    code: "ABORTED",
    cause: signal?.reason,
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortedError(signal);
  }
}

/**
 * Settle with `promise` unless `signal` aborts first. The underlying work is
 * not cancelled; its late result is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // Observe the abandoned promise so its rejection is not reported as unhandled
    promise.catch(() => undefined);
    return Promise.reject(abortedError(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortedError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

import { CancelledError } from "./errors.js";

/** Throw CancelledError if the signal has fired. No-op without a signal. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(signal.reason);
  }
}

import {ErrorAborted} from "./errors.js";

/**
 * Resolve after `ms`, or reject with `ErrorAborted` once `signal` aborts.
 * The timer and the abort listener are both released whichever settles first.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms < 0) {
    return;
  }

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ErrorAborted());
      return;
    }

    const settle = (aborted: boolean): void => {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
      if (aborted) reject(new ErrorAborted());
      else resolve();
    };
    const onAbort = (): void => settle(true);
    const timeout = setTimeout(() => settle(false), ms);
    signal?.addEventListener("abort", onAbort);
  });
}

export class TimeoutError extends Error {
  constructor(message = "timeout") {
    super(message);
    this.name = "TimeoutError";
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

const abortReason = (signal: AbortSignal): unknown => signal.reason ?? new Error("aborted");

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timeout);
      reject(signal ? abortReason(signal) : new Error("aborted"));
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Signal that aborts with a TimeoutError after `ms`. Call `clear` once the
 * guarded work settles so the deadline timer does not outlive it.
 */
export const createTimeoutSignal = (ms: number): { signal: AbortSignal; clear: () => void } => {
  const controller = new AbortController();
  if (!Number.isFinite(ms) || ms <= 0) {
    controller.abort(new TimeoutError());
    return { signal: controller.signal, clear: () => undefined };
  }
  const timeout = setTimeout(() => controller.abort(new TimeoutError()), ms);
  controller.signal.addEventListener("abort", () => clearTimeout(timeout), { once: true });
  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
};

export const combineSignals = (
  signals: Array<AbortSignal | undefined>,
): { signal: AbortSignal; cleanup: () => void } => {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(abortReason(signal));
      break;
    }
    const onAbort = () => controller.abort(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    cleanup: () => cleanups.forEach((fn) => fn()),
  };
};

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts, for work that does not watch the signal itself.
 */
export const raceSignal = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
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
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });

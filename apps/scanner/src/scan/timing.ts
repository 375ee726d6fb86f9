import { ScanCancelledError } from "./errors";

/** Resolves after `ms`, or rejects with ScanCancelledError once `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ScanCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScanCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const createAbortController = (timeoutMs: number, onTimeout: () => Error) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(onTimeout());
  }, timeoutMs);

  const cleanup = () => clearTimeout(timeout);

  return { controller, cleanup };
};

/**
 * Runs `task` with a signal that aborts after `timeoutMs`, or with a
 * ScanCancelledError as soon as `parent` aborts. The returned promise rejects
 * with the abort reason right away, even when the task ignores its signal.
 */
export const runWithTimeout = <T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal,
): Promise<T> => {
  const { controller, cleanup } = createAbortController(timeoutMs, onTimeout);
  const signal = controller.signal;
  const onParentAbort = () => controller.abort(new ScanCancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      parent?.removeEventListener("abort", onParentAbort);
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener("abort", onParentAbort, { once: true });

    const settle = () => {
      cleanup();
      signal.removeEventListener("abort", onAbort);
      parent?.removeEventListener("abort", onParentAbort);
    };

    void Promise.resolve()
      .then(() => task(signal))
      .then(
        (value) => {
          settle();
          resolve(value);
        },
        (error: unknown) => {
          settle();
          reject(error);
        },
      );
  });
};

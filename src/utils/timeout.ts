import { AbortedError, TimeoutError } from "./errors.js";

/**
 * Run an abortable operation with a deadline.
 *
 * The operation gets its own AbortSignal, aborted when the deadline passes
 * or the parent signal aborts. Rejects with TimeoutError or AbortedError
 * respectively, without waiting for the operation to notice.
 */
export function withTimeout<T>(
  what: string,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (parent?.aborted) {
      reject(new AbortedError(what, parent.reason));
      return;
    }

    const controller = new AbortController();
    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
    };
    const onAbort = () => {
      cleanup();
      controller.abort(parent?.reason);
      reject(new AbortedError(what, parent?.reason));
    };
    const timer = setTimeout(() => {
      cleanup();
      const err = new TimeoutError(what, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    parent?.addEventListener("abort", onAbort, { once: true });

    fn(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

import { RunCancelledError, TimeoutError } from "../errors.js";

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `task` with a signal that aborts when either the parent signal fires
 * or `timeoutMs` elapses. Rejects with TimeoutError or RunCancelledError even
 * if the task ignores its signal. The timer and listener are always released.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal: parent }: DeadlineOptions
): Promise<T> {
  throwIfCancelled(parent);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs);
      reject(err);
      controller.abort(err);
    }, timeoutMs);

    if (parent) {
      onAbort = () => {
        const err = new RunCancelledError(undefined, { cause: parent.reason });
        reject(err);
        controller.abort(err);
      };
      parent.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onAbort) parent.removeEventListener("abort", onAbort);
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError(undefined, { cause: signal.reason });
  }
}

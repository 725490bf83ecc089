import { DispatchCancelledError, StageTimeoutError } from './errors.js';

export type StageWork<T> = (signal: AbortSignal) => T | Promise<T>;

/**
 * Run one suspension point with its own AbortController, linked to the
 * caller's signal and a timer. Settles as soon as either fires, even if
 * `work` ignores its signal.
 *
 * Rejects with StageTimeoutError on timeout and DispatchCancelledError when
 * `parent` aborts.
 */
export async function runWithDeadline<T>(
  stage: string,
  timeoutMs: number,
  work: StageWork<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new DispatchCancelledError(stage, { cause: parent.reason });
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new StageTimeoutError(stage, timeoutMs);
      reject(err);
      controller.abort(err);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const err = new DispatchCancelledError(stage, { cause: parent.reason });
        reject(err);
        controller.abort(err);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([Promise.resolve().then(() => work(controller.signal)), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
  }
}

export function isCancellation(err: unknown): err is DispatchCancelledError {
  return err instanceof DispatchCancelledError;
}

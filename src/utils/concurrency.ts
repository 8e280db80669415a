/**
 * Bounded fan-out and per-call deadlines for boundary calls.
 */

import { RequestDeadlineError, TimeoutError } from '../errors.js';

/**
 * Map over items with at most `limit` calls in flight.
 * Results keep input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from(
    { length: Math.min(Math.max(1, limit), items.length) },
    () => worker()
  );
  await Promise.all(workers);
  return results;
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs` or when the
 * parent signal aborts, whichever comes first. Rejects with TimeoutError on
 * the timeout; with the parent's reason when the parent aborts.
 *
 * The race does not rely on `fn` honouring the signal: a call that ignores it
 * is abandoned, not awaited.
 */
export function runWithTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(abortReason(parent));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = new TimeoutError(operation, timeoutMs);
      controller.abort(err);
      settle(() => reject(err));
    }, timeoutMs);

    const onParentAbort = () => {
      const reason = parent ? abortReason(parent) : abortError();
      controller.abort(reason);
      settle(() => reject(reason));
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let settled = false;
    function settle(action: () => void): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      action();
    }

    fn(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (err: unknown) => settle(() => reject(err))
    );
  });
}

export interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Signal that aborts with RequestDeadlineError after `timeoutMs`, or with the
 * parent's reason if the parent aborts first. `dispose` clears the timer.
 */
export function startDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new RequestDeadlineError(timeoutMs)),
    timeoutMs
  );
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/** True when the error came from a per-call timeout or an aborted signal. */
export function isAbortLike(err: unknown): boolean {
  return (
    err instanceof TimeoutError ||
    err instanceof RequestDeadlineError ||
    (err instanceof Error && err.name === 'AbortError')
  );
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : abortError();
}

function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

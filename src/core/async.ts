import { DeadlineExceededError } from "./errors.js";

export async function asyncPool<T, R>(
  concurrency: number,
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  // One iterator shared by all workers: each entry is taken exactly once.
  const entries = items.entries();

  async function runOne() {
    for (const [i, item] of entries) {
      results[i] = await worker(item, i);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => runOne());
  await Promise.all(workers);
  return results;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((res, rej) => {
    if (signal?.aborted) {
      rej(new DeadlineExceededError("sleep"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      rej(new DeadlineExceededError("sleep"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      res();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settles with `promise`, unless `signal` aborts first. The pending call is abandoned, not
 * cancelled: its late result or rejection is ignored.
 */
export function withDeadline<T>(promise: Promise<T>, signal: AbortSignal | undefined, operation = "operation"): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new DeadlineExceededError(operation));
  }

  return new Promise<T>((res, rej) => {
    const onAbort = () => rej(new DeadlineExceededError(operation));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        res(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        rej(e);
      }
    );
  });
}

/** Timeout signal that also aborts when `parent` does. */
export function deadlineSignal(ms: number, parent?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(ms);
  return parent ? AbortSignal.any([parent, timeout]) : timeout;
}

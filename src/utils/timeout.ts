import { setTimeout as delay } from 'timers/promises';
import { PipelineInterrupted, TimeoutError } from '../errors.js';

/**
 * Run a task with an optional deadline. The task gets a signal that fires
 * on timeout or when `parent` aborts; the returned promise rejects right
 * away in both cases instead of waiting for the task to notice.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const onParentAbort = () => {
      const reason: unknown = parent?.reason;
      const error =
        reason instanceof Error ? reason : new PipelineInterrupted();
      controller.abort(error);
      reject(error);
    };

    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    };

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new TimeoutError(label, timeoutMs);
        controller.abort(error);
        cleanup();
        reject(error);
      }, timeoutMs);
    }

    void task(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}

/**
 * Like `withTimeout`, but when the deadline or the parent abort wins, wait
 * for the abandoned task to settle before rejecting. Engine calls that
 * create something go through here so nothing appears after the caller
 * has already swept.
 */
export async function withTimeoutSettled<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  const started: Array<Promise<T>> = [];
  try {
    return await withTimeout(
      (signal) => {
        const pending = task(signal);
        started.push(pending);
        return pending;
      },
      timeoutMs,
      label,
      parent,
    );
  } catch (error) {
    await Promise.allSettled(started);
    throw error;
  }
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (!signal?.aborted) {
    return;
  }
  const reason: unknown = signal.reason;
  throw reason instanceof Error ? reason : new PipelineInterrupted();
}

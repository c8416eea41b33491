/**
 * @file Async Utilities
 * @description Per-key sequencing, deadlines and retries for background work
 * @depends cancellation
 *
 * Key pieces:
 * - SequencerByKey: Runs tasks for the same key strictly in order, different keys independently
 * - withTimeout: Races a cancellable task against a deadline and aborts it on expiry
 * - retry: Exponential backoff for flaky network calls
 */

import { LinkedAbortSource } from './cancellation';

// ============ Sequencer ============

/**
 * SequencerByKey maintains one promise chain per key.
 * A failed task never blocks the tasks queued after it.
 *
 * Use case: per-session history mutations, where sessions must not wait on each other.
 *
 * @example
 * ```typescript
 * const sequencer = new SequencerByKey<string>();
 * await sequencer.queue(sessionId, async () => history.push(message));
 * ```
 */
export class SequencerByKey<TKey> {
  private promiseMap = new Map<TKey, Promise<unknown>>();

  queue<T>(key: TKey, promiseTask: () => T | Promise<T>): Promise<T> {
    const runningPromise = this.promiseMap.get(key) ?? Promise.resolve();
    const newPromise = runningPromise
      .catch(() => undefined)
      .then(promiseTask)
      .finally(() => {
        if (this.promiseMap.get(key) === newPromise) {
          this.promiseMap.delete(key);
        }
      });
    this.promiseMap.set(key, newPromise);
    return newPromise;
  }
}

// ============ Utility Functions ============

/**
 * Creates a promise that resolves after a delay.
 */
export function timeout(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a cancellable task with a deadline.
 * On expiry the task's signal is aborted and the promise rejects with `onTimeout()`.
 *
 * @param task Receives a signal that aborts on deadline or parent abort
 * @param ms Deadline in milliseconds
 * @param onTimeout Builds the rejection error
 * @param parent Optional caller signal
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  const source = new LinkedAbortSource(parent);

  return new Promise<T>((resolve, reject) => {
    const handle = setTimeout(() => {
      source.abort();
      reject(onTimeout());
    }, ms);

    task(source.signal).then(
      (value) => {
        clearTimeout(handle);
        source.dispose();
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(handle);
        source.dispose();
        reject(error);
      }
    );
  });
}

/**
 * Retry an async operation with exponential backoff.
 */
export async function retry<T>(
  factory: () => Promise<T>,
  options: { retries: number; delay: number; multiplier?: number } = {
    retries: 3,
    delay: 100,
    multiplier: 2,
  }
): Promise<T> {
  const { retries, delay, multiplier = 2 } = options;
  let lastError: unknown;

  for (let i = 0; i <= retries; i++) {
    try {
      return await factory();
    } catch (err) {
      lastError = err;
      if (i < retries) {
        await timeout(delay * Math.pow(multiplier, i));
      }
    }
  }

  throw lastError;
}

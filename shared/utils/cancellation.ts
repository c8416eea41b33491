/**
 * @file Cancellation
 * @description Cooperative cancellation on top of AbortSignal (generation streams, context fetches)
 * @depends lifecycle
 */

import type { IDisposable } from './lifecycle';

// ====== Linked Abort Source ======

/**
 * AbortController that follows an optional parent signal.
 *
 * @example
 * ```typescript
 * const source = new LinkedAbortSource(callerSignal);
 * try {
 *   await generate({ abortSignal: source.signal });
 * } finally {
 *   source.dispose();
 * }
 * ```
 */
export class LinkedAbortSource implements IDisposable {
  private readonly controller = new AbortController();
  private readonly parent?: AbortSignal;
  private readonly onParentAbort = (): void => this.abort();

  /**
   * @param parent Parent signal; aborting it aborts this source too
   */
  constructor(parent?: AbortSignal) {
    this.parent = parent;
    if (parent?.aborted) {
      this.controller.abort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  abort(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancellationError());
    }
  }

  /**
   * Detach from the parent signal
   * @param abort Abort before detaching
   */
  dispose(abort = false): void {
    if (abort) {
      this.abort();
    }
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}

// ====== CancellationError ======

export class CancellationError extends Error {
  constructor(message = 'Cancelled') {
    super(message);
    this.name = 'CancellationError';
  }
}

// ====== Utility Functions ======

/**
 * Check if an error comes from cancellation (ours or a fetch/AI SDK AbortError)
 */
export function isCancellationError(error: unknown): boolean {
  return (
    error instanceof CancellationError ||
    (error instanceof Error && (error.name === 'CancellationError' || error.name === 'AbortError'))
  );
}

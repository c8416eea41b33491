/**
 * @file engine.ts - CLI engine lifecycle
 * @description Runs a command body against a fresh engine and always shuts it down; routes
 *   Ctrl-C to an AbortSignal.
 * @depends main/index
 */

import { type CreateEngineOptions, type Engine, createEngine } from '../../index';
import { Logger } from './logger';

export async function withEngine<T>(
  body: (engine: Engine) => Promise<T>,
  options: CreateEngineOptions = {}
): Promise<T> {
  const engine = await createEngine(options);
  try {
    return await body(engine);
  } finally {
    await engine.shutdown();
  }
}

/** First Ctrl-C aborts the signal; the handler is removed by `dispose` */
export function interruptSignal(): { signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
    },
  };
}

/** Report a failed command and set a failing exit code */
export function fail(error: unknown): void {
  Logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}

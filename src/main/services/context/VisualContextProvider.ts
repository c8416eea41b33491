/**
 * @file VisualContextProvider - Vision context client
 * @description Fetches the latest appearance description for a session from the vision
 *   service: `GET {baseUrl}/visual-context/{sessionId}`.
 * @depends zod, withTimeout
 */

import { z } from 'zod';
import { DEFAULT_CONTEXT_SERVICE_URL } from '../../../../shared/types/defaults';
import { withTimeout } from '../../../../shared/utils/async';
import { isCancellationError } from '../../../../shared/utils/cancellation';
import { createLogger } from '../LoggerService';
import { ContextFetchTimeout } from '../errors';
import type { AuxiliaryContext, IContextProvider } from '../interfaces/IContextProvider';

const logger = createLogger('VisualContextProvider');

const visualContextResponseSchema = z.object({
  available: z.boolean(),
  visual_context: z.string().nullish(),
});

const UNAVAILABLE: AuxiliaryContext = { text: '', available: false };

export class VisualContextProvider implements IContextProvider {
  private readonly baseUrl: string;

  constructor(baseUrl: string = DEFAULT_CONTEXT_SERVICE_URL) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getContext(sessionId: string, timeoutMs: number, signal?: AbortSignal): Promise<AuxiliaryContext> {
    return withTimeout(
      (taskSignal) => this.fetchContext(sessionId, taskSignal),
      timeoutMs,
      () => new ContextFetchTimeout(timeoutMs),
      signal
    );
  }

  private async fetchContext(sessionId: string, signal: AbortSignal): Promise<AuxiliaryContext> {
    const url = `${this.baseUrl}/visual-context/${encodeURIComponent(sessionId)}`;

    try {
      const response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal,
      });
      if (!response.ok) {
        logger.warn(`[VisualContextProvider] Context service answered ${response.status}`, { sessionId });
        return UNAVAILABLE;
      }

      const parsed = visualContextResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn('[VisualContextProvider] Unexpected response shape', { sessionId });
        return UNAVAILABLE;
      }

      const text = parsed.data.visual_context?.trim() ?? '';
      if (!parsed.data.available || !text) {
        logger.debug('[VisualContextProvider] No visual context', { sessionId });
        return UNAVAILABLE;
      }

      logger.debug('[VisualContextProvider] Visual context fetched', { sessionId, length: text.length });
      return { text, available: true };
    } catch (error) {
      if (signal.aborted || isCancellationError(error)) {
        throw error;
      }
      logger.warn('[VisualContextProvider] Context service unreachable', {
        sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return UNAVAILABLE;
    }
  }
}

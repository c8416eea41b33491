/**
 * @file IRagService - Engine caller surface
 * @description Everything a transport (CLI, HTTP adapter, tests) needs: streamed queries,
 *   tone conversion, session history, index builds and health probes.
 * @depends RagService
 */

import type {
  BuildIndexResult,
  ClearHistoryResult,
  CloseSessionResult,
  HealthResult,
  HistoryResult,
  QueryRequestInput,
  QueryStreamChunk,
  ToneConversionRequest,
  ToneConversionResult,
  WarmupResult,
} from '../../../../shared/types/chat';
import type { IDisposable } from '../../../../shared/utils/lifecycle';

export interface IRagService extends IDisposable {
  /**
   * Load the persisted index. Failures are logged; the engine then answers without context.
   * @returns Whether an index is loaded
   */
  initialize(): Promise<boolean>;

  query(request: QueryRequestInput, signal?: AbortSignal): AsyncGenerator<QueryStreamChunk>;

  /**
   * Tone rewrite without retrieval.
   * @throws InvalidRequest for empty text or an unknown tone (buffered form only; the
   *   streamed form reports it as an error chunk)
   */
  convertTone(
    request: ToneConversionRequest & { stream: false },
    signal?: AbortSignal
  ): Promise<ToneConversionResult>;
  convertTone(
    request: ToneConversionRequest & { stream?: true },
    signal?: AbortSignal
  ): AsyncGenerator<QueryStreamChunk>;

  getHistory(sessionId: string): Promise<HistoryResult>;

  clearHistory(sessionId: string): Promise<ClearHistoryResult>;

  closeSession(sessionId: string): Promise<CloseSessionResult>;

  /**
   * @throws IndexBuildFailed when nothing can be loaded or the build fails; the previous
   *   index stays active
   */
  buildIndex(sourceDir: string, signal?: AbortSignal): Promise<BuildIndexResult>;

  health(): HealthResult;

  warmup(): Promise<WarmupResult>;
}

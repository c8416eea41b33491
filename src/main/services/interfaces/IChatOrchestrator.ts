/**
 * @file IChatOrchestrator - Query orchestration contract
 * @description One streamed reply per query: retrieval and grounded generation run alongside the
 *   auxiliary context fetch, then a tone-adapted rewrite streams back.
 * @depends ChatOrchestrator
 */

import type { QueryRequestInput, QueryStreamChunk } from '../../../../shared/types/chat';
import type { IDisposable } from '../../../../shared/utils/lifecycle';

export type OrchestratorState =
  | 'Idle'
  | 'FetchingAndGenerating'
  | 'ToneSelected'
  | 'Streaming'
  | 'Done'
  | 'Errored'
  | 'Aborted';

export interface QueryOptions {
  /** Aborting ends the stream without a terminal chunk */
  signal?: AbortSignal;
  onTransition?(from: OrchestratorState, to: OrchestratorState): void;
}

export interface IChatOrchestrator extends IDisposable {
  /**
   * Streams `token` chunks and ends with exactly one `end` or `error` chunk, unless aborted.
   * @sideeffect Appends the exchange to the session history after a successful reply only
   */
  query(request: QueryRequestInput, options?: QueryOptions): AsyncGenerator<QueryStreamChunk>;
}

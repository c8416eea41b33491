/**
 * @file IRetriever - Passage retrieval contract
 * @depends HybridRetriever
 */

import type { RetrievalResult } from '../knowledge/types';

export interface IRetriever {
  /** False until an index snapshot is loaded */
  isReady(): boolean;

  /**
   * Ranked passages, best first, without duplicates. Empty when no index is loaded.
   * @throws RetrievalUnavailable when the dense side cannot be reached
   */
  search(query: string, topK?: number, signal?: AbortSignal): Promise<RetrievalResult[]>;
}

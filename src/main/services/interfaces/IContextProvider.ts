/**
 * @file IContextProvider - Auxiliary user context contract
 * @description Supplies a description of the user (e.g. from a camera) for tone selection
 * @depends VisualContextProvider
 */

export interface AuxiliaryContext {
  /** '' when unavailable */
  text: string;
  available: boolean;
}

export interface IContextProvider {
  /**
   * Any failure other than the deadline resolves to an unavailable context.
   * @throws ContextFetchTimeout when `timeoutMs` elapses first
   */
  getContext(sessionId: string, timeoutMs: number, signal?: AbortSignal): Promise<AuxiliaryContext>;
}

/**
 * @file ChatSessionStore - Chat Session Memory Store
 * @description Per-session conversation history with a bounded length. Every mutation of a
 *   session runs through a per-key sequencer, so one session's writes never interleave and
 *   different sessions never wait on each other.
 * @depends ChatMessage, ChatSession, SequencerByKey, IDisposable
 */

import type { ChatMessage, ChatMessageRole, ChatSession } from '../../../../shared/types/chat';
import { DEFAULT_MAX_HISTORY } from '../../../../shared/types/defaults';
import { SequencerByKey } from '../../../../shared/utils/async';
import type { IDisposable } from '../../../../shared/utils/lifecycle';
import { createLogger } from '../LoggerService';

const logger = createLogger('ChatSessionStore');

export interface CloseResult {
  existed: boolean;
  cleared: number;
}

/**
 * Chat session storage
 */
export class ChatSessionStore implements IDisposable {
  /** Session storage (id -> session) */
  private sessions = new Map<string, ChatSession>();
  private readonly sequencer = new SequencerByKey<string>();

  /**
   * @param maxHistory Messages kept per session; the oldest exchanges go first
   */
  constructor(private readonly maxHistory = DEFAULT_MAX_HISTORY) {}

  // ============ Reads ============

  /** Copy of the history, oldest first; [] for an unknown session */
  async getHistory(sessionId: string): Promise<ChatMessage[]> {
    return this.sequencer.queue(sessionId, () =>
      (this.sessions.get(sessionId)?.history ?? []).map((message) => ({ ...message }))
    );
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  // ============ Writes ============

  async append(sessionId: string, role: ChatMessageRole, content: string): Promise<void> {
    await this.sequencer.queue(sessionId, () => {
      this.push(sessionId, [{ role, content }]);
    });
  }

  /**
   * Append a user turn and its reply as one unit.
   */
  async appendExchange(sessionId: string, user: string, assistant: string): Promise<void> {
    await this.sequencer.queue(sessionId, () => {
      this.push(sessionId, [
        { role: 'user', content: user },
        { role: 'assistant', content: assistant },
      ]);
    });
  }

  /**
   * Remove every message; the session itself stays.
   * @returns Number of messages removed
   */
  async clear(sessionId: string): Promise<number> {
    return this.sequencer.queue(sessionId, () => {
      const session = this.sessions.get(sessionId);
      if (!session) {
        return 0;
      }
      const cleared = session.history.length;
      session.history = [];
      session.lastActivity = Date.now();
      logger.info(`[ChatSessionStore] Cleared ${cleared} message(s) from ${sessionId}`);
      return cleared;
    });
  }

  /**
   * Forget the session entirely.
   */
  async close(sessionId: string): Promise<CloseResult> {
    return this.sequencer.queue(sessionId, () => {
      const session = this.sessions.get(sessionId);
      this.sessions.delete(sessionId);
      const result = { existed: session !== undefined, cleared: session?.history.length ?? 0 };
      logger.info(`[ChatSessionStore] Closed session ${sessionId}`, result);
      return result;
    });
  }

  private push(sessionId: string, messages: ChatMessage[]): void {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = { sessionId, history: [], lastActivity: Date.now() };
      this.sessions.set(sessionId, session);
      logger.debug(`[ChatSessionStore] Created session: ${sessionId}`);
    }

    session.history.push(...messages);
    let excess = session.history.length - this.maxHistory;
    if (excess > 0) {
      // Whole exchanges only: a reply never outlives its question
      while (excess < session.history.length && session.history[excess].role !== 'user') {
        excess++;
      }
      session.history.splice(0, excess);
    }
    session.lastActivity = Date.now();
  }

  // ============ Cleanup ============

  dispose(): void {
    this.sessions.clear();
    logger.info('[ChatSessionStore] Disposed');
  }
}

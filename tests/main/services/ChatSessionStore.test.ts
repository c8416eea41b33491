/**
 * @file ChatSessionStore.test.ts
 * @description Per-session history: bounded length, copies on read, clear/close semantics and
 *   ordered concurrent writes.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { ChatSessionStore } from '../../../src/main/services/chat/ChatSessionStore';

describe('ChatSessionStore', () => {
  let store: ChatSessionStore;

  beforeEach(() => {
    store = new ChatSessionStore(4);
  });

  it('should return an empty history for an unknown session without creating it', async () => {
    expect(await store.getHistory('nobody')).toEqual([]);
    expect(store.has('nobody')).toBe(false);
  });

  it('should append an exchange as a user/assistant pair', async () => {
    await store.appendExchange('s1', 'When?', 'In 1973.');

    expect(await store.getHistory('s1')).toEqual([
      { role: 'user', content: 'When?' },
      { role: 'assistant', content: 'In 1973.' },
    ]);
  });

  it('should drop the oldest messages beyond the limit', async () => {
    await store.appendExchange('s1', 'q1', 'a1');
    await store.appendExchange('s1', 'q2', 'a2');
    await store.appendExchange('s1', 'q3', 'a3');

    expect((await store.getHistory('s1')).map((m) => m.content)).toEqual(['q2', 'a2', 'q3', 'a3']);
  });

  it('should trim whole exchanges under an odd limit', async () => {
    const odd = new ChatSessionStore(3);

    await odd.appendExchange('s1', 'q1', 'a1');
    await odd.appendExchange('s1', 'q2', 'a2');

    expect(await odd.getHistory('s1')).toEqual([
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
    ]);
  });

  it('should hand out copies', async () => {
    await store.append('s1', 'user', 'original');
    const history = await store.getHistory('s1');
    history[0].content = 'changed';
    history.push({ role: 'assistant', content: 'extra' });

    expect(await store.getHistory('s1')).toEqual([{ role: 'user', content: 'original' }]);
  });

  it('should keep sessions apart', async () => {
    await store.append('s1', 'user', 'one');
    await store.append('s2', 'user', 'two');

    expect(await store.getHistory('s1')).toEqual([{ role: 'user', content: 'one' }]);
    expect(store.sessionIds()).toEqual(['s1', 's2']);
  });

  it('should apply concurrent writes to one session in call order', async () => {
    await Promise.all([
      store.append('s1', 'user', 'first'),
      store.append('s1', 'assistant', 'second'),
      store.append('s1', 'user', 'third'),
    ]);

    expect((await store.getHistory('s1')).map((m) => m.content)).toEqual(['first', 'second', 'third']);
  });

  describe('clear', () => {
    it('should remove the messages and keep the session', async () => {
      await store.appendExchange('s1', 'q', 'a');

      expect(await store.clear('s1')).toBe(2);
      expect(await store.getHistory('s1')).toEqual([]);
      expect(store.has('s1')).toBe(true);
    });

    it('should report 0 for an unknown session', async () => {
      expect(await store.clear('nobody')).toBe(0);
    });
  });

  describe('close', () => {
    it('should forget the session and report what it held', async () => {
      await store.appendExchange('s1', 'q', 'a');

      expect(await store.close('s1')).toEqual({ existed: true, cleared: 2 });
      expect(store.has('s1')).toBe(false);
    });

    it('should be idempotent', async () => {
      await store.appendExchange('s1', 'q', 'a');
      await store.close('s1');

      expect(await store.close('s1')).toEqual({ existed: false, cleared: 0 });
    });
  });

  it('should drop every session on dispose', async () => {
    await store.append('s1', 'user', 'x');

    store.dispose();

    expect(store.sessionIds()).toEqual([]);
  });
});

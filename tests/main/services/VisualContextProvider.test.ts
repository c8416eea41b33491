/**
 * @file VisualContextProvider.test.ts
 * @description Vision service client: request URL, response mapping, failure degradation and
 *   the deadline. fetch is stubbed.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { VisualContextProvider } from '../../../src/main/services/context/VisualContextProvider';
import { ContextFetchTimeout } from '../../../src/main/services/errors';

const UNAVAILABLE = { text: '', available: false };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Never answers; rejects once its signal aborts */
function hangingFetch(_input: RequestInfo | URL, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
  });
}

describe('VisualContextProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const provider = new VisualContextProvider('http://vision.test:8000//');

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request the session path with the session id encoded', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ available: false }));

    await provider.getContext('visitor 7/a', 1000);

    expect(fetchMock.mock.calls[0][0]).toBe('http://vision.test:8000/visual-context/visitor%207%2Fa');
    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ Accept: 'application/json' });
  });

  it('should return the trimmed description when available', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ available: true, visual_context: '  A girl with pigtails \n' })
    );

    expect(await provider.getContext('s1', 1000)).toEqual({
      text: 'A girl with pigtails',
      available: true,
    });
  });

  it.each([
    ['unavailable', { available: false, visual_context: 'stale' }],
    ['blank', { available: true, visual_context: '   ' }],
    ['null', { available: true, visual_context: null }],
    ['malformed', { status: 'ok' }],
  ])('should map a %s description to unavailable', async (_label, body) => {
    fetchMock.mockResolvedValue(jsonResponse(body));

    expect(await provider.getContext('s1', 1000)).toEqual(UNAVAILABLE);
  });

  it('should map an error status to unavailable', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 503 }));

    expect(await provider.getContext('s1', 1000)).toEqual(UNAVAILABLE);
  });

  it('should map a network failure to unavailable', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    expect(await provider.getContext('s1', 1000)).toEqual(UNAVAILABLE);
  });

  it('should reject with ContextFetchTimeout at the deadline and abort the request', async () => {
    fetchMock.mockImplementation(hangingFetch);

    const attempt = provider.getContext('s1', 20);

    await expect(attempt).rejects.toBeInstanceOf(ContextFetchTimeout);
    await expect(attempt).rejects.toMatchObject({ timeoutMs: 20 });
    expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it('should pass a caller abort through', async () => {
    fetchMock.mockImplementation(hangingFetch);
    const controller = new AbortController();

    const attempt = provider.getContext('s1', 1000, controller.signal);
    controller.abort();

    await expect(attempt).rejects.not.toBeInstanceOf(ContextFetchTimeout);
  });
});

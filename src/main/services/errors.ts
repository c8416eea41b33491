/**
 * @file errors - Engine error taxonomy
 * @description Typed failures raised by indexing, retrieval, context fetch and generation,
 *   plus the mapping from any thrown value to the stream error payload.
 */

import type { StreamErrorPayload } from '../../../shared/types/chat';

export type EngineErrorCode =
  | 'INDEX_BUILD_FAILED'
  | 'RETRIEVAL_UNAVAILABLE'
  | 'CONTEXT_FETCH_TIMEOUT'
  | 'GENERATION_FAILED'
  | 'INVALID_REQUEST';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Build aborted; the previously active index stays in use */
export class IndexBuildFailed extends EngineError {
  readonly code = 'INDEX_BUILD_FAILED';
}

/** Query embedding or dense search unreachable */
export class RetrievalUnavailable extends EngineError {
  readonly code = 'RETRIEVAL_UNAVAILABLE';
}

export class ContextFetchTimeout extends EngineError {
  readonly code = 'CONTEXT_FETCH_TIMEOUT';

  constructor(public readonly timeoutMs: number) {
    super(`Context fetch exceeded ${timeoutMs}ms`);
  }
}

export class GenerationFailed extends EngineError {
  readonly code = 'GENERATION_FAILED';
}

export class InvalidRequest extends EngineError {
  readonly code = 'INVALID_REQUEST';

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Map provider error text to a message a caller can act on.
 */
export function describeProviderError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);

  if (message.includes('insufficient') || message.includes('balance')) {
    return 'Insufficient balance, please top up';
  }
  if (message.includes('rate limit') || message.includes('429')) {
    return 'Rate limit exceeded, please retry later';
  }
  if (message.includes('401') || message.includes('Unauthorized')) {
    return 'Invalid or expired API Key';
  }
  if (message.includes('timeout') || message.includes('ETIMEDOUT')) {
    return 'Request timeout, check network connection';
  }
  if (message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
    return 'Model backend unreachable';
  }
  return message;
}

export function toErrorPayload(error: unknown): StreamErrorPayload {
  if (isEngineError(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : String(error) };
}

/**
 * @file LoggerService.test.ts
 * @description Redaction of secrets in log messages and structured data
 */

import { describe, expect, it } from 'vitest';
import { redactSensitiveData, redactStringValue } from '../../../src/main/services/LoggerService';

describe('redactStringValue', () => {
  it('should keep the key prefix and mask the rest', () => {
    expect(redactStringValue('key sk-abcdefghijklmnop1234')).toBe('key sk-abcdefghij***REDACTED***');
  });

  it('should mask the local part of email addresses', () => {
    expect(redactStringValue('mail jane.doe@example.org')).toBe('mail jan***@example.org');
  });

  it('should leave ordinary text alone', () => {
    expect(redactStringValue('Indexed 3 documents')).toBe('Indexed 3 documents');
  });
});

describe('redactSensitiveData', () => {
  it('should redact sensitive fields at any depth', () => {
    expect(
      redactSensitiveData({
        apiKey: 'test-secret',
        nested: { password: '' },
        note: 'plain',
      })
    ).toEqual({
      apiKey: 'tes***REDACTED***',
      nested: { password: '***REDACTED***' },
      note: 'plain',
    });
  });

  it('should reduce errors to name and message', () => {
    expect(redactSensitiveData(new TypeError('bad input'))).toEqual({
      name: 'TypeError',
      message: 'bad input',
    });
  });

  it('should stop at the depth limit', () => {
    let deep: unknown = 'leaf';
    for (let i = 0; i < 12; i++) {
      deep = [deep];
    }
    const flattened = JSON.stringify(redactSensitiveData(deep));
    expect(flattened).toContain('[MAX_DEPTH_EXCEEDED]');
    expect(flattened).not.toContain('leaf');
  });
});

/**
 * Logger Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { redactSensitive } from '../../../src/utils/logger.js';

describe('redactSensitive', () => {
  it('replaces credential values regardless of key case', () => {
    expect(redactSensitive({
      user: 'fan@example.test',
      password: 'test-secret',
      Token: 'token-abc',
      Authorization: 'Bearer token-abc',
      api_key: 'test-api-key',
    })).toEqual({
      user: 'fan@example.test',
      password: '[redacted]',
      Token: '[redacted]',
      Authorization: '[redacted]',
      api_key: '[redacted]',
    });
  });

  it('does not modify its input', () => {
    const meta = { password: 'test-secret' };

    redactSensitive(meta);

    expect(meta.password).toBe('test-secret');
  });
});

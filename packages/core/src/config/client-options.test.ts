import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { validateClientOptions } from './client-options.js';

describe('validateClientOptions', () => {
  it('should fill in defaults', () => {
    expect(validateClientOptions({ clientId: 'test-client', clientSecret: 'test-secret' })).toEqual({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      userAgent: 'reddit-relay/0.1',
      connLimit: 10_000,
      responseHeaderTimeoutMs: 5_000,
      idleConnTimeoutMs: 60_000,
      backoffScheduleMs: [4_000, 8_000, 16_000],
      safetyBuffer: 50,
      abnormalUsageThreshold: 2_000,
      storeFailureMode: 'fail-closed',
    });
  });

  it('should keep explicit values', () => {
    const options = validateClientOptions({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      backoffScheduleMs: [],
      storeFailureMode: 'fail-open',
    });

    expect(options.backoffScheduleMs).toEqual([]);
    expect(options.storeFailureMode).toBe('fail-open');
  });

  it('should reject empty credentials', () => {
    expect(() => validateClientOptions({ clientId: 'test-client', clientSecret: '' })).toThrow(
      ZodError,
    );
  });

  it('should reject a non-positive connection limit', () => {
    expect(() =>
      validateClientOptions({ clientId: 'test-client', clientSecret: 'test-secret', connLimit: 0 }),
    ).toThrow(ZodError);
  });
});

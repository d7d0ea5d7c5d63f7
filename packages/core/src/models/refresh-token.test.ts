import { describe, it, expect } from 'vitest';
import { extractRefreshToken } from './refresh-token.js';

describe('extractRefreshToken', () => {
  it('should map the token response', () => {
    expect(
      extractRefreshToken({
        access_token: 'test-access-token',
        token_type: 'bearer',
        expires_in: 86400,
        scope: 'identity',
      }),
    ).toEqual({
      accessToken: 'test-access-token',
      refreshToken: '',
      expiresIn: 86400,
      scope: 'identity',
    });
  });

  it('should return empty tokens for an unexpected document', () => {
    expect(extractRefreshToken('error')).toEqual({
      accessToken: '',
      refreshToken: '',
      expiresIn: 0,
      scope: '',
    });
  });
});

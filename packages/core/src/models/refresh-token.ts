import { z } from 'zod';
import { count, text } from './fields.js';

const RefreshTokenSchema = z
  .object({
    access_token: text,
    refresh_token: text,
    expires_in: count,
    scope: text,
  })
  .catch({ access_token: '', refresh_token: '', expires_in: 0, scope: '' })
  .transform((data) => ({
    accessToken: data.access_token,
    refreshToken: data.refresh_token,
    /** Seconds until the access token expires */
    expiresIn: data.expires_in,
    scope: data.scope,
  }));

export type RefreshTokenResponse = z.output<typeof RefreshTokenSchema>;

export function extractRefreshToken(document: unknown): RefreshTokenResponse {
  return RefreshTokenSchema.parse(document);
}

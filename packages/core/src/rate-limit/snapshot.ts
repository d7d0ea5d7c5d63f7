import { z } from 'zod';
import {
  RATE_LIMIT_REMAINING_HEADER,
  RATE_LIMIT_RESET_HEADER,
  RATE_LIMIT_USED_HEADER,
} from '../stores/rate-limit-config.js';

/**
 * Rate-limit state reported by the server on one response. When `present` is
 * false the server sent no rate-limit headers and the other fields mean
 * nothing.
 */
export interface RateLimitSnapshot {
  /** Remaining quota; the server reports fractional units */
  remaining: number;
  used: number;
  /** Seconds until the quota window resets */
  reset: number;
  present: boolean;
  /** ISO time the snapshot was observed */
  timestamp: string;
}

const RateLimitSnapshotSchema = z.object({
  remaining: z.number(),
  used: z.number().int(),
  reset: z.number().int(),
  present: z.boolean(),
  timestamp: z.string(),
});

export const ABSENT_SNAPSHOT: RateLimitSnapshot = {
  remaining: 0,
  used: 0,
  reset: 0,
  present: false,
  timestamp: '',
};

function parseNumber(value: string | undefined, integer: boolean): number {
  if (value === undefined) return 0;
  const parsed = integer ? Number.parseInt(value, 10) : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Read the `x-ratelimit-*` headers. Header names must already be lower-cased.
 */
export function parseRateLimitHeaders(
  headers: Readonly<Record<string, string>>,
  now: Date = new Date(),
): RateLimitSnapshot {
  const remaining = headers[RATE_LIMIT_REMAINING_HEADER];
  if (remaining === undefined || remaining === '') {
    return ABSENT_SNAPSHOT;
  }

  return {
    remaining: parseNumber(remaining, false),
    used: parseNumber(headers[RATE_LIMIT_USED_HEADER], true),
    reset: parseNumber(headers[RATE_LIMIT_RESET_HEADER], true),
    present: true,
    timestamp: now.toISOString(),
  };
}

export function serializeSnapshot(snapshot: RateLimitSnapshot): string {
  return JSON.stringify(snapshot);
}

/** Inverse of `serializeSnapshot`; `undefined` for anything it did not write. */
export function deserializeSnapshot(value: string): RateLimitSnapshot | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return undefined;
  }
  const result = RateLimitSnapshotSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

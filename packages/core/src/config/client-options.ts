import { z } from 'zod';
import { DEFAULT_RATE_LIMIT_GATE } from '../stores/rate-limit-config.js';
import { DEFAULT_BACKOFF_SCHEDULE_MS } from '../http-client/sleep.js';
import { DEFAULT_TRANSPORT_OPTIONS } from '../http-client/transport.js';

const ClientOptionsSchema = z.object({
  clientId: z.string().min(1, 'clientId must not be empty'),
  clientSecret: z.string().min(1, 'clientSecret must not be empty'),
  userAgent: z
    .string()
    .min(1, 'userAgent must not be empty')
    .default(DEFAULT_TRANSPORT_OPTIONS.userAgent),
  /** Deployment-wide connection budget the pool sizes are derived from */
  connLimit: z.number().int().positive().default(10_000),
  responseHeaderTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TRANSPORT_OPTIONS.responseHeaderTimeoutMs),
  idleConnTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TRANSPORT_OPTIONS.idleConnTimeoutMs),
  backoffScheduleMs: z
    .array(z.number().int().nonnegative())
    .default([...DEFAULT_BACKOFF_SCHEDULE_MS]),
  safetyBuffer: z.number().nonnegative().default(DEFAULT_RATE_LIMIT_GATE.safetyBuffer),
  abnormalUsageThreshold: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_RATE_LIMIT_GATE.abnormalUsageThreshold),
  storeFailureMode: z
    .enum(['fail-closed', 'fail-open'])
    .default(DEFAULT_RATE_LIMIT_GATE.storeFailureMode),
});

export type RedditClientOptions = z.input<typeof ClientOptionsSchema>;
export type ResolvedClientOptions = z.output<typeof ClientOptionsSchema>;

/** Apply defaults and reject invalid options with a `ZodError`. */
export function validateClientOptions(options: RedditClientOptions): ResolvedClientOptions {
  return ClientOptionsSchema.parse(options);
}

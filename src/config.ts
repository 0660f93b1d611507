import { z } from 'zod';
import { ActivitySchema, StatusSchema } from '@/presence/models';
import { DEFAULT_INTENTS } from '@/gateway/intents';
import {
  API_HOST,
  API_VERSION,
  DEFAULT_LARGE_THRESHOLD,
  DEFAULT_REQUEST_TTL,
  USER_AGENT
} from '@/constants';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const RestOptionsSchema = z.object({
  apiVersion: z.number().int().positive().default(API_VERSION),
  host: z.string().min(1).default(API_HOST),
  /** Attempts per request before a `ServerError` is thrown. */
  ttl: z.number().int().positive().default(DEFAULT_REQUEST_TTL),
  userAgent: z.string().default(USER_AGENT)
});

export const GatewayOptionsSchema = z.object({
  /** Consecutive transient reconnects before giving up. Unlimited when unset. */
  maxReconnectAttempts: z.number().int().nonnegative().optional(),
  watchdogCheckIntervalMs: z.number().int().positive().optional(),
  staleAfterMs: z.number().int().positive().optional(),
  /** Overrides the url returned by `gateway/bot`. */
  url: z.url().optional()
});

export const ClientOptionsSchema = z.object({
  token: z.string().min(1),
  intents: z.number().int().nonnegative().default(DEFAULT_INTENTS),
  activity: ActivitySchema.optional(),
  status: StatusSchema.optional(),
  mobile: z.boolean().default(false),
  largeThreshold: z.number().int().min(50).max(250).default(DEFAULT_LARGE_THRESHOLD),
  logLevel: LogLevelSchema.default('info'),
  wsDebug: z.boolean().optional(),
  rest: RestOptionsSchema.prefault({}),
  gateway: GatewayOptionsSchema.prefault({})
});

export type ClientOptions = z.infer<typeof ClientOptionsSchema>;
export type ClientOptionsInput = z.input<typeof ClientOptionsSchema>;
export type RestOptions = z.infer<typeof RestOptionsSchema>;
export type GatewayOptions = z.infer<typeof GatewayOptionsSchema>;

export function parseClientOptions(data: unknown): ClientOptions {
  return ClientOptionsSchema.parse(data);
}

export function safeParseClientOptions(
  data: unknown
): { success: true; data: ClientOptions } | { success: false; error: z.ZodError } {
  const result = ClientOptionsSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

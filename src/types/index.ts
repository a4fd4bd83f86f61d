/**
 * unlock-watch: Shared Types
 *
 * Zod schemas for everything that crosses a trust boundary (the store file,
 * the config file, command arguments) and the plain types derived from them.
 *
 * @module types
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// IDENTIFIERS
// ═══════════════════════════════════════════════════════════════════════════

/** Accounts are used as record keys; these would alias Object.prototype. */
const RESERVED_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Account identifiers end up inside a Markdown code span, so backticks,
 * asterisks and whitespace are rejected up front.
 */
export const AccountIdSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9._@-]{1,64}$/, 'Account must be 1-64 characters of letters, digits, . _ @ -')
  .refine((value) => !RESERVED_KEYS.has(value), 'Account name is reserved');
export type AccountId = z.infer<typeof AccountIdSchema>;

export const SubscriberIdSchema = z.string().min(1);
export type SubscriberId = z.infer<typeof SubscriberIdSchema>;

export const EndpointUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'Endpoint URL must use http or https');

export const BearerTokenSchema = z.string().trim().min(1, 'Token must not be empty');

export const IntervalMinutesSchema = z.coerce.number().int().min(1).max(1440);

// ═══════════════════════════════════════════════════════════════════════════
// STORE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const SubscriberSchema = z.object({
  accounts: z.array(z.string()).default([]),
  intervalMinutes: z.number().int().positive().default(5),
});
export type Subscriber = z.infer<typeof SubscriberSchema>;

export const EndpointConfigSchema = z.object({
  url: z.string().default(''),
  token: z.string().default(''),
});
export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;

export const StoreStateSchema = z.object({
  subscribers: z.record(SubscriberSchema).default({}),
  endpoint: EndpointConfigSchema.default({}),
  accountState: z.record(z.boolean()).default({}),
  /** Subscribers already notified for an unlock that some subscriber has not received yet. */
  pendingDeliveries: z.record(z.array(z.string())).default({}),
  includeRaw: z.boolean().default(false),
});
export type StoreState = z.infer<typeof StoreStateSchema>;

/** Shape written by the first generation of the bot (snake_case, `chats`). */
export const LegacyStoreStateSchema = z.object({
  chats: z
    .record(
      z.object({
        accounts: z.array(z.string()).default([]),
        interval_min: z.number().int().positive().default(5),
      }),
    )
    .default({}),
  api: z.object({ url: z.string().default(''), token: z.string().default('') }).default({}),
  last_seen_unlocked: z.record(z.boolean()).default({}),
  include_raw: z.boolean().default(false),
});
export type LegacyStoreState = z.infer<typeof LegacyStoreStateSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// PROBE / NOTIFICATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type ProbeStatus = number | 'not-configured' | 'error';

export interface ProbeResult {
  /** Transport succeeded and the HTTP status was below 400. */
  ok: boolean;
  unlocked: boolean;
  /** Parsed body, raw text, or the transport error message. */
  raw: unknown;
  status: ProbeStatus;
}

export interface NotificationDecision {
  fire: boolean;
}

export interface DeliveryResult {
  ok: boolean;
  error?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const ConfigSchema = z.object({
  telegram: z.object({
    botToken: z.string().min(1).optional(),
    allowedUserIds: z.array(z.number().int()).default([]),
  }),
  paths: z.object({
    base_dir: z.string().default('~/.unlock-watch'),
    data_file: z.string().default('data.json'),
    config_file: z.string().default('config.json'),
  }),
  scheduler: z.object({
    tick_seconds: z.number().positive().default(60),
    probe_concurrency: z.number().int().min(1).max(32).default(4),
    default_interval_minutes: z.number().int().min(1).max(1440).default(5),
  }),
  probe: z.object({
    timeout_ms: z.number().int().positive().default(20_000),
  }),
  notifications: z.object({
    time_zone: z.string().default('Asia/Ho_Chi_Minh'),
    fallback_utc_offset_minutes: z.number().int().min(-720).max(840).default(420),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}

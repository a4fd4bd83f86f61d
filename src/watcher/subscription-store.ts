/**
 * SubscriptionStore: durable subscriber / endpoint / account-state record.
 *
 * The whole state lives in one JSON file that is rewritten atomically
 * (temp file + rename). Every load, save and read-modify-write runs through a
 * single-slot limiter, so command handlers and the scheduler never interleave
 * their writes.
 *
 * A missing, unreadable or malformed file is treated as an empty store; files
 * written by the first generation of the bot (`chats` / `api` /
 * `last_seen_unlocked`) are migrated on read.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import type { ZodType, ZodTypeDef } from 'zod';

import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../utils/logger.js';
import {
  AccountIdSchema,
  BearerTokenSchema,
  EndpointUrlSchema,
  IntervalMinutesSchema,
  LegacyStoreStateSchema,
  StoreStateSchema,
  type LegacyStoreState,
  type Result,
  type StoreState,
  type Subscriber,
  err,
  ok,
} from '../types/index.js';

const log = createLogger('subscription-store');

const DEFAULT_INTERVAL_MINUTES = 5;

// ── Types ────────────────────────────────────────────────────────────────────

export interface SubscriptionStoreOptions {
  filePath: string;
  eventBus?: EventBus;
  /** Interval given to a subscriber created by its first command. */
  defaultIntervalMinutes?: number;
}

export interface SubscriberView {
  accounts: string[];
  intervalMinutes: number;
  endpointUrl: string;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function emptyStoreState(): StoreState {
  return {
    subscribers: {},
    endpoint: { url: '', token: '' },
    accountState: {},
    pendingDeliveries: {},
    includeRaw: false,
  };
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): Result<T, Error> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return ok(parsed.data);
  return err(new Error(parsed.error.issues[0]?.message ?? 'Invalid value'));
}

function isLegacyShape(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return !('subscribers' in value) && ('chats' in value || 'api' in value);
}

function migrateLegacy(legacy: LegacyStoreState): StoreState {
  const subscribers: Record<string, Subscriber> = {};
  for (const [chatId, chat] of Object.entries(legacy.chats)) {
    subscribers[chatId] = { accounts: [...chat.accounts], intervalMinutes: chat.interval_min };
  }
  return {
    subscribers,
    endpoint: { url: legacy.api.url, token: legacy.api.token },
    accountState: { ...legacy.last_seen_unlocked },
    pendingDeliveries: {},
    includeRaw: legacy.include_raw,
  };
}

// ── SubscriptionStore ────────────────────────────────────────────────────────

export class SubscriptionStore {
  readonly filePath: string;
  private readonly eventBus: EventBus | undefined;
  private readonly defaultIntervalMinutes: number;
  private readonly lock = pLimit(1);

  constructor(options: SubscriptionStoreOptions) {
    this.filePath = options.filePath;
    this.eventBus = options.eventBus;
    this.defaultIntervalMinutes = options.defaultIntervalMinutes ?? DEFAULT_INTERVAL_MINUTES;
  }

  // ── Raw access ───────────────────────────────────────────────────────────

  /**
   * Current persisted state. Never rejects.
   */
  load(): Promise<StoreState> {
    return this.lock(() => this.readState());
  }

  /**
   * Replace the persisted state. Rejects only when the write itself fails; the
   * previous file is left untouched in that case.
   */
  save(state: StoreState): Promise<void> {
    return this.lock(() => this.writeState(state));
  }

  /**
   * Locked read-modify-write. `mutate` edits the state in place; whatever it
   * returns is passed through once the new state is on disk.
   */
  update<T>(mutate: (state: StoreState) => T): Promise<T> {
    return this.lock(async () => {
      const state = await this.readState();
      const value = mutate(state);
      await this.writeState(state);
      return value;
    });
  }

  // ── Subscriber commands ──────────────────────────────────────────────────

  async addAccount(subscriberId: string, account: string): Promise<Result<Subscriber, Error>> {
    const parsed = validate(AccountIdSchema, account);
    if (!parsed.success) return parsed;

    const subscriber = await this.update((state) => {
      const entry = this.ensureSubscriber(state, subscriberId);
      entry.accounts.push(parsed.data);
      return { ...entry, accounts: [...entry.accounts] };
    });
    return ok(subscriber);
  }

  /**
   * Drops every occurrence of `account`. Resolves to false when the
   * subscriber was not tracking it.
   */
  async removeAccount(subscriberId: string, account: string): Promise<boolean> {
    const target = account.trim();
    return this.update((state) => {
      const entry = state.subscribers[subscriberId];
      if (!entry) return false;
      const before = entry.accounts.length;
      entry.accounts = entry.accounts.filter((a) => a !== target);
      return entry.accounts.length !== before;
    });
  }

  async list(subscriberId: string): Promise<SubscriberView> {
    const state = await this.load();
    const entry = state.subscribers[subscriberId];
    return {
      accounts: entry ? [...entry.accounts] : [],
      intervalMinutes: entry?.intervalMinutes ?? this.defaultIntervalMinutes,
      endpointUrl: state.endpoint.url,
    };
  }

  async setCheckInterval(subscriberId: string, minutes: unknown): Promise<Result<Subscriber, Error>> {
    const parsed = validate(IntervalMinutesSchema, minutes);
    if (!parsed.success) return parsed;

    const subscriber = await this.update((state) => {
      const entry = this.ensureSubscriber(state, subscriberId);
      entry.intervalMinutes = parsed.data;
      return { ...entry, accounts: [...entry.accounts] };
    });
    return ok(subscriber);
  }

  // ── Endpoint commands ────────────────────────────────────────────────────

  async setEndpointUrl(url: string): Promise<Result<string, Error>> {
    const parsed = validate(EndpointUrlSchema, url);
    if (!parsed.success) return parsed;

    await this.update((state) => {
      state.endpoint.url = parsed.data;
    });
    return ok(parsed.data);
  }

  async setEndpointToken(token: string): Promise<Result<void, Error>> {
    const parsed = validate(BearerTokenSchema, token);
    if (!parsed.success) return parsed;

    await this.update((state) => {
      state.endpoint.token = parsed.data;
    });
    return ok(undefined);
  }

  async setIncludeRaw(includeRaw: boolean): Promise<void> {
    await this.update((state) => {
      state.includeRaw = includeRaw;
    });
  }

  // ── Account state cache ──────────────────────────────────────────────────

  /** Announced to everyone tracking it; clears the partial-delivery record. */
  async markUnlocked(account: string): Promise<void> {
    await this.update((state) => {
      state.accountState[account] = true;
      delete state.pendingDeliveries[account];
    });
  }

  /**
   * Remember the subscribers that received the unlock notice for `account`
   * while others are still outstanding, so a retry skips them.
   */
  async recordDelivered(account: string, subscriberIds: string[]): Promise<void> {
    if (subscriberIds.length === 0) return;
    await this.update((state) => {
      const delivered = Object.hasOwn(state.pendingDeliveries, account) ? state.pendingDeliveries[account] ?? [] : [];
      state.pendingDeliveries[account] = [...new Set([...delivered, ...subscriberIds])];
    });
  }

  /**
   * Re-arms notifications for `account`. Resolves to true when it had been
   * marked unlocked.
   */
  async resetAccount(account: string): Promise<boolean> {
    const target = account.trim();
    return this.update((state) => {
      const wasUnlocked = Object.hasOwn(state.accountState, target) && state.accountState[target] === true;
      delete state.accountState[target];
      delete state.pendingDeliveries[target];
      return wasUnlocked;
    });
  }

  // ── Private ──────────────────────────────────────────────────────────────

  private ensureSubscriber(state: StoreState, subscriberId: string): Subscriber {
    let entry = state.subscribers[subscriberId];
    if (!entry) {
      entry = { accounts: [], intervalMinutes: this.defaultIntervalMinutes };
      state.subscribers[subscriberId] = entry;
    }
    return entry;
  }

  private async readState(): Promise<StoreState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== 'ENOENT') {
        this.reportReset(`unreadable: ${formatError(error).message}`);
      }
      return emptyStoreState();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.reportReset(`invalid JSON: ${formatError(error).message}`);
      return emptyStoreState();
    }

    if (isLegacyShape(parsed)) {
      const legacy = LegacyStoreStateSchema.safeParse(parsed);
      if (!legacy.success) {
        this.reportReset(`invalid legacy store: ${legacy.error.issues[0]?.message ?? 'unknown'}`);
        return emptyStoreState();
      }
      const migrated = migrateLegacy(legacy.data);
      this.eventBus?.emit('store:migrated', {
        path: this.filePath,
        subscriberCount: Object.keys(migrated.subscribers).length,
      });
      return migrated;
    }

    const result = StoreStateSchema.safeParse(parsed);
    if (!result.success) {
      this.reportReset(`invalid store: ${result.error.issues[0]?.message ?? 'unknown'}`);
      return emptyStoreState();
    }
    return result.data;
  }

  private async writeState(state: StoreState): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });

    // Atomic write: write to temp file in the same directory, then rename
    const tmp = path.join(dir, `${path.basename(this.filePath)}.${randomUUID()}.tmp`);
    try {
      await fs.writeFile(tmp, `${JSON.stringify(state, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
      await fs.rename(tmp, this.filePath);
    } catch (error) {
      log.error({ err: error, filePath: this.filePath }, 'Failed to persist store');
      await fs.rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        log.warn({ err: cleanupError, tmp }, 'Failed to remove temp store file');
      });
      throw error;
    }
  }

  private reportReset(reason: string): void {
    log.warn({ filePath: this.filePath, reason }, 'Store unreadable, starting from empty state');
    this.eventBus?.emit('store:reset', { path: this.filePath, reason });
  }
}

/**
 * WatchScheduler: the periodic sweep driver.
 *
 * A global tick (one minute by default) starts a sweep unless one is still
 * running. A sweep:
 *   1. loads the store once,
 *   2. does nothing while the endpoint is not configured,
 *   3. picks the subscribers whose own interval has elapsed,
 *   4. probes each distinct account of those subscribers (bounded fan-out),
 *   5. for every account that transitioned to unlocked, notifies each
 *      subscriber tracking it that has not received this unlock yet
 *      (subscriber order, then account order),
 *   6. marks the account unlocked once every such subscriber was reached;
 *      otherwise records who was reached so a later sweep retries only the
 *      others.
 *
 * Any single probe, delivery or write failure is logged and counted; the
 * sweep carries on with the next account.
 */

import pLimit from 'p-limit';

import type { EventBus } from '../kernel/event-bus.js';
import type { EndpointConfig, ProbeResult, StoreState } from '../types/index.js';
import { createLogger, formatError } from '../utils/logger.js';
import type { Notifier } from './notifier.js';
import type { StatusProber } from './status-prober.js';
import type { SubscriptionStore } from './subscription-store.js';
import { detectAndConsume } from './transition-detector.js';

const log = createLogger('scheduler');

export const DEFAULT_TICK_MS = 60 * 1000;
export const DEFAULT_PROBE_CONCURRENCY = 4;

/** Ticks drift; a subscriber due within this window counts as due now. */
const DUE_SLACK_MS = 5_000;

// ── Types ────────────────────────────────────────────────────────────────────

export type SchedulerState = 'idle' | 'running';

export interface WatchSchedulerOptions {
  store: Pick<SubscriptionStore, 'load' | 'markUnlocked' | 'recordDelivered'>;
  prober: Pick<StatusProber, 'probe'>;
  notifier: Pick<Notifier, 'render' | 'deliver'>;
  eventBus?: EventBus;
  tickMs?: number;
  probeConcurrency?: number;
  now?: () => Date;
}

export interface SweepOptions {
  /** Treat every subscriber as due, regardless of its interval. */
  force?: boolean;
}

export interface SweepReport {
  sweepId: number;
  skipped?: 'busy' | 'not-configured';
  dueSubscribers: string[];
  probed: number;
  notified: number;
  failures: number;
}

// ── WatchScheduler ───────────────────────────────────────────────────────────

export class WatchScheduler {
  private readonly store: WatchSchedulerOptions['store'];
  private readonly prober: WatchSchedulerOptions['prober'];
  private readonly notifier: WatchSchedulerOptions['notifier'];
  private readonly eventBus: EventBus | undefined;
  private readonly tickMs: number;
  private readonly probeConcurrency: number;
  private readonly now: () => Date;

  private state: SchedulerState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private currentSweep: Promise<SweepReport> | null = null;
  private sweepCounter = 0;
  private readonly nextDueAt: Map<string, number> = new Map();

  constructor(options: WatchSchedulerOptions) {
    this.store = options.store;
    this.prober = options.prober;
    this.notifier = options.notifier;
    this.eventBus = options.eventBus;
    this.tickMs = Math.max(1000, options.tickMs ?? DEFAULT_TICK_MS);
    this.probeConcurrency = Math.max(1, options.probeConcurrency ?? DEFAULT_PROBE_CONCURRENCY);
    this.now = options.now ?? (() => new Date());
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => void this.tick(), this.tickMs);
    this.eventBus?.emit('watcher:started', { tickMs: this.tickMs });
    log.info({ tickMs: this.tickMs }, 'Scheduler started');
  }

  /**
   * Stop ticking and wait for an in-flight sweep to finish, so the process
   * never exits halfway through a store write.
   */
  async stop(reason = 'shutdown'): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.currentSweep) {
      await this.currentSweep;
    }
    this.eventBus?.emit('watcher:stopped', { reason });
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  getState(): SchedulerState {
    return this.state;
  }

  // ── Sweeps ─────────────────────────────────────────────────────────────

  /**
   * Run one sweep now. A call that arrives while another sweep is running is
   * skipped rather than queued.
   */
  async runSweep(options: SweepOptions = {}): Promise<SweepReport> {
    if (this.state === 'running') {
      this.eventBus?.emit('watcher:tick_skipped', { reason: 'busy', timestamp: this.now() });
      log.debug('Previous sweep still running, skipping tick');
      return { sweepId: this.sweepCounter, skipped: 'busy', dueSubscribers: [], probed: 0, notified: 0, failures: 0 };
    }

    this.state = 'running';
    const sweepId = ++this.sweepCounter;
    this.currentSweep = this.sweep(sweepId, options);
    try {
      return await this.currentSweep;
    } finally {
      this.state = 'idle';
      this.currentSweep = null;
    }
  }

  private async tick(): Promise<void> {
    try {
      await this.runSweep();
    } catch (error) {
      log.error({ err: formatError(error) }, 'Sweep aborted unexpectedly');
    }
  }

  private async sweep(sweepId: number, options: SweepOptions): Promise<SweepReport> {
    const startedAt = this.now();
    const report: SweepReport = { sweepId, dueSubscribers: [], probed: 0, notified: 0, failures: 0 };

    const state = await this.store.load();
    if (!state.endpoint.url || !state.endpoint.token) {
      this.eventBus?.emit('watcher:tick_skipped', { reason: 'not-configured', timestamp: startedAt });
      return { ...report, skipped: 'not-configured' };
    }

    report.dueSubscribers = this.selectDue(state, startedAt.getTime(), options.force ?? false);
    const accounts = this.collectAccounts(state, report.dueSubscribers);

    this.eventBus?.emit('watcher:sweep_started', {
      sweepId,
      subscriberCount: report.dueSubscribers.length,
      accountCount: accounts.length,
      startedAt,
    });

    const results = await this.probeAll(state.endpoint, accounts);
    report.probed = results.size;

    const firing = new Map<string, ProbeResult>();
    for (const [account, result] of results) {
      if (!result.ok) {
        report.failures++;
        const reason = typeof result.raw === 'string' ? result.raw : `HTTP ${String(result.status)}`;
        log.warn({ account, status: result.status }, 'Probe failed');
        this.eventBus?.emit('watcher:probe_failed', { account, status: result.status, reason });
      }
      if (detectAndConsume(state.accountState, account, result).fire) {
        firing.set(account, result);
      }
    }

    if (firing.size > 0) {
      const outcome = await this.notifyAll(state, firing);
      report.notified = outcome.notified;
      report.failures += outcome.failures;
    }

    this.scheduleNext(state, report.dueSubscribers, startedAt.getTime());

    const duration = this.now().getTime() - startedAt.getTime();
    this.eventBus?.emit('watcher:sweep_complete', {
      sweepId,
      probed: report.probed,
      notified: report.notified,
      failures: report.failures,
      duration,
    });
    log.debug({ ...report, duration }, 'Sweep complete');

    return report;
  }

  // ── Steps ──────────────────────────────────────────────────────────────

  private selectDue(state: StoreState, nowMs: number, force: boolean): string[] {
    // forget subscribers that disappeared from the store
    for (const id of [...this.nextDueAt.keys()]) {
      if (!(id in state.subscribers)) this.nextDueAt.delete(id);
    }

    return Object.keys(state.subscribers).filter((id) => force || (this.nextDueAt.get(id) ?? 0) <= nowMs + DUE_SLACK_MS);
  }

  private collectAccounts(state: StoreState, subscriberIds: string[]): string[] {
    const seen = new Set<string>();
    for (const id of subscriberIds) {
      for (const account of state.subscribers[id]?.accounts ?? []) {
        seen.add(account);
      }
    }
    return [...seen];
  }

  private async probeAll(endpoint: EndpointConfig, accounts: string[]): Promise<Map<string, ProbeResult>> {
    const limit = pLimit(this.probeConcurrency);
    const settled = await Promise.all(
      accounts.map((account) => limit(async () => [account, await this.safeProbe(endpoint, account)] as const)),
    );
    return new Map(settled);
  }

  private async safeProbe(endpoint: EndpointConfig, account: string): Promise<ProbeResult> {
    try {
      return await this.prober.probe(endpoint, account);
    } catch (error) {
      return { ok: false, unlocked: false, raw: formatError(error).message, status: 'error' };
    }
  }

  private async notifyAll(
    state: StoreState,
    firing: Map<string, ProbeResult>,
  ): Promise<{ notified: number; failures: number }> {
    let notified = 0;
    let failures = 0;
    const checkedAt = this.now();
    const messages = new Map<string, string>();
    const undelivered = new Set<string>();
    const reached = new Map<string, string[]>();
    const seen = new Set<string>();

    for (const [subscriberId, subscriber] of Object.entries(state.subscribers)) {
      for (const account of subscriber.accounts) {
        const result = firing.get(account);
        if (!result) continue;

        const key = `${subscriberId}\u0000${account}`;
        if (seen.has(key)) continue;
        seen.add(key);

        // reached by an earlier sweep that could not reach everyone
        const previously = Object.hasOwn(state.pendingDeliveries, account) ? state.pendingDeliveries[account] : undefined;
        if (previously?.includes(subscriberId)) continue;

        let message = messages.get(account);
        if (message === undefined) {
          message = this.notifier.render(account, true, checkedAt, state.includeRaw ? result.raw : undefined);
          messages.set(account, message);
        }

        const delivery = await this.notifier.deliver(subscriberId, message);
        if (delivery.ok) {
          notified++;
          reached.set(account, [...(reached.get(account) ?? []), subscriberId]);
          this.eventBus?.emit('watcher:notification_sent', { subscriberId, account, timestamp: checkedAt });
        } else {
          failures++;
          undelivered.add(account);
          const error = delivery.error ?? 'unknown error';
          log.warn({ subscriberId, account, error }, 'Notification delivery failed');
          this.eventBus?.emit('watcher:notification_failed', { subscriberId, account, error });
        }
      }
    }

    // write-after-notify: the account is marked once nobody is left to reach
    for (const account of firing.keys()) {
      try {
        if (undelivered.has(account)) {
          await this.store.recordDelivered(account, reached.get(account) ?? []);
        } else {
          await this.store.markUnlocked(account);
        }
      } catch (error) {
        failures++;
        log.error({ account, err: formatError(error) }, 'Failed to persist delivery state');
      }
    }

    return { notified, failures };
  }

  private scheduleNext(state: StoreState, subscriberIds: string[], nowMs: number): void {
    for (const id of subscriberIds) {
      const minutes = state.subscribers[id]?.intervalMinutes ?? 1;
      this.nextDueAt.set(id, nowMs + minutes * 60_000);
    }
  }
}

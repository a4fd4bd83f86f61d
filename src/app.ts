/**
 * WatcherApp: wires the store, prober, notifier, scheduler and Telegram bot
 * into one process and owns their lifecycle.
 */

import type { Bot } from 'grammy';
import { createBot } from './bot/bot.js';
import { TelegramChannel } from './bot/telegram-channel.js';
import { TelegramBotConfigSchema } from './bot/types.js';
import { getDataPath, requireBotToken } from './config/config.js';
import { EventBus } from './kernel/event-bus.js';
import type { Config, Result } from './types/index.js';
import { err, ok } from './types/index.js';
import { createLogger } from './utils/logger.js';
import { Notifier, renderNotification } from './watcher/notifier.js';
import { WatchScheduler } from './watcher/scheduler.js';
import { StatusProber } from './watcher/status-prober.js';
import { SubscriptionStore } from './watcher/subscription-store.js';

const log = createLogger('app');

export interface WatcherApp {
  readonly eventBus: EventBus;
  readonly store: SubscriptionStore;
  readonly scheduler: WatchScheduler;
  readonly bot: Bot;
  /** Start long polling and the periodic sweep. */
  start(): Promise<void>;
  stop(reason?: string): Promise<void>;
}

/**
 * Route the interesting events to the log. Returns a function that detaches
 * every subscription.
 */
export function attachEventLogging(eventBus: EventBus): () => void {
  const detach = [
    eventBus.on('store:reset', ({ path, reason }) => log.warn({ path, reason }, 'Store reset to empty')),
    eventBus.on('store:migrated', ({ path, subscriberCount }) =>
      log.info({ path, subscriberCount }, 'Migrated legacy data file'),
    ),
    eventBus.on('watcher:sweep_complete', (report) => {
      if (report.notified > 0 || report.failures > 0) log.info(report, 'Sweep complete');
    }),
    eventBus.on('watcher:notification_sent', ({ subscriberId, account }) =>
      log.info({ subscriberId, account }, 'Unlock notification sent'),
    ),
    eventBus.on('telegram:auth_rejected', ({ userId, chatId, command }) =>
      log.warn({ userId, chatId, command }, 'Rejected admin command from user outside the allowlist'),
    ),
    eventBus.on('telegram:bot_started', ({ botUsername }) => log.info({ botUsername }, 'Telegram polling started')),
    eventBus.on('telegram:bot_stopped', ({ reason }) => log.info({ reason }, 'Telegram polling stopped')),
  ];
  return () => detach.forEach((off) => off());
}

export function createWatcherApp(config: Config): Result<WatcherApp, Error> {
  const token = requireBotToken(config);
  if (!token.success) return err(token.error);

  const eventBus = new EventBus();
  const store = new SubscriptionStore({
    filePath: getDataPath(config),
    eventBus,
    defaultIntervalMinutes: config.scheduler.default_interval_minutes,
  });

  const botConfig = TelegramBotConfigSchema.parse({
    botToken: token.data,
    allowedUserIds: config.telegram.allowedUserIds,
  });

  const renderOptions = {
    timeZone: config.notifications.time_zone,
    fallbackUtcOffsetMinutes: config.notifications.fallback_utc_offset_minutes,
  };
  const bot = createBot({
    eventBus,
    store,
    notifier: { render: (account, unlocked, timestamp) => renderNotification(account, unlocked, timestamp, renderOptions) },
    config: botConfig,
  });
  const notifier = new Notifier({ channel: new TelegramChannel(bot.api), ...renderOptions });

  const scheduler = new WatchScheduler({
    store,
    prober: new StatusProber({ timeoutMs: config.probe.timeout_ms }),
    notifier,
    eventBus,
    tickMs: config.scheduler.tick_seconds * 1000,
    probeConcurrency: config.scheduler.probe_concurrency,
  });

  let polling = false;
  let detachLogging: (() => void) | null = null;

  const app: WatcherApp = {
    eventBus,
    store,
    scheduler,
    bot,

    async start() {
      detachLogging ??= attachEventLogging(eventBus);

      try {
        const me = await bot.api.getMe();
        eventBus.emit('telegram:bot_started', {
          botUsername: me.username,
          timestamp: new Date().toISOString(),
        });
      } catch (error) {
        // polling retries on its own; a failed probe here is not fatal
        log.warn({ err: error instanceof Error ? error.message : String(error) }, 'getMe failed');
      }

      polling = true;
      void bot.start().catch((error: unknown) => {
        if (!polling) return;
        polling = false;
        eventBus.emit('telegram:bot_stopped', {
          reason: error instanceof Error ? error.message : 'polling error',
          timestamp: new Date().toISOString(),
        });
      });

      scheduler.start();
    },

    async stop(reason = 'shutdown') {
      await scheduler.stop(reason);
      if (polling) {
        polling = false;
        await bot.stop();
        eventBus.emit('telegram:bot_stopped', { reason, timestamp: new Date().toISOString() });
      }
      detachLogging?.();
      detachLogging = null;
    },
  };

  return ok(app);
}

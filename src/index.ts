/**
 * Unlock Watch: Main Exports
 *
 * @module unlock-watch
 */

// Types
export {
  type AccountId,
  type SubscriberId,
  type Subscriber,
  type EndpointConfig,
  type StoreState,
  type ProbeStatus,
  type ProbeResult,
  type NotificationDecision,
  type DeliveryResult,
  type Config,
  type Result,
  AccountIdSchema,
  EndpointUrlSchema,
  IntervalMinutesSchema,
  StoreStateSchema,
  ConfigSchema,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';

// Watcher
export { SubscriptionStore, emptyStoreState, type SubscriberView } from './watcher/subscription-store.js';
export { StatusProber, extractUnlocked, isTruthy } from './watcher/status-prober.js';
export { detectAndConsume, type AccountStateCache } from './watcher/transition-detector.js';
export { Notifier, renderNotification, type NotificationChannel } from './watcher/notifier.js';
export { WatchScheduler, type SweepReport, type SweepOptions } from './watcher/scheduler.js';

// Telegram
export { createBot } from './bot/bot.js';
export { TelegramChannel } from './bot/telegram-channel.js';

// Wiring
export { createWatcherApp, type WatcherApp } from './app.js';
export { EventBus, type EventMap } from './kernel/event-bus.js';
export { loadConfig, getConfig, requireBotToken } from './config/config.js';
export { createLogger } from './utils/logger.js';

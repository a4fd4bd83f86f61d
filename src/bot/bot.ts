import { Bot } from 'grammy';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../utils/logger.js';
import type { Notifier } from '../watcher/notifier.js';
import type { SubscriptionStore } from '../watcher/subscription-store.js';
import { handleAdd, handleInterval, handleList, handleRemove } from './commands/accounts.js';
import { handleRaw, handleSetApi, handleSetToken } from './commands/endpoint.js';
import { handleHelp } from './commands/help.js';
import { handleReset, handleTestNotify } from './commands/notify.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import type { TelegramBotConfig } from './types.js';

const log = createLogger('telegram-bot');

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

export interface BotDependencies {
  eventBus: EventBus;
  store: SubscriptionStore;
  notifier: Pick<Notifier, 'render'>;
  config: TelegramBotConfig;
}

/**
 * Creates and configures the grammY bot with middleware chain:
 * auth → logging → commands → fallback
 *
 * Uses long polling; the process never listens on a port.
 */
export function createBot(deps: BotDependencies): Bot {
  const { eventBus, store, notifier, config } = deps;

  if (!config.botToken) {
    throw new Error('Telegram bot token not configured. Set TELEGRAM_BOT_TOKEN.');
  }

  const bot = new Bot(config.botToken);

  // ── Middleware chain ──────────────────────────────────────────────

  bot.use(createAuthMiddleware({ allowedUserIds: config.allowedUserIds }, eventBus));
  bot.use(createLoggingMiddleware(eventBus));

  // ── Command handlers ──────────────────────────────────────────────

  bot.command(['start', 'help'], (ctx) => handleHelp(ctx));
  bot.command('add', (ctx) => handleAdd(ctx, store));
  bot.command('remove', (ctx) => handleRemove(ctx, store));
  bot.command('list', (ctx) => handleList(ctx, store));
  bot.command('interval', (ctx) => handleInterval(ctx, store));
  bot.command('setapi', (ctx) => handleSetApi(ctx, store));
  bot.command('settoken', (ctx) => handleSetToken(ctx, store));
  bot.command('raw', (ctx) => handleRaw(ctx, store));
  bot.command('testnotify', (ctx) => handleTestNotify(ctx, notifier));
  bot.command('reset', (ctx) => handleReset(ctx, store));

  bot.on('message:text', async (ctx) => {
    await ctx.reply('Use /help to see available commands.');
  });

  // ── Error handler ─────────────────────────────────────────────────

  bot.catch((error) => {
    log.error({ updateId: error.ctx.update.update_id, err: formatError(error.error) }, 'Telegram handler error');
  });

  return bot;
}

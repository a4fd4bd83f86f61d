import type { Context, NextFunction } from 'grammy';
import type { EventBus } from '../../kernel/event-bus.js';
import { parseCommand } from '../commands/args.js';

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MIDDLEWARE: Emit an event per command
// ═══════════════════════════════════════════════════════════════════════════════

export function createLoggingMiddleware(eventBus: EventBus) {
  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const parsed = parseCommand(ctx.message?.text ?? '');
    if (parsed) {
      eventBus.emit('telegram:command_received', {
        command: parsed.command,
        userId: ctx.from?.id ?? 0,
        chatId: ctx.chat?.id ?? 0,
        timestamp: new Date().toISOString(),
      });
    }

    await next();
  };
}

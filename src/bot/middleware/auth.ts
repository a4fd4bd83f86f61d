import type { Context, NextFunction } from 'grammy';
import type { EventBus } from '../../kernel/event-bus.js';
import { parseCommand } from '../commands/args.js';

// ═══════════════════════════════════════════════════════════════════════════════
// AUTH MIDDLEWARE: Admin commands are limited to the allowlist
// ═══════════════════════════════════════════════════════════════════════════════

/** Commands that change the shared endpoint or the shared unlock state. */
export const ADMIN_COMMANDS: readonly string[] = ['setapi', 'settoken', 'raw', 'reset'];

export interface AuthOptions {
  allowedUserIds: number[];
  restrictedCommands?: readonly string[];
}

export function createAuthMiddleware(options: AuthOptions, eventBus: EventBus) {
  const restricted = new Set(options.restrictedCommands ?? ADMIN_COMMANDS);

  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const userId = ctx.from?.id;
    if (!userId) return;

    const command = parseCommand(ctx.message?.text ?? '')?.command;
    // Empty allowlist = everyone is an administrator
    const isAdmin = options.allowedUserIds.length === 0 || options.allowedUserIds.includes(userId);

    if (command !== undefined && restricted.has(command) && !isAdmin) {
      eventBus.emit('telegram:auth_rejected', {
        userId,
        chatId: ctx.chat?.id ?? 0,
        command,
        timestamp: new Date().toISOString(),
      });
      await ctx.reply(`Not allowed: /${command} is limited to administrators.`);
      return;
    }

    await next();
  };
}

import type { Context } from 'grammy';
import { createLogger, formatError } from '../../utils/logger.js';

const log = createLogger('telegram-commands');

/**
 * Splits "/cmd@SomeBot a b" into `{ command: 'cmd', args: ['a', 'b'] }`.
 * Returns null for anything that is not a command.
 */
export function parseCommand(text: string): { command: string; args: string[] } | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) return null;

  const [head = '', ...args] = trimmed.split(/\s+/);
  const command = head.slice(1).split('@')[0] ?? '';
  if (!command) return null;
  return { command: command.toLowerCase(), args };
}

export function commandArgs(ctx: Context): string[] {
  return parseCommand(ctx.message?.text ?? '')?.args ?? [];
}

/** Chat ids become subscriber ids; stored as strings. */
export function subscriberIdOf(ctx: Context): string | null {
  const chatId = ctx.chat?.id;
  return chatId === undefined ? null : String(chatId);
}

export async function replyFailure(ctx: Context, action: string, error: unknown): Promise<void> {
  const message = formatError(error).message;
  log.error({ action, chatId: ctx.chat?.id, err: message }, 'Command failed');
  await ctx.reply(`Failed to ${action}: ${message}`);
}

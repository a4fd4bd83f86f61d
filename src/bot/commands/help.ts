import type { Context } from 'grammy';

// ═══════════════════════════════════════════════════════════════════════════════
// /start, /help
// ═══════════════════════════════════════════════════════════════════════════════

export const HELP_TEXT = [
  'Account unlock watcher',
  '',
  '/add <account> - start watching an account',
  '/remove <account> - stop watching an account',
  '/list - accounts, interval and API endpoint',
  '/interval <minutes> - how often your accounts are checked',
  '/setapi <url> - status endpoint',
  '/settoken <token> - bearer token for the endpoint',
  '/testnotify <account> - preview a notification',
  '/reset <account> - notify again on the next unlock',
  '/raw on|off - include endpoint responses in notifications',
].join('\n');

export async function handleHelp(ctx: Context): Promise<void> {
  await ctx.reply(HELP_TEXT);
}

import type { Context } from 'grammy';
import { AccountIdSchema } from '../../types/index.js';
import type { Notifier } from '../../watcher/notifier.js';
import type { SubscriptionStore } from '../../watcher/subscription-store.js';
import { commandArgs, replyFailure } from './args.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /testnotify, /reset
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleTestNotify(
  ctx: Context,
  notifier: Pick<Notifier, 'render'>,
  now: () => Date = () => new Date(),
): Promise<void> {
  const parsed = AccountIdSchema.safeParse(commandArgs(ctx)[0]);
  if (!parsed.success) {
    await ctx.reply('Usage: /testnotify <account>');
    return;
  }

  await ctx.reply(notifier.render(parsed.data, true, now()), { parse_mode: 'Markdown' });
}

export async function handleReset(ctx: Context, store: Pick<SubscriptionStore, 'resetAccount'>): Promise<void> {
  const [account] = commandArgs(ctx);
  if (!account) {
    await ctx.reply('Usage: /reset <account>');
    return;
  }

  try {
    const wasUnlocked = await store.resetAccount(account);
    await ctx.reply(
      wasUnlocked
        ? `Re-armed: ${account} will be announced on its next unlock`
        : `${account} was not marked unlocked`,
    );
  } catch (error) {
    await replyFailure(ctx, 'save', error);
  }
}

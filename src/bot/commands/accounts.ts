import type { Context } from 'grammy';
import type { SubscriptionStore } from '../../watcher/subscription-store.js';
import { commandArgs, replyFailure, subscriberIdOf } from './args.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /add, /remove, /list, /interval: per-chat subscriptions
// ═══════════════════════════════════════════════════════════════════════════════

type AccountStore = Pick<SubscriptionStore, 'addAccount' | 'removeAccount' | 'list' | 'setCheckInterval'>;

export async function handleAdd(ctx: Context, store: AccountStore): Promise<void> {
  const subscriberId = subscriberIdOf(ctx);
  const [account] = commandArgs(ctx);
  if (!subscriberId) return;
  if (!account) {
    await ctx.reply('Usage: /add <account>');
    return;
  }

  try {
    const result = await store.addAccount(subscriberId, account);
    if (!result.success) {
      await ctx.reply(`Invalid account: ${result.error.message}`);
      return;
    }
    await ctx.reply(`Added: ${account}`);
  } catch (error) {
    await replyFailure(ctx, 'save', error);
  }
}

export async function handleRemove(ctx: Context, store: AccountStore): Promise<void> {
  const subscriberId = subscriberIdOf(ctx);
  const [account] = commandArgs(ctx);
  if (!subscriberId) return;
  if (!account) {
    await ctx.reply('Usage: /remove <account>');
    return;
  }

  try {
    const removed = await store.removeAccount(subscriberId, account);
    await ctx.reply(removed ? `Removed: ${account}` : `Not watching: ${account}`);
  } catch (error) {
    await replyFailure(ctx, 'save', error);
  }
}

export async function handleList(ctx: Context, store: AccountStore): Promise<void> {
  const subscriberId = subscriberIdOf(ctx);
  if (!subscriberId) return;

  const view = await store.list(subscriberId);
  const accounts = view.accounts.length > 0 ? view.accounts.map((a) => `- ${a}`) : ['- (none)'];

  await ctx.reply(
    [
      'Watching:',
      ...accounts,
      `Interval: ${view.intervalMinutes} min`,
      `API: ${view.endpointUrl || '(not set)'}`,
    ].join('\n'),
  );
}

export async function handleInterval(ctx: Context, store: AccountStore): Promise<void> {
  const subscriberId = subscriberIdOf(ctx);
  const [minutes] = commandArgs(ctx);
  if (!subscriberId) return;
  if (!minutes) {
    await ctx.reply('Usage: /interval <minutes>');
    return;
  }

  try {
    const result = await store.setCheckInterval(subscriberId, minutes);
    if (!result.success) {
      await ctx.reply(`Invalid interval: ${result.error.message}`);
      return;
    }
    await ctx.reply(`Check interval set to ${result.data.intervalMinutes} min`);
  } catch (error) {
    await replyFailure(ctx, 'save', error);
  }
}

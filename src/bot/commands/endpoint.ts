import type { Context } from 'grammy';
import type { SubscriptionStore } from '../../watcher/subscription-store.js';
import { commandArgs, replyFailure } from './args.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /setapi, /settoken, /raw: endpoint settings shared by every chat
// ═══════════════════════════════════════════════════════════════════════════════

type EndpointStore = Pick<SubscriptionStore, 'setEndpointUrl' | 'setEndpointToken' | 'setIncludeRaw'>;

export async function handleSetApi(ctx: Context, store: EndpointStore): Promise<void> {
  const [url] = commandArgs(ctx);
  if (!url) {
    await ctx.reply('Usage: /setapi <url>');
    return;
  }

  try {
    const result = await store.setEndpointUrl(url);
    if (!result.success) {
      await ctx.reply(`Invalid URL: ${result.error.message}`);
      return;
    }
    await ctx.reply(`Saved API URL: ${result.data}`);
  } catch (error) {
    await replyFailure(ctx, 'save', error);
  }
}

export async function handleSetToken(ctx: Context, store: EndpointStore): Promise<void> {
  const [token] = commandArgs(ctx);
  if (!token) {
    await ctx.reply('Usage: /settoken <token>');
    return;
  }

  try {
    const result = await store.setEndpointToken(token);
    if (!result.success) {
      await ctx.reply(`Invalid token: ${result.error.message}`);
      return;
    }
    await ctx.reply('Saved bearer token.');
  } catch (error) {
    await replyFailure(ctx, 'save', error);
  }
}

export async function handleRaw(ctx: Context, store: EndpointStore): Promise<void> {
  const [mode] = commandArgs(ctx);
  const value = mode?.toLowerCase();
  if (value !== 'on' && value !== 'off') {
    await ctx.reply('Usage: /raw on|off');
    return;
  }

  try {
    await store.setIncludeRaw(value === 'on');
    await ctx.reply(`Raw responses in notifications: ${value}`);
  } catch (error) {
    await replyFailure(ctx, 'save', error);
  }
}

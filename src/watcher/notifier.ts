/**
 * Notifier: renders unlock notifications and hands them to the channel.
 *
 * Rendering is a fixed Markdown template; both timestamps come from the same
 * instant, expressed in the configured timezone (or a fixed UTC offset when
 * the runtime cannot resolve that zone).
 */

import type { DeliveryResult } from '../types/index.js';
import { formatError } from '../utils/logger.js';
import { formatDayMonthYear, formatIsoLike, getZonedParts } from '../utils/zoned-time.js';

// ─── Types ──────────────────────────────────────────────────────────────────

/** Outbound transport; rejects when the message could not be sent. */
export interface NotificationChannel {
  send(subscriberId: string, text: string): Promise<void>;
}

export interface NotifierOptions {
  channel: NotificationChannel;
  timeZone?: string;
  /** Minutes east of UTC used when `timeZone` is unknown to the runtime. */
  fallbackUtcOffsetMinutes?: number;
}

export interface RenderOptions {
  timeZone: string;
  fallbackUtcOffsetMinutes: number;
  /** Probe diagnostics appended below the message when present. */
  raw?: unknown;
}

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_TIME_ZONE = 'Asia/Ho_Chi_Minh';
export const DEFAULT_FALLBACK_UTC_OFFSET_MINUTES = 7 * 60;

export const STATUS_LABELS = {
  unlocked: 'Tài khoản đã mở khoá',
  banned: 'Tài khoản bị cấm',
} as const;

const MAX_RAW_LENGTH = 1500;

// ─── Rendering ──────────────────────────────────────────────────────────────

function renderRaw(raw: unknown): string {
  const text = typeof raw === 'string' ? raw : JSON.stringify(raw, null, 2);
  const clipped = text.length > MAX_RAW_LENGTH ? `${text.slice(0, MAX_RAW_LENGTH)}…` : text;
  // a stray backtick would close the code block early
  return clipped.replace(/`/g, "'");
}

export function renderNotification(
  account: string,
  unlocked: boolean,
  timestamp: Date,
  options: RenderOptions,
): string {
  const parts = getZonedParts(timestamp, options.timeZone, options.fallbackUtcOffsetMinutes);
  const statusText = unlocked ? STATUS_LABELS.unlocked : STATUS_LABELS.banned;

  const lines = [
    '🔔 *THÔNG BÁO*',
    '📝 *Nội dung:* 🔎 *KIỂM TRA TÀI KHOẢN*',
    `📛 *Tên tài khoản:* \`${account}\``,
    `📌 *Trạng thái:* *${statusText}*`,
    `⏱️ \`${formatIsoLike(parts)}\``,
    `🕒 *Thời gian:* ${formatDayMonthYear(parts)}`,
  ];

  if (options.raw !== undefined && options.raw !== null) {
    lines.push('🧾 *Phản hồi:*', '```', renderRaw(options.raw), '```');
  }

  return `${lines.join('\n')}\n`;
}

// ─── Notifier ───────────────────────────────────────────────────────────────

export class Notifier {
  private readonly channel: NotificationChannel;
  private readonly timeZone: string;
  private readonly fallbackUtcOffsetMinutes: number;

  constructor(options: NotifierOptions) {
    this.channel = options.channel;
    this.timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
    this.fallbackUtcOffsetMinutes = options.fallbackUtcOffsetMinutes ?? DEFAULT_FALLBACK_UTC_OFFSET_MINUTES;
  }

  render(account: string, unlocked: boolean, timestamp: Date, raw?: unknown): string {
    return renderNotification(account, unlocked, timestamp, {
      timeZone: this.timeZone,
      fallbackUtcOffsetMinutes: this.fallbackUtcOffsetMinutes,
      raw,
    });
  }

  /**
   * Send `message` to one subscriber. Failure is reported in the result.
   */
  async deliver(subscriberId: string, message: string): Promise<DeliveryResult> {
    try {
      await this.channel.send(subscriberId, message);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: formatError(error).message };
    }
  }
}

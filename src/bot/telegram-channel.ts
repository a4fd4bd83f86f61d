import type { Api } from 'grammy';
import type { NotificationChannel } from '../watcher/notifier.js';

const TELEGRAM_MAX_LENGTH = 4096;

/**
 * Outbound notifications through the Bot API. Subscriber ids are Telegram
 * chat ids kept as strings.
 */
export class TelegramChannel implements NotificationChannel {
  constructor(private readonly api: Pick<Api, 'sendMessage'>) {}

  async send(subscriberId: string, text: string): Promise<void> {
    const finalText = text.length > TELEGRAM_MAX_LENGTH ? `${text.slice(0, TELEGRAM_MAX_LENGTH - 3)}...` : text;
    await this.api.sendMessage(subscriberId, finalText, { parse_mode: 'Markdown' });
  }
}

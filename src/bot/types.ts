import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const TelegramBotConfigSchema = z.object({
  botToken: z.string().min(1).optional(),
  allowedUserIds: z.array(z.number()).default([]),
});
export type TelegramBotConfig = z.infer<typeof TelegramBotConfigSchema>;

export interface TelegramCommandContext {
  command: string;
  args: string[];
  userId: number;
  chatId: number;
}

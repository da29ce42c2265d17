import { z } from 'zod';
import { config } from '../config.js';

const TELEGRAM_MESSAGE_MAX = 4000;
const TELEGRAM_API_BASE = 'https://api.telegram.org';

const TelegramIdSchema = z.union([z.number(), z.string()]);

export const TelegramUpdateSchema = z.object({
  update_id: z.number().optional(),
  message: z.object({
    message_id: z.number().optional(),
    text: z.string().optional(),
    caption: z.string().optional(),
    chat: z.object({
      id: TelegramIdSchema,
      type: z.string().optional(),
    }).optional(),
    from: z.object({
      id: TelegramIdSchema,
      is_bot: z.boolean().optional(),
      username: z.string().optional(),
      first_name: z.string().optional(),
    }).optional(),
    date: z.number().optional(),
  }).optional(),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export interface ExtractedTelegramMessage {
  chatId: string;
  userId: string;
  text: string;
}

export class TelegramSendError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'TelegramSendError';
  }
}

export function truncateTelegramMessage(text: string): string {
  if (text.length <= TELEGRAM_MESSAGE_MAX) return text;
  return `${text.slice(0, TELEGRAM_MESSAGE_MAX - 30)}\n\n...[truncated for Telegram]`;
}

/**
 * Send a text message through the Bot API. Markdown is tried first; model
 * output often breaks Telegram's Markdown parser, so a rejected message is
 * resent once as plain text.
 */
export async function sendTelegramMessage(
  chatId: string | number,
  text: string,
  token: string = config.telegramBotToken,
): Promise<void> {
  if (!token) {
    console.error('[Telegram] Bot token not configured');
    return;
  }

  const body = truncateTelegramMessage(text || '');
  const url = `${TELEGRAM_API_BASE}/bot${token}/sendMessage`;
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      chat_id: String(chatId),
      text: body,
      parse_mode: 'Markdown',
    }),
  });

  if (response.ok) return;

  const retry = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      chat_id: String(chatId),
      text: body,
    }),
  });

  if (!retry.ok) {
    const responseText = await retry.text();
    console.error('[Telegram] Failed to send message:', responseText);
    throw new TelegramSendError(`Telegram sendMessage failed: HTTP ${retry.status}`, retry.status);
  }
}

function parseAllowedChatIds(raw: string): string[] {
  return raw
    .split(/[,\s;]+/)
    .map((item) => item.trim().replace(/^['"]|['"]$/g, ''))
    .filter(Boolean);
}

export function isAllowedChat(chatId: string | number, allowedRaw: string = config.telegramAllowedChatId): boolean {
  const allowed = parseAllowedChatIds(allowedRaw || '');
  if (allowed.length === 0) return false;
  if (allowed.includes('*')) return true;
  return allowed.includes(String(chatId));
}

/**
 * Extract the text message from a Telegram update.
 * Returns null for updates without a text (or caption), and for messages
 * sent by bots, including this one.
 */
export function extractTelegramMessage(update: TelegramUpdate): ExtractedTelegramMessage | null {
  const msg = update.message;
  if (!msg) return null;

  const chatId = msg.chat?.id;
  const userId = msg.from?.id;
  if (chatId === undefined || userId === undefined) return null;
  if (msg.from?.is_bot) return null;

  const text = (msg.text || msg.caption || '').trim();
  if (!text) return null;

  return {
    chatId: String(chatId),
    userId: String(userId),
    text,
  };
}

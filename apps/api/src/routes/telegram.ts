import type { FastifyPluginAsync } from 'fastify';
import type { ChatBot } from '../chat/bot.js';
import { extractTelegramMessage, isAllowedChat, TelegramUpdateSchema } from '../external/telegram.js';

export interface TelegramRoutesOptions {
  bot: ChatBot;
  allowedChatIds: string;
  /** Expected `x-telegram-bot-api-secret-token`; empty disables the check. */
  webhookSecret: string;
}

const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export const telegramRoutes: FastifyPluginAsync<TelegramRoutesOptions> = async (app, options) => {
  const { bot, allowedChatIds, webhookSecret } = options;

  app.post('/telegram/webhook', async (request, reply) => {
    if (webhookSecret && request.headers[SECRET_HEADER] !== webhookSecret) {
      return reply.status(401).send({ error: 'Invalid webhook secret' });
    }

    // Respond to Telegram immediately; processing continues in the background.
    reply.status(200).send({ ok: true });

    const parsed = TelegramUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      request.log.warn({ issues: parsed.error.issues }, '[Telegram] Ignoring malformed update');
      return reply;
    }

    const extracted = extractTelegramMessage(parsed.data);
    if (!extracted) return reply;

    if (!isAllowedChat(extracted.chatId, allowedChatIds)) {
      request.log.warn({ chatId: extracted.chatId }, '[Telegram] Rejected message from unauthorized chat');
      return reply;
    }

    void (async () => {
      try {
        await bot.handleMessage(extracted.chatId, extracted.text);
      } catch (error) {
        request.log.error({ err: error, chatId: extracted.chatId }, '[Telegram] Error processing message');
        try {
          await bot.reportError(extracted.chatId, error);
        } catch (sendError) {
          request.log.error({ err: sendError, chatId: extracted.chatId }, '[Telegram] Failed to report error');
        }
      }
    })();

    return reply;
  });
};

import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Config } from './config.js';
import type { Logger } from './logger.js';
import { OllamaProvider } from './llm/providers/ollama.js';
import type { LLMProviderAdapter } from './llm/types.js';
import { RecursionEngine } from './recursion/engine.js';
import { ThoughtLog } from './recursion/thoughtLog.js';
import { ChatBot } from './chat/bot.js';
import { ChatSessionStore } from './chat/sessions.js';
import { sendTelegramMessage } from './external/telegram.js';
import { healthRoutes } from './routes/health.js';
import { landingRoutes } from './routes/landing.js';
import { thoughtRoutes } from './routes/thoughts.js';
import { telegramRoutes } from './routes/telegram.js';

export interface AppServices {
  provider: Pick<LLMProviderAdapter, 'name' | 'ping'>;
  engine: RecursionEngine;
  /** Absent when no Telegram bot token is configured. */
  bot: ChatBot | null;
}

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  services?: (log: Logger) => AppServices;
}

export function createServices(config: Config, log: Logger): AppServices {
  const provider = new OllamaProvider({ baseURL: config.ollamaBaseUrl });
  const engine = new RecursionEngine({
    client: provider,
    model: config.ollamaModel,
    thoughtLog: new ThoughtLog(config.thoughtLogDir, log),
    failurePolicy: config.failurePolicy,
    logger: log,
  });

  const bot = config.telegramBotToken
    ? new ChatBot({
        engine,
        send: (chatId, text) => sendTelegramMessage(chatId, text, config.telegramBotToken),
        sessions: new ChatSessionStore(),
        depth: config.chatThinkDepth,
        pacingMs: config.chatPacingMs,
        logger: log,
      })
    : null;

  return { provider, engine, bot };
}

export async function buildApp(
  config: Config,
  options: BuildAppOptions = {},
): Promise<{ app: FastifyInstance; services: AppServices }> {
  const app = Fastify({
    logger: options.logger ?? { level: config.logLevel },
  });

  const services = (options.services ?? ((log: Logger) => createServices(config, log)))(app.log);

  await app.register(cors, {
    origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    methods: ['GET', 'POST'],
  });

  // Security headers (the landing page carries inline styles)
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // Global rate limiting (per IP)
  await app.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: '1 minute',
  });

  // Unexpected errors never leak their message
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      app.log.error(error);
      reply.status(statusCode).send({ error: 'Internal server error' });
    } else {
      reply.status(statusCode).send({ error: error.message });
    }
  });

  await app.register(landingRoutes);
  await app.register(healthRoutes, { provider: services.provider, model: services.engine.model });
  await app.register(thoughtRoutes, { engine: services.engine });

  if (services.bot) {
    await app.register(telegramRoutes, {
      bot: services.bot,
      allowedChatIds: config.telegramAllowedChatId,
      webhookSecret: config.telegramWebhookSecret,
    });
  }

  return { app, services };
}

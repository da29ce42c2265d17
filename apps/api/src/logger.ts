import type { FastifyBaseLogger } from 'fastify';

/**
 * The part of Fastify's pino logger that non-HTTP modules log through.
 * The server hands `app.log` to the engine and the chat bot so every line
 * goes through one pino instance.
 */
export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

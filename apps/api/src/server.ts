import { config, validateRequiredEnv } from './config.js';
import { buildApp } from './app.js';

const validation = validateRequiredEnv(config);
for (const warning of validation.warnings) {
  console.warn(`[config] ${warning.key}: ${warning.reason}`);
}
if (!validation.ok) {
  for (const error of validation.errors) {
    console.error(`[config] ${error.key}: ${error.reason}`);
  }
  process.exit(1);
}

const { app, services } = await buildApp(config);

const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { model: services.engine.model, failurePolicy: services.engine.failurePolicy },
      `Recursive Witness API running on http://localhost:${config.port}`,
    );

    if (services.bot && config.telegramStartupChatId) {
      try {
        await services.bot.announce(config.telegramStartupChatId);
      } catch (err) {
        app.log.warn({ err }, '[Telegram] Failed to send startup message');
      }
    }
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  app.log.info('Shutting down...');
  await app.close();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

await start();

import type { Server } from 'node:http';
import pino from 'pino';
import { getConfig } from './config.js';
import { createApp, type SeatshareApp } from './app.js';
import { createWebhookServer } from './server.js';
import { registerCommands } from './telegram/bot.js';

// Initialize logger first
const env = process.env;
const logger = pino({
  level: env['LOG_LEVEL'] || 'info',
  transport:
    env['NODE_ENV'] === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

const startTime = Date.now();

let app: SeatshareApp | null = null;
let webhookServer: Server | null = null;

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info('Starting seatshare bot');

  // Load configuration (will throw if invalid)
  const config = getConfig();
  logger.info(
    { env: config.nodeEnv, store: config.store.driver, mode: config.webhook ? 'webhook' : 'polling' },
    'Configuration loaded'
  );

  app = createApp(config, logger);
  const { bot, reaper } = app;

  // Sweep once before taking traffic
  await reaper.run();
  reaper.start();

  // Non-fatal: the bot works without a command menu
  await registerCommands(bot).catch((error: unknown) => {
    logger.warn({ error }, 'Failed to set bot commands');
  });

  if (config.webhook) {
    const webhook = config.webhook;
    await bot.init();
    await bot.api.setWebhook(webhook.endpoint, { secret_token: webhook.secretToken });

    const server = createWebhookServer({
      bot,
      path: webhook.path,
      secretToken: webhook.secretToken,
      health: {
        getStartTime: () => startTime,
        isReaperRunning: () => reaper.running,
      },
      logger,
    });
    webhookServer = server.listen(webhook.port, () => {
      logger.info({ port: webhook.port, endpoint: webhook.endpoint }, 'Webhook server listening');
    });
  } else {
    await bot.api.deleteWebhook();
    bot
      .start({
        onStart: (info) => logger.info({ username: info.username }, 'Bot polling started'),
      })
      .catch((error: unknown) => {
        logger.fatal({ error }, 'Polling stopped unexpectedly');
        process.exit(1);
      });
  }

  logger.info('Seatshare bot fully initialized and ready');
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutdown signal received, starting graceful shutdown');

  const server = webhookServer;
  if (server) {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Webhook server closed');
  }

  if (app) {
    app.reaper.stop();
    if (app.bot.isRunning()) {
      await app.bot.stop();
      logger.info('Polling stopped');
    }
    // Waits for the transaction in flight
    await app.repository.close();
  }

  logger.info('Shutdown complete');
  process.exit(0);
}

const onSignal = (signal: string) => {
  shutdown(signal).catch((error: unknown) => {
    logger.fatal({ error }, 'Graceful shutdown failed');
    process.exit(1);
  });
};

// Handle shutdown signals
process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection, shutting down');
  process.exit(1);
});

// Start the bot
main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start seatshare bot');
  process.exit(1);
});

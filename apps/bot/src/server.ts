/**
 * Webhook Server
 *
 * Express app serving the Telegram webhook and a health check. Only used
 * when WEBHOOK_URL is configured; otherwise the bot polls.
 */

import express, { type Express } from 'express';
import { webhookCallback, type Bot } from 'grammy';
import type { Logger } from 'pino';

export interface HealthChecker {
  getStartTime: () => number;
  isReaperRunning: () => boolean;
}

export interface WebhookServerOptions {
  bot: Bot;
  path: string;
  secretToken?: string;
  health: HealthChecker;
  logger: Logger;
}

export function createWebhookServer(options: WebhookServerOptions): Express {
  const log = options.logger.child({ component: 'WebhookServer' });
  const app = express();

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      uptimeSeconds: Math.floor((Date.now() - options.health.getStartTime()) / 1000),
      reaperRunning: options.health.isReaperRunning(),
    });
  });

  app.post(
    options.path,
    (req, _res, next) => {
      log.debug({ updateId: req.body?.update_id }, 'Received Telegram webhook update');
      next();
    },
    webhookCallback(options.bot, 'express', { secretToken: options.secretToken })
  );

  return app;
}

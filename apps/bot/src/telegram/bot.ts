/**
 * Telegram Bot
 *
 * grammy wiring: text messages and button presses go to the gateway,
 * everything else is dropped. Errors thrown by a handler are logged by
 * bot.catch and the bot keeps running.
 */

import { Bot } from 'grammy';
import type { Logger } from 'pino';
import { COMMAND_HELP, type ConversationEngine } from '@seatshare/adapters/session';
import { TelegramGateway } from './gateway.js';

export interface CreateBotOptions {
  token: string;
  engine: ConversationEngine;
  logger: Logger;
}

export function createBot(options: CreateBotOptions): Bot {
  const log = options.logger.child({ component: 'TelegramBot' });
  const gateway = new TelegramGateway({ engine: options.engine, logger: options.logger });
  const bot = new Bot(options.token);

  bot.on('message:text', async (ctx) => {
    const chatId = ctx.chat?.id;
    const userId = ctx.from?.id;
    if (chatId === undefined || userId === undefined) {
      log.debug({ updateId: ctx.update.update_id }, 'Message without a sender');
      return;
    }
    await gateway.onMessage(ctx, chatId, userId, ctx.message.text);
  });

  bot.on('callback_query:data', async (ctx) => {
    await ctx.answerCallbackQuery();
    const chatId = ctx.chat?.id;
    const userId = ctx.from?.id;
    if (chatId === undefined || userId === undefined) {
      log.debug({ updateId: ctx.update.update_id }, 'Button press without a chat');
      return;
    }
    await gateway.onButton(ctx, chatId, userId, ctx.callbackQuery.data);
  });

  bot.catch((err) => {
    log.error({ error: err.error, updateId: err.ctx.update.update_id }, 'Bot error');
  });

  return bot;
}

/**
 * Publish the command list shown in Telegram's menu.
 */
export async function registerCommands(bot: Bot): Promise<void> {
  await bot.api.setMyCommands(
    COMMAND_HELP.map(({ command, description }) => ({ command, description }))
  );
}

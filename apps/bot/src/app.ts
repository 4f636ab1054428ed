/**
 * Application Wiring
 *
 * Builds the repository, ledger, reaper, conversation engine and bot from
 * configuration. Nothing here starts a timer or touches the network.
 */

import type { Bot } from 'grammy';
import type { Logger } from 'pino';
import type { ISnapshotRepository } from '@seatshare/core/ports';
import { createSqliteSnapshotRepository, JsonFileSnapshotRepository } from '@seatshare/adapters/storage';
import { ExpiryReaper, SubscriptionLedger } from '@seatshare/adapters/ledger';
import { ConversationEngine, InMemorySessionStore } from '@seatshare/adapters/session';
import type { BotConfig } from './config.js';
import { createBot } from './telegram/bot.js';

export interface SeatshareApp {
  repository: ISnapshotRepository;
  ledger: SubscriptionLedger;
  reaper: ExpiryReaper;
  engine: ConversationEngine;
  bot: Bot;
}

export function createRepository(store: BotConfig['store'], logger: Logger): ISnapshotRepository {
  switch (store.driver) {
    case 'sqlite':
      return createSqliteSnapshotRepository({ path: store.path, logger });
    case 'json':
      return new JsonFileSnapshotRepository({ path: store.path, logger });
  }
}

export function createApp(config: BotConfig, logger: Logger): SeatshareApp {
  const repository = createRepository(config.store, logger);

  const ledger = new SubscriptionLedger({
    repository,
    logger,
    defaultSlotCount: config.defaultSlotCount,
  });

  const reaper = new ExpiryReaper({
    repository,
    logger,
    intervalMinutes: config.reapIntervalMinutes,
  });

  const engine = new ConversationEngine({
    ledger,
    sessions: new InMemorySessionStore({ logger }),
    logger,
  });

  const bot = createBot({ token: config.botToken, engine, logger });

  return { repository, ledger, reaper, engine, bot };
}

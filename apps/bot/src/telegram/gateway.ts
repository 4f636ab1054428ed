/**
 * TelegramGateway
 *
 * Maps chat updates to interaction events, hands them to the conversation
 * engine and replies with the rendered response. One session per user per
 * chat.
 */

import { InputFile, type InlineKeyboard } from 'grammy';
import type { Logger } from 'pino';
import type { ConversationEngine, InteractionEventInput, SessionResponse } from '@seatshare/adapters/session';
import { renderResponse } from './render.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The part of a grammy context the gateway replies through.
 */
export interface ReplyTarget {
  reply(text: string, other?: { reply_markup?: InlineKeyboard }): Promise<unknown>;
  replyWithDocument(document: InputFile, other?: { caption?: string }): Promise<unknown>;
}

export interface TelegramGatewayOptions {
  engine: ConversationEngine;
  logger: Logger;
}

// =============================================================================
// Event Mapping
// =============================================================================

/** `/name@bot arg1 arg2` */
const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

export function sessionIdOf(chatId: number, userId: number): string {
  return `${chatId}:${userId}`;
}

/**
 * A message starting with `/name` is a command, anything else is text.
 */
export function toMessageEvent(sessionId: string, text: string): InteractionEventInput {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return { type: 'text', sessionId, text };
  }
  const [, name = '', rest = ''] = match;
  return { type: 'command', sessionId, name, args: rest.split(/\s+/).filter(Boolean) };
}

// =============================================================================
// Implementation
// =============================================================================

export class TelegramGateway {
  private readonly engine: ConversationEngine;
  private readonly log: Logger;
  private readonly encoder = new TextEncoder();

  constructor(options: TelegramGatewayOptions) {
    this.engine = options.engine;
    this.log = options.logger.child({ component: 'TelegramGateway' });
  }

  async onMessage(target: ReplyTarget, chatId: number, userId: number, text: string): Promise<SessionResponse> {
    const event = toMessageEvent(sessionIdOf(chatId, userId), text);
    return this.dispatch(target, event);
  }

  async onButton(target: ReplyTarget, chatId: number, userId: number, payload: string): Promise<SessionResponse> {
    return this.dispatch(target, { type: 'button', sessionId: sessionIdOf(chatId, userId), payload });
  }

  private async dispatch(target: ReplyTarget, event: InteractionEventInput): Promise<SessionResponse> {
    const response = await this.engine.handle(event);
    const reply = renderResponse(response);
    if (!reply) {
      return response;
    }

    if (reply.document) {
      const file = new InputFile(this.encoder.encode(reply.document.content), reply.document.filename);
      await target.replyWithDocument(file, { caption: reply.text });
    } else {
      await target.reply(reply.text, reply.keyboard ? { reply_markup: reply.keyboard } : undefined);
    }

    this.log.debug({ sessionId: event.sessionId, event: event.type, response: response.kind }, 'Reply sent');
    return response;
  }
}

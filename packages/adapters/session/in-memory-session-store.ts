/**
 * InMemorySessionStore
 *
 * Process-local ISessionStore. Records are copied on the way in and out so
 * callers never share mutable state with the store.
 */

import type { Logger } from 'pino';
import type { ConversationSession } from '@seatshare/core/domain';
import type { ISessionStore } from '@seatshare/core/ports';

export interface InMemorySessionStoreOptions {
  /** Logger instance */
  logger: Logger;
}

export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly log: Logger;

  constructor(options: InMemorySessionStoreOptions) {
    this.log = options.logger.child({ component: 'InMemorySessionStore' });
  }

  get size(): number {
    return this.sessions.size;
  }

  async get(sessionId: string): Promise<ConversationSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async set(session: ConversationSession): Promise<void> {
    this.sessions.set(session.sessionId, structuredClone(session));
    this.log.debug(
      { sessionId: session.sessionId, flow: session.active.flow, step: session.active.step },
      'Session stored'
    );
  }

  async delete(sessionId: string): Promise<boolean> {
    const deleted = this.sessions.delete(sessionId);
    if (deleted) {
      this.log.debug({ sessionId }, 'Session cleared');
    }
    return deleted;
  }

  async list(): Promise<ConversationSession[]> {
    return Array.from(this.sessions.values(), (session) => structuredClone(session));
  }
}

/**
 * ISessionStore Interface
 *
 * Port for conversation session records. A record exists only while a flow
 * is in progress; sessions never expire on a timer.
 */

import type { ConversationSession } from '../domain/session.js';

export interface ISessionStore {
  /**
   * @returns Session or null when the initiator is idle
   */
  get(sessionId: string): Promise<ConversationSession | null>;

  /**
   * Create or replace the record for `session.sessionId`.
   */
  set(session: ConversationSession): Promise<void>;

  /**
   * @returns True if a record was removed
   */
  delete(sessionId: string): Promise<boolean>;

  /**
   * All active sessions, for diagnostics.
   */
  list(): Promise<ConversationSession[]>;
}

import type {
  SessionAttributes,
  SessionAttributeKey,
} from '../entities/SessionAttributes.js';

/**
 * Port interface for the conversation-scoped attribute store.
 * Nothing stored here is visible to another conversation.
 */
export interface ISessionStore {
  /**
   * Start a conversation with empty attributes
   */
  open(sessionId: string): void;

  /**
   * Snapshot of the conversation's attributes (empty when unknown)
   */
  get(sessionId: string): SessionAttributes;

  /**
   * Add or overwrite one attribute
   */
  set<K extends SessionAttributeKey>(
    sessionId: string,
    key: K,
    value: NonNullable<SessionAttributes[K]>
  ): void;

  /**
   * Drop everything held for the conversation
   */
  close(sessionId: string): void;

  /**
   * Number of open conversations
   */
  size(): number;
}

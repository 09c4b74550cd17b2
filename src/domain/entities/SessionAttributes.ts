/**
 * Conversation-scoped attributes. Lives from session start to session end
 * and is never persisted past the conversation.
 */
export interface NotifiedPair {
  readonly recipient: string;
  readonly requester: string;
}

export interface SessionAttributes {
  recipient?: string;
  requester?: string;
  /** The pair last notified in this conversation */
  notifiedFor?: NotifiedPair;
}

export type SessionAttributeKey = keyof SessionAttributes;

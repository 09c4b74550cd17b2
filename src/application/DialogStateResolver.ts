import {
  complete,
  needField,
  UNINTELLIGIBLE,
  type Decision,
} from '../domain/entities/Decision.js';
import { FIELDS, slotValue, type Field, type TurnSlots } from '../domain/entities/Field.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ISessionStore } from '../domain/ports/ISessionStore.js';

export interface DialogStateResolverOptions {
  /**
   * When true, a one-shot turn missing a field uses the value already held
   * in the session before asking for it. When false the one-shot path only
   * looks at the current turn.
   */
  oneShotSessionFallback?: boolean;
}

/**
 * Conceptual dialog state, derived from session content at the start of a turn
 */
export type DialogState = 'empty' | 'have_recipient' | 'have_requester' | 'complete';

/**
 * Decides, turn by turn, whether a front-desk request can be completed or
 * which single field to ask for next.
 *
 * Values supplied in a turn are written to the session before deciding, so
 * a field once known is never asked for again in the same conversation.
 * An unintelligible turn leaves the session untouched.
 */
export class DialogStateResolver {
  private readonly oneShotSessionFallback: boolean;

  constructor(
    private readonly sessions: ISessionStore,
    private readonly logger: ILogger,
    options: DialogStateResolverOptions = {}
  ) {
    this.oneShotSessionFallback = options.oneShotSessionFallback ?? true;
  }

  stateOf(sessionId: string): DialogState {
    const { recipient, requester } = this.sessions.get(sessionId);
    if (recipient && requester) return 'complete';
    if (recipient) return 'have_recipient';
    if (requester) return 'have_requester';
    return 'empty';
  }

  /**
   * Single utterance expected to name both fields. Recipient is always
   * checked before requester.
   */
  resolveOneShot(sessionId: string, slots: TurnSlots): Decision {
    const session = this.sessions.get(sessionId);
    this.remember(sessionId, slots);

    const recipient =
      slotValue(slots.recipient) ?? (this.oneShotSessionFallback ? session.recipient : undefined);
    const requester =
      slotValue(slots.requester) ?? (this.oneShotSessionFallback ? session.requester : undefined);

    if (recipient === undefined) {
      return this.decided(sessionId, 'one-shot', needField('recipient'));
    }
    if (requester === undefined) {
      return this.decided(sessionId, 'one-shot', needField('requester'));
    }
    return this.decided(sessionId, 'one-shot', complete(recipient, requester));
  }

  /**
   * Follow-up utterance carrying one of the fields. What is asked for next
   * depends on which field the session already holds.
   */
  resolveDialog(sessionId: string, slots: TurnSlots): Decision {
    const recipient = slotValue(slots.recipient);
    const requester = slotValue(slots.requester);

    // Both supplied at once reads as a one-shot request
    if (recipient !== undefined && requester !== undefined) {
      return this.resolveOneShot(sessionId, slots);
    }

    const session = this.sessions.get(sessionId);

    if (recipient !== undefined) {
      this.sessions.set(sessionId, 'recipient', recipient);
      const decision = session.requester
        ? complete(recipient, session.requester)
        : needField('requester');
      return this.decided(sessionId, 'dialog', decision);
    }

    if (requester !== undefined) {
      this.sessions.set(sessionId, 'requester', requester);
      const decision = session.recipient
        ? complete(session.recipient, requester)
        : needField('recipient');
      return this.decided(sessionId, 'dialog', decision);
    }

    // Nothing new, but the request was already completed in this conversation
    if (session.recipient && session.requester) {
      return this.decided(sessionId, 'dialog', complete(session.recipient, session.requester));
    }

    return this.decided(sessionId, 'dialog', UNINTELLIGIBLE);
  }

  private remember(sessionId: string, slots: TurnSlots): void {
    for (const field of FIELDS) {
      const value = slotValue(slots[field]);
      if (value !== undefined) {
        this.sessions.set(sessionId, field, value);
      }
    }
  }

  private decided(sessionId: string, path: 'one-shot' | 'dialog', decision: Decision): Decision {
    const field: Field | undefined = decision.type === 'need_field' ? decision.field : undefined;
    this.logger.debug('Turn resolved', {
      sessionId,
      path,
      decision: decision.type,
      ...(field && { field }),
      state: this.stateOf(sessionId),
    });
    return decision;
  }
}

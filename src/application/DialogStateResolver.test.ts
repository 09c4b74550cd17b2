import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DialogStateResolver } from './DialogStateResolver.js';
import { InMemorySessionStore } from '../infrastructure/session/InMemorySessionStore.js';
import { ABSENT_SLOT, filledSlot, type TurnSlots } from '../domain/entities/Field.js';
import type { ILogger } from '../domain/ports/ILogger.js';

function slots(recipient?: string | null, requester?: string | null): TurnSlots {
  const toSlot = (value: string | null | undefined) =>
    value === undefined ? ABSENT_SLOT : value === null ? ({ kind: 'empty' } as const) : filledSlot(value);
  return { recipient: toSlot(recipient), requester: toSlot(requester) };
}

describe('DialogStateResolver', () => {
  let mockLogger: ILogger;
  let sessions: InMemorySessionStore;
  let resolver: DialogStateResolver;

  beforeEach(() => {
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };

    sessions = new InMemorySessionStore(mockLogger);
    sessions.open('s1');
    resolver = new DialogStateResolver(sessions, mockLogger);
  });

  describe('one-shot path', () => {
    it('should complete when both fields are supplied', () => {
      expect(resolver.resolveOneShot('s1', slots('Kevin', 'Sam'))).toEqual({
        type: 'complete',
        recipient: 'Kevin',
        requester: 'Sam',
      });
    });

    it('should ask for the recipient first when it is absent', () => {
      expect(resolver.resolveOneShot('s1', slots(undefined, 'Sam'))).toEqual({
        type: 'need_field',
        field: 'recipient',
      });
    });

    it('should ask for the recipient when its slot has no value', () => {
      expect(resolver.resolveOneShot('s1', slots(null, 'Sam'))).toEqual({
        type: 'need_field',
        field: 'recipient',
      });
    });

    it('should ask for the recipient before the requester when both are missing', () => {
      expect(resolver.resolveOneShot('s1', slots())).toEqual({
        type: 'need_field',
        field: 'recipient',
      });
    });

    it('should ask for the requester when only the recipient is supplied', () => {
      expect(resolver.resolveOneShot('s1', slots('Kevin'))).toEqual({
        type: 'need_field',
        field: 'requester',
      });
    });

    it('should persist supplied values to the session', () => {
      resolver.resolveOneShot('s1', slots('Kevin'));

      expect(sessions.get('s1')).toEqual({ recipient: 'Kevin' });
    });

    it('should fall back to a session-held recipient rather than re-asking', () => {
      sessions.set('s1', 'recipient', 'Kevin');

      expect(resolver.resolveOneShot('s1', slots(undefined, 'Sam'))).toEqual({
        type: 'complete',
        recipient: 'Kevin',
        requester: 'Sam',
      });
    });

    it('should prefer the value spoken this turn over the session value', () => {
      sessions.set('s1', 'recipient', 'Kevin');

      expect(resolver.resolveOneShot('s1', slots('Priya', 'Sam'))).toEqual({
        type: 'complete',
        recipient: 'Priya',
        requester: 'Sam',
      });
      expect(sessions.get('s1').recipient).toBe('Priya');
    });

    it('should ignore the session when session fallback is disabled', () => {
      const strict = new DialogStateResolver(sessions, mockLogger, { oneShotSessionFallback: false });
      sessions.set('s1', 'recipient', 'Kevin');

      // Known asymmetry with the dialog path: the one-shot check reads this turn only
      expect(strict.resolveOneShot('s1', slots(undefined, 'Sam'))).toEqual({
        type: 'need_field',
        field: 'recipient',
      });
    });
  });

  describe('dialog path', () => {
    it('should store the recipient and ask for the requester', () => {
      expect(resolver.resolveDialog('s1', slots('Kevin'))).toEqual({
        type: 'need_field',
        field: 'requester',
      });
      expect(sessions.get('s1')).toEqual({ recipient: 'Kevin' });
    });

    it('should store the requester and ask for the recipient', () => {
      expect(resolver.resolveDialog('s1', slots(undefined, 'Sam'))).toEqual({
        type: 'need_field',
        field: 'recipient',
      });
      expect(sessions.get('s1')).toEqual({ requester: 'Sam' });
    });

    it('should complete when the session already has the requester', () => {
      sessions.set('s1', 'requester', 'Sam');

      expect(resolver.resolveDialog('s1', slots('Kevin'))).toEqual({
        type: 'complete',
        recipient: 'Kevin',
        requester: 'Sam',
      });
    });

    it('should complete when the session already has the recipient', () => {
      sessions.set('s1', 'recipient', 'Kevin');

      expect(resolver.resolveDialog('s1', slots(undefined, 'Sam'))).toEqual({
        type: 'complete',
        recipient: 'Kevin',
        requester: 'Sam',
      });
    });

    it('should be unintelligible when no slot has a value', () => {
      expect(resolver.resolveDialog('s1', slots(null, null))).toEqual({ type: 'unintelligible' });
    });

    it('should not touch the session on an unintelligible turn', () => {
      sessions.set('s1', 'requester', 'Sam');

      resolver.resolveDialog('s1', slots());

      expect(sessions.get('s1')).toEqual({ requester: 'Sam' });
    });

    it('should treat both fields in one utterance as a one-shot request', () => {
      const oneShot = vi.spyOn(resolver, 'resolveOneShot');

      const decision = resolver.resolveDialog('s1', slots('Kevin', 'Sam'));

      expect(oneShot).toHaveBeenCalledWith('s1', slots('Kevin', 'Sam'));
      expect(decision).toEqual({ type: 'complete', recipient: 'Kevin', requester: 'Sam' });
    });

    it('should repeat the completion on a later turn without asking again', () => {
      resolver.resolveDialog('s1', slots('Kevin'));
      resolver.resolveDialog('s1', slots(undefined, 'Sam'));

      expect(resolver.resolveDialog('s1', slots())).toEqual({
        type: 'complete',
        recipient: 'Kevin',
        requester: 'Sam',
      });
    });

    it('should overwrite a known field when it is given again', () => {
      resolver.resolveDialog('s1', slots('Kevin'));

      expect(resolver.resolveDialog('s1', slots('Priya'))).toEqual({
        type: 'need_field',
        field: 'requester',
      });
      expect(sessions.get('s1')).toEqual({ recipient: 'Priya' });
    });
  });

  describe('across a conversation', () => {
    it('should never ask again for a field already stored', () => {
      const asked: string[] = [];
      const turns: Array<['one-shot' | 'dialog', TurnSlots]> = [
        ['dialog', slots('Kevin')],
        ['one-shot', slots(undefined, undefined)],
        ['dialog', slots(null, null)],
        ['one-shot', slots(undefined, 'Sam')],
      ];

      for (const [path, turn] of turns) {
        const known = sessions.get('s1');
        const decision =
          path === 'one-shot' ? resolver.resolveOneShot('s1', turn) : resolver.resolveDialog('s1', turn);
        if (decision.type === 'need_field') {
          expect(known[decision.field]).toBeUndefined();
          asked.push(decision.field);
        }
      }

      expect(asked).toEqual(['requester', 'requester']);
    });
  });

  describe('stateOf', () => {
    it('should derive the dialog state from the session', () => {
      expect(resolver.stateOf('s1')).toBe('empty');

      sessions.set('s1', 'recipient', 'Kevin');
      expect(resolver.stateOf('s1')).toBe('have_recipient');

      sessions.set('s1', 'requester', 'Sam');
      expect(resolver.stateOf('s1')).toBe('complete');
    });

    it('should report have_requester when only the requester is known', () => {
      sessions.set('s1', 'requester', 'Sam');

      expect(resolver.stateOf('s1')).toBe('have_requester');
    });

    it('should log the state a turn leaves behind', () => {
      resolver.resolveDialog('s1', slots('Kevin'));

      expect(mockLogger.debug).toHaveBeenCalledWith('Turn resolved', {
        sessionId: 's1',
        path: 'dialog',
        decision: 'need_field',
        field: 'requester',
        state: 'have_recipient',
      });
    });
  });
});

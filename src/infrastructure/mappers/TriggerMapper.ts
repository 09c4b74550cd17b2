import {
  ABSENT_SLOT,
  filledSlot,
  type Slot,
  type TurnSlots,
} from '../../domain/entities/Field.js';
import type { FixedTriggerKind, SlotTriggerKind, Trigger } from '../../domain/entities/Trigger.js';
import { InvalidEnvelopeError } from '../../domain/errors/InvalidEnvelopeError.js';
import { UnknownIntentError } from '../../domain/errors/UnknownIntentError.js';

/**
 * Request types sent by the hosting platform
 */
export type EnvelopeTriggerType =
  | 'LaunchRequest'
  | 'IntentRequest'
  | 'SessionStartedRequest'
  | 'SessionEndedRequest';

/**
 * Raw inbound request envelope
 */
export interface TriggerEnvelope {
  triggerType: EnvelopeTriggerType;
  sessionId: string;
  requestId?: string;
  intentName?: string;
  slots?: Record<string, string | null | undefined>;
}

const INTENT_KINDS: Readonly<Record<string, SlotTriggerKind | FixedTriggerKind>> = {
  NotifyIntent: 'direct-request',
  DialogNotifyIntent: 'dialog-continuation',
  'AMAZON.HelpIntent': 'help',
  'AMAZON.CancelIntent': 'cancel',
  'AMAZON.StopIntent': 'stop',
};

const LIFECYCLE_KINDS: Readonly<Record<Exclude<EnvelopeTriggerType, 'IntentRequest'>, FixedTriggerKind>> = {
  LaunchRequest: 'launch',
  SessionStartedRequest: 'session-start',
  SessionEndedRequest: 'session-end',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTriggerType(value: unknown): value is EnvelopeTriggerType {
  return (
    value === 'IntentRequest' ||
    (typeof value === 'string' && Object.prototype.hasOwnProperty.call(LIFECYCLE_KINDS, value))
  );
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidEnvelopeError(`${field} must be a string`);
  }
  return value;
}

function slotString(value: unknown, name: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new InvalidEnvelopeError(`Slot "${name}" must be a string or null`);
  }
  return value;
}

function isSlotTriggerKind(kind: SlotTriggerKind | FixedTriggerKind): kind is SlotTriggerKind {
  return kind === 'direct-request' || kind === 'dialog-continuation';
}

/**
 * Maps platform request envelopes to the closed trigger set
 */
export class TriggerMapper {
  /**
   * Validate an untrusted JSON body as an envelope
   */
  static parseEnvelope(body: unknown): TriggerEnvelope {
    if (!isRecord(body)) {
      throw new InvalidEnvelopeError('Envelope must be a JSON object');
    }

    const { triggerType, sessionId, slots } = body;

    if (!isTriggerType(triggerType)) {
      throw new InvalidEnvelopeError(`Unsupported triggerType: ${String(triggerType)}`);
    }
    if (typeof sessionId !== 'string' || !sessionId.trim()) {
      throw new InvalidEnvelopeError('sessionId is required');
    }

    const envelope: TriggerEnvelope = {
      triggerType,
      sessionId: sessionId.trim(),
      requestId: optionalString(body.requestId, 'requestId'),
      intentName: optionalString(body.intentName, 'intentName'),
    };

    if (slots !== undefined && slots !== null) {
      if (!isRecord(slots)) {
        throw new InvalidEnvelopeError('slots must be an object');
      }
      const parsedSlots: Record<string, string | null> = {};
      for (const [name, value] of Object.entries(slots)) {
        parsedSlots[name] = slotString(value, name);
      }
      envelope.slots = parsedSlots;
    }

    return envelope;
  }

  /**
   * Normalize one raw slot: blank strings count as valueless
   */
  static toSlot(raw: string | null | undefined): Slot {
    if (raw === undefined) return ABSENT_SLOT;
    if (raw === null) return { kind: 'empty' };
    const value = raw.trim();
    return value ? filledSlot(value) : { kind: 'empty' };
  }

  static toTurnSlots(slots: TriggerEnvelope['slots']): TurnSlots {
    return {
      recipient: TriggerMapper.toSlot(slots?.recipient),
      requester: TriggerMapper.toSlot(slots?.requester),
    };
  }

  static toTrigger(envelope: TriggerEnvelope): Trigger {
    const { sessionId, requestId } = envelope;

    if (envelope.triggerType !== 'IntentRequest') {
      return { kind: LIFECYCLE_KINDS[envelope.triggerType], sessionId, requestId };
    }

    const intentName = envelope.intentName ?? '';
    const kind = Object.prototype.hasOwnProperty.call(INTENT_KINDS, intentName)
      ? INTENT_KINDS[intentName]
      : undefined;
    if (!kind) {
      throw new UnknownIntentError(intentName);
    }

    if (isSlotTriggerKind(kind)) {
      return { kind, sessionId, requestId, slots: TriggerMapper.toTurnSlots(envelope.slots) };
    }
    return { kind, sessionId, requestId };
  }
}

import type { TurnSlots } from './Field.js';

/**
 * Triggers that carry slots and go through the dialog resolver
 */
export type SlotTriggerKind = 'direct-request' | 'dialog-continuation';

/**
 * Triggers answered with a canned response or handled as lifecycle events
 */
export type FixedTriggerKind =
  | 'launch'
  | 'help'
  | 'cancel'
  | 'stop'
  | 'session-start'
  | 'session-end';

export type TriggerKind = SlotTriggerKind | FixedTriggerKind;

/**
 * One inbound event from the hosting conversational platform
 */
export type Trigger =
  | { kind: SlotTriggerKind; sessionId: string; requestId?: string; slots: TurnSlots }
  | { kind: FixedTriggerKind; sessionId: string; requestId?: string };

/**
 * The two roles a front-desk request is made of: who the visitor is here
 * to see, and who the visitor is.
 */
export const FIELDS = ['recipient', 'requester'] as const;

export type Field = (typeof FIELDS)[number];

/**
 * A slot as extracted from one utterance.
 * `absent` means the platform sent no slot at all; `empty` means the slot
 * was sent without a value.
 */
export type Slot =
  | { kind: 'absent' }
  | { kind: 'empty' }
  | { kind: 'filled'; value: string };

/**
 * Slots extracted from the current turn, one per field
 */
export type TurnSlots = Readonly<Record<Field, Slot>>;

export const ABSENT_SLOT: Slot = { kind: 'absent' };

export function filledSlot(value: string): Slot {
  return { kind: 'filled', value };
}

/**
 * Value of a slot, or undefined when it is absent or valueless
 */
export function slotValue(slot: Slot): string | undefined {
  return slot.kind === 'filled' ? slot.value : undefined;
}

import type { Field } from './Field.js';

/**
 * Outcome of resolving one turn. Produced fresh each turn and never stored.
 */
export type Decision =
  | { type: 'need_field'; field: Field }
  | { type: 'complete'; recipient: string; requester: string }
  | { type: 'unintelligible' };

export function needField(field: Field): Decision {
  return { type: 'need_field', field };
}

export function complete(recipient: string, requester: string): Decision {
  return { type: 'complete', recipient, requester };
}

export const UNINTELLIGIBLE: Decision = { type: 'unintelligible' };

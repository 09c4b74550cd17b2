/**
 * Raised when a trigger names an intent the router does not handle.
 * Fatal for the turn; the hosting platform renders its own apology.
 */
export class UnknownIntentError extends Error {
  readonly name = 'UnknownIntentError';

  constructor(readonly intentName: string) {
    super(`Invalid intent: ${intentName}`);
  }
}

/**
 * Raised when an inbound request envelope does not have the expected shape
 */
export class InvalidEnvelopeError extends Error {
  readonly name = 'InvalidEnvelopeError';

  constructor(message: string) {
    super(message);
  }
}

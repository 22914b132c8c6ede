/**
 * Raised when a byte buffer cannot be turned into a Card.
 * Carries a copy of the offending bytes for diagnostics.
 */
export class ConversionError extends Error {
  readonly bytes: Uint8Array;

  constructor(message: string, bytes: Uint8Array, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.bytes = Uint8Array.from(bytes);
  }
}

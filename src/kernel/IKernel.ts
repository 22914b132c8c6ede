/**
 * IKernel - Interface for the hardware layer that controls physical cards
 *
 * A kernel wraps a concrete reader/writer (for example a PN532 NFC chip) or
 * a simulation of one. The registry holds a kernel for its whole lifetime
 * but never performs I/O through it; callers bridge card events themselves.
 *
 * All calls are synchronous. Failures surface as KernelError.
 */

import type { Card } from '../types/Card.js';

/**
 * Exclusive handle on a physical card, obtained through {@link Kernel.readMut}.
 * While it is held, no other read or write on the same id may go through
 * the kernel that issued it.
 */
export interface MutableCardRef {
  /** Current state of the card. */
  readonly card: Card;

  /**
   * Replace the card state. The id must not change.
   * @throws KernelError with ID_MISMATCH or REFERENCE_RELEASED
   */
  set(card: Card): void;

  /** Give up exclusive access. Further use of the handle throws. */
  release(): void;

  readonly released: boolean;
}

export interface Kernel {
  /**
   * Fetch the live state of a physical card.
   * @throws KernelError (read)
   */
  read(cardId: number): Card;

  /**
   * Fetch a card with exclusive mutation access.
   * @throws KernelError (read)
   */
  readMut(cardId: number): MutableCardRef;

  /**
   * Push a raw payload to a physical card.
   * @throws KernelError (write)
   */
  write(card: Card, data: Uint8Array): void;

  /**
   * Poll for cards in range. Never fails and always returns.
   */
  sense(): void;
}

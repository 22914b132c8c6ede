import type { Kernel, MutableCardRef } from './IKernel.js';

/**
 * Run `fn` with exclusive access to a card, releasing the reference on
 * every exit path.
 */
export function withCardMut<T>(kernel: Kernel, cardId: number, fn: (ref: MutableCardRef) => T): T {
  const ref = kernel.readMut(cardId);
  try {
    return fn(ref);
  } finally {
    ref.release();
  }
}

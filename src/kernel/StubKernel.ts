/**
 * StubKernel - Reference kernel for environments without card hardware
 *
 * Sensing is a no-op. Reads and writes fail with an UNIMPLEMENTED
 * KernelError so a missing backend is never mistaken for an empty one.
 */

import { KernelError, KernelErrorCode } from '../errors/KernelError.js';
import type { Card } from '../types/Card.js';
import type { Logger } from '../utils/Logger.js';
import type { Kernel, MutableCardRef } from './IKernel.js';

export class StubKernel implements Kernel {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  read(cardId: number): Card {
    throw KernelError.read(
      `StubKernel cannot read card ${cardId}: no hardware backend configured`,
      KernelErrorCode.UNIMPLEMENTED
    );
  }

  readMut(cardId: number): MutableCardRef {
    throw KernelError.read(
      `StubKernel cannot lock card ${cardId}: no hardware backend configured`,
      KernelErrorCode.UNIMPLEMENTED
    );
  }

  write(card: Card, data: Uint8Array): void {
    throw KernelError.write(
      `StubKernel cannot write ${data.length} bytes to card ${card.id}: no hardware backend configured`,
      KernelErrorCode.UNIMPLEMENTED
    );
  }

  sense(): void {
    this.logger?.debug('StubKernel sense (no hardware, nothing to scan)');
  }
}

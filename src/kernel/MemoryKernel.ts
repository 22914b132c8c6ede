/**
 * MemoryKernel - In-process simulation of a card reader/writer
 *
 * Cards are placed in and taken out of range explicitly. Writes are kept
 * per card id so callers can inspect what would have reached the chip.
 */

import { KernelError, KernelErrorCode } from '../errors/KernelError.js';
import type { Card } from '../types/Card.js';
import type { Logger } from '../utils/Logger.js';
import type { Kernel, MutableCardRef } from './IKernel.js';

export interface MemoryKernelOptions {
  cards?: Iterable<Card>;
  logger?: Logger;
}

class MemoryCardRef implements MutableCardRef {
  private current: Card;
  private isReleased = false;

  constructor(
    card: Card,
    private readonly onSet: (card: Card) => void,
    private readonly onRelease: () => void
  ) {
    this.current = card;
  }

  get card(): Card {
    if (this.isReleased) {
      throw KernelError.read(
        `Reference to card ${this.current.id} was released`,
        KernelErrorCode.REFERENCE_RELEASED
      );
    }
    return this.current;
  }

  get released(): boolean {
    return this.isReleased;
  }

  set(card: Card): void {
    if (this.isReleased) {
      throw KernelError.write(
        `Reference to card ${this.current.id} was released`,
        KernelErrorCode.REFERENCE_RELEASED
      );
    }
    if (card.id !== this.current.id) {
      throw KernelError.write(
        `Cannot replace card ${this.current.id} with card ${card.id}`,
        KernelErrorCode.ID_MISMATCH
      );
    }
    this.onSet(card);
    this.current = card;
  }

  release(): void {
    if (this.isReleased) return;
    this.isReleased = true;
    this.onRelease();
  }
}

export class MemoryKernel implements Kernel {
  private inRange: Map<number, Card> = new Map();
  private payloads: Map<number, Uint8Array> = new Map();
  private locked: Set<number> = new Set();
  private sensed: number[] = [];
  private scans = 0;
  private logger?: Logger;

  constructor(options: MemoryKernelOptions = {}) {
    this.logger = options.logger;
    for (const card of options.cards ?? []) {
      this.inRange.set(card.id, card);
    }
  }

  /**
   * Bring a card into range, replacing any card with the same id.
   */
  place(card: Card): void {
    this.inRange.set(card.id, card);
    this.logger?.debug('MemoryKernel card placed', { id: card.id });
  }

  /**
   * Move a card out of range.
   * @returns true if a card was in range
   */
  take(cardId: number): boolean {
    const removed = this.inRange.delete(cardId);
    if (removed) {
      this.logger?.debug('MemoryKernel card taken', { id: cardId });
    }
    return removed;
  }

  isLocked(cardId: number): boolean {
    return this.locked.has(cardId);
  }

  read(cardId: number): Card {
    this.ensureUnlocked(cardId, 'read');
    return this.lookup(cardId);
  }

  readMut(cardId: number): MutableCardRef {
    this.ensureUnlocked(cardId, 'read');
    const card = this.lookup(cardId);
    this.locked.add(cardId);
    this.logger?.debug('MemoryKernel card locked', { id: cardId });

    return new MemoryCardRef(
      card,
      (updated) => {
        if (!this.inRange.has(cardId)) {
          throw KernelError.write(`Card ${cardId} is not in range`, KernelErrorCode.CARD_NOT_PRESENT);
        }
        this.inRange.set(cardId, updated);
      },
      () => {
        this.locked.delete(cardId);
        this.logger?.debug('MemoryKernel card released', { id: cardId });
      }
    );
  }

  write(card: Card, data: Uint8Array): void {
    this.ensureUnlocked(card.id, 'write');
    if (!this.inRange.has(card.id)) {
      throw KernelError.write(`Card ${card.id} is not in range`, KernelErrorCode.CARD_NOT_PRESENT);
    }
    this.payloads.set(card.id, Uint8Array.from(data));
    this.logger?.debug('MemoryKernel payload written', { id: card.id, length: data.length });
  }

  sense(): void {
    this.scans++;
    this.sensed = Array.from(this.inRange.keys()).sort((a, b) => a - b);
    this.logger?.debug('MemoryKernel sense', { inRange: this.sensed.length });
  }

  /**
   * Ids found by the most recent {@link sense} call, ascending.
   */
  lastSensed(): number[] {
    return [...this.sensed];
  }

  get scanCount(): number {
    return this.scans;
  }

  lastPayload(cardId: number): Uint8Array | undefined {
    const payload = this.payloads.get(cardId);
    return payload ? Uint8Array.from(payload) : undefined;
  }

  private lookup(cardId: number): Card {
    const card = this.inRange.get(cardId);
    if (!card) {
      throw KernelError.read(`Card ${cardId} is not in range`, KernelErrorCode.CARD_NOT_PRESENT);
    }
    return card;
  }

  private ensureUnlocked(cardId: number, kind: 'read' | 'write'): void {
    if (!this.locked.has(cardId)) return;
    const message = `Card ${cardId} is held by an outstanding mutable reference`;
    throw kind === 'read'
      ? KernelError.read(message, KernelErrorCode.CARD_LOCKED)
      : KernelError.write(message, KernelErrorCode.CARD_LOCKED);
  }
}

/**
 * Card Registry
 *
 * In-memory store of cards keyed by id, bound to one hardware kernel for
 * its whole lifetime. The registry never talks to the kernel itself; see
 * CardSync for moving cards between the two.
 */

import { StubKernel } from '../kernel/StubKernel.js';
import type { Kernel } from '../kernel/IKernel.js';
import type { Card } from '../types/Card.js';
import type { Permissions } from '../types/Permissions.js';
import type { Logger } from '../utils/Logger.js';

export interface CardRegistryOptions<K extends Kernel> {
  kernel: K;
  logger?: Logger;
}

export class CardRegistry<K extends Kernel = Kernel> {
  private cardsById: Map<number, Card> = new Map();
  private readonly boundKernel: K;
  private logger?: Logger;

  constructor(options: CardRegistryOptions<K>) {
    this.boundKernel = options.kernel;
    this.logger = options.logger;
  }

  /**
   * Create an empty registry over the no-op {@link StubKernel}.
   */
  static create(logger?: Logger): CardRegistry<StubKernel> {
    return new CardRegistry({ kernel: new StubKernel(logger), logger });
  }

  /**
   * Create an empty registry over a chosen kernel.
   */
  static withKernel<K extends Kernel>(kernel: K, logger?: Logger): CardRegistry<K> {
    return new CardRegistry({ kernel, logger });
  }

  get kernel(): K {
    return this.boundKernel;
  }

  /**
   * Insert or replace the card stored under `card.id`.
   */
  put(card: Card): void {
    const replaced = this.cardsById.has(card.id);
    this.cardsById.set(card.id, card);
    this.logger?.debug(replaced ? 'Card replaced' : 'Card bound', {
      id: card.id,
      permissions: card.permissions.toString(),
    });
  }

  get(id: number): Card | undefined {
    return this.cardsById.get(id);
  }

  /**
   * Remove a card.
   * @returns the removed card, or undefined if none was bound
   */
  unbind(id: number): Card | undefined {
    const card = this.cardsById.get(id);
    if (!card) {
      return undefined;
    }
    this.cardsById.delete(id);
    this.logger?.debug('Card unbound', { id });
    return card;
  }

  contains(id: number): boolean {
    return this.cardsById.has(id);
  }

  /**
   * Snapshot of all cards, ascending by id.
   */
  cards(): Card[] {
    return Array.from(this.cardsById.values()).sort((a, b) => a.id - b.id);
  }

  ids(): number[] {
    return Array.from(this.cardsById.keys()).sort((a, b) => a - b);
  }

  /**
   * Cards holding every requested permission, ascending by id.
   */
  withPermissions(permissions: Permissions): Card[] {
    return this.cards().filter((card) => card.is(permissions));
  }

  /**
   * Encode every card, ascending by id.
   */
  exportBytes(): Uint8Array[] {
    return this.cards().map((card) => card.encode());
  }

  size(): number {
    return this.cardsById.size;
  }

  clear(): void {
    this.cardsById.clear();
    this.logger?.debug('Registry cleared');
  }

  toString(): string {
    return `CardRegistry { cards: ${this.cardsById.size} }`;
  }
}

/**
 * CardSync
 *
 * Moves cards between a registry and the kernel it is bound to:
 * sense for cards, read them into the registry, push registry state back
 * to hardware, and accept raw payloads received from a reader.
 */

import { CardNotBoundError } from '../errors/CardNotBoundError.js';
import { KernelError } from '../errors/KernelError.js';
import type { Kernel } from '../kernel/IKernel.js';
import { withCardMut } from '../kernel/withCardMut.js';
import { Card } from '../types/Card.js';
import type { Permissions } from '../types/Permissions.js';
import type { Logger } from '../utils/Logger.js';
import type { CardRegistry } from './CardRegistry.js';

export interface CardSyncOptions<K extends Kernel> {
  registry: CardRegistry<K>;
  logger?: Logger;
}

export class CardSync<K extends Kernel = Kernel> {
  private registry: CardRegistry<K>;
  private logger?: Logger;

  constructor(options: CardSyncOptions<K>) {
    this.registry = options.registry;
    this.logger = options.logger;
  }

  scan(): void {
    this.registry.kernel.sense();
  }

  /**
   * Read a card from hardware and bind it in the registry.
   */
  pull(cardId: number): Card {
    const card = this.withKernelErrorLog('read', cardId, () => this.registry.kernel.read(cardId));
    this.registry.put(card);
    this.logger?.info('Pulled card from hardware', { id: card.id });
    return card;
  }

  /**
   * Write the registry's copy of a card to hardware.
   */
  push(cardId: number): Card {
    const card = this.requireBound(cardId);
    this.withKernelErrorLog('write', cardId, () => this.registry.kernel.write(card, card.encode()));
    this.logger?.info('Pushed card to hardware', { id: card.id });
    return card;
  }

  /**
   * Decode a payload received from a reader and bind the card.
   * The registry is untouched when decoding fails.
   */
  receive(bytes: Uint8Array): Card {
    const card = Card.decode(bytes);
    this.registry.put(card);
    this.logger?.info('Received card payload', { id: card.id, length: bytes.length });
    return card;
  }

  grant(cardId: number, permissions: Permissions): Card {
    const current = this.requireBound(cardId);
    return this.replace(current.withPermissions(current.permissions.union(permissions)));
  }

  revoke(cardId: number, permissions: Permissions): Card {
    const current = this.requireBound(cardId);
    return this.replace(current.withPermissions(current.permissions.difference(permissions)));
  }

  private replace(updated: Card): Card {
    this.withKernelErrorLog('update', updated.id, () =>
      withCardMut(this.registry.kernel, updated.id, (ref) => ref.set(updated))
    );
    this.registry.put(updated);
    this.logger?.info('Card permissions updated', {
      id: updated.id,
      permissions: updated.permissions.toString(),
    });
    return updated;
  }

  private withKernelErrorLog<T>(operation: string, cardId: number, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof KernelError) {
        this.logger?.error(`Kernel ${operation} failed`, {
          id: cardId,
          kind: error.kind,
          code: error.code,
          message: error.message,
        });
      }
      throw error;
    }
  }

  private requireBound(cardId: number): Card {
    const card = this.registry.get(cardId);
    if (!card) {
      throw new CardNotBoundError(cardId);
    }
    return card;
  }
}

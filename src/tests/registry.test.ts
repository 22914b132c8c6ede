import { describe, it, expect } from 'vitest';
import { CardRegistry } from '../registry/CardRegistry.js';
import { MemoryKernel } from '../kernel/MemoryKernel.js';
import { StubKernel } from '../kernel/StubKernel.js';
import { Card } from '../types/Card.js';
import { Permissions } from '../types/Permissions.js';

describe('CardRegistry', () => {
  it('starts empty over the stub kernel', () => {
    const registry = CardRegistry.create();
    expect(registry.size()).toBe(0);
    expect(registry.cards()).toEqual([]);
    expect(registry.kernel).toBeInstanceOf(StubKernel);
    expect(registry.toString()).toBe('CardRegistry { cards: 0 }');
  });

  it('binds the kernel it is given', () => {
    const kernel = new MemoryKernel();
    expect(CardRegistry.withKernel(kernel).kernel).toBe(kernel);
    expect(new CardRegistry({ kernel }).kernel).toBe(kernel);
  });

  it('round-trips a stored card through its encoding', () => {
    const registry = CardRegistry.create();
    registry.put(new Card(0, Permissions.REGULAR));

    const fetched = registry.get(0);
    expect(fetched).toBeDefined();
    const decoded = Card.decode(fetched ? fetched.encode() : new Uint8Array(0));

    expect(decoded.equals(new Card(0, Permissions.REGULAR))).toBe(true);
    expect(registry.cards()).toHaveLength(1);
  });

  it('keeps the last card put under an id', () => {
    const registry = CardRegistry.create();
    registry.put(new Card(5, Permissions.REGULAR));
    registry.put(new Card(5, Permissions.ADMIN.union(Permissions.OPEN_DOORS)));

    expect(registry.size()).toBe(1);
    expect(registry.get(5)?.equals(new Card(5, Permissions.ADMIN.union(Permissions.OPEN_DOORS)))).toBe(
      true
    );
  });

  it('returns undefined for missing ids', () => {
    const registry = CardRegistry.create();
    expect(registry.get(1)).toBeUndefined();
    expect(registry.unbind(1)).toBeUndefined();
    expect(registry.contains(1)).toBe(false);
  });

  it('unbinds and returns the stored card', () => {
    const registry = CardRegistry.create();
    const card = new Card(8, Permissions.IT_SUPPORT);
    registry.put(card);

    expect(registry.contains(8)).toBe(true);
    expect(registry.unbind(8)).toBe(card);
    expect(registry.contains(8)).toBe(false);
    expect(registry.size()).toBe(0);
  });

  it('lists cards in ascending id order', () => {
    const registry = CardRegistry.create();
    for (const id of [500, 3, 65535, 0, 42]) {
      registry.put(new Card(id, Permissions.REGULAR));
    }
    expect(registry.cards().map((card) => card.id)).toEqual([0, 3, 42, 500, 65535]);
    expect(registry.ids()).toEqual([0, 3, 42, 500, 65535]);
  });

  it('keeps every key equal to its card id across puts and unbinds', () => {
    const registry = CardRegistry.create();
    const operations: Array<['put', number, number] | ['unbind', number]> = [
      ['put', 4, 2],
      ['put', 9, 16],
      ['put', 4, 32],
      ['unbind', 9],
      ['put', 1, 8],
      ['unbind', 7],
      ['put', 9, 4],
    ];
    for (const op of operations) {
      if (op[0] === 'put') {
        registry.put(new Card(op[1], Permissions.fromBits(op[2])));
      } else {
        registry.unbind(op[1]);
      }
    }

    for (const id of registry.ids()) {
      expect(registry.get(id)?.id).toBe(id);
    }
    expect(registry.cards().map((card) => card.toString())).toEqual([
      'Card { id: 1, permissions: OPEN_DOORS }',
      'Card { id: 4, permissions: SUPER_ADMIN }',
      'Card { id: 9, permissions: IT_SUPPORT }',
    ]);
  });

  it('returns a snapshot from cards()', () => {
    const registry = CardRegistry.create();
    registry.put(new Card(1, Permissions.REGULAR));
    const snapshot = registry.cards();
    registry.put(new Card(2, Permissions.REGULAR));
    expect(snapshot).toHaveLength(1);
    expect(registry.size()).toBe(2);
  });

  it('filters cards by permission', () => {
    const registry = CardRegistry.create();
    registry.put(new Card(1, Permissions.REGULAR));
    registry.put(new Card(2, Permissions.REGULAR.union(Permissions.OPEN_DOORS)));
    registry.put(new Card(3, Permissions.privileged()));

    expect(registry.withPermissions(Permissions.OPEN_DOORS).map((card) => card.id)).toEqual([2, 3]);
    expect(registry.withPermissions(Permissions.empty())).toHaveLength(3);
  });

  it('exports every card as bytes in id order', () => {
    const registry = CardRegistry.create();
    registry.put(new Card(20, Permissions.ADMIN));
    registry.put(new Card(10, Permissions.NONE));

    const decoder = new TextDecoder();
    expect(registry.exportBytes().map((payload) => decoder.decode(payload))).toEqual([
      '{"id":10,"permissions":1}',
      '{"id":20,"permissions":16}',
    ]);
  });

  it('clears all cards', () => {
    const registry = CardRegistry.create();
    registry.put(new Card(1, Permissions.REGULAR));
    registry.clear();
    expect(registry.size()).toBe(0);
  });
});

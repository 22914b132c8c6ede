import { describe, it, expect } from 'vitest';
import { ALL_PERMISSION_BITS, Permissions, isRecognizedBits } from '../types/Permissions.js';

function everySet(): Permissions[] {
  const sets: Permissions[] = [];
  for (let bits = 0; bits <= ALL_PERMISSION_BITS; bits++) {
    sets.push(Permissions.fromBits(bits));
  }
  return sets;
}

describe('Permissions', () => {
  it('assigns one bit per named flag', () => {
    expect(Permissions.NONE.bits).toBe(1);
    expect(Permissions.REGULAR.bits).toBe(2);
    expect(Permissions.IT_SUPPORT.bits).toBe(4);
    expect(Permissions.OPEN_DOORS.bits).toBe(8);
    expect(Permissions.ADMIN.bits).toBe(16);
    expect(Permissions.SUPER_ADMIN.bits).toBe(32);
    expect(Permissions.all().bits).toBe(63);
    expect(Permissions.empty().isEmpty()).toBe(true);
  });

  it('derives privileged as everything except NONE', () => {
    const privileged = Permissions.privileged();
    expect(privileged.bits).toBe(62);
    expect(privileged.contains(Permissions.NONE)).toBe(false);
    expect(privileged.toString()).toBe('REGULAR | IT_SUPPORT | OPEN_DOORS | ADMIN | SUPER_ADMIN');
  });

  it('checks containment bitwise', () => {
    const staff = Permissions.REGULAR.union(Permissions.OPEN_DOORS);
    expect(staff.contains(Permissions.REGULAR)).toBe(true);
    expect(staff.contains(staff)).toBe(true);
    expect(staff.contains(Permissions.REGULAR.union(Permissions.ADMIN))).toBe(false);
    expect(staff.contains(Permissions.empty())).toBe(true);
    expect(staff.intersects(Permissions.ADMIN)).toBe(false);
    expect(staff.intersects(Permissions.OPEN_DOORS)).toBe(true);
  });

  it('returns new values from set operations', () => {
    const a = Permissions.fromNames(['REGULAR', 'ADMIN']);
    const b = Permissions.fromNames(['ADMIN', 'IT_SUPPORT']);

    expect(a.union(b).bits).toBe(22);
    expect(a.intersect(b).bits).toBe(16);
    expect(a.difference(b).bits).toBe(2);
    expect(a.symmetricDifference(b).bits).toBe(6);
    expect(Permissions.REGULAR.complement().bits).toBe(61);
    expect(a.bits).toBe(18);
  });

  it('satisfies union and intersection laws for every pair of sets', () => {
    const sets = everySet();
    for (const a of sets) {
      expect(a.intersect(a).equals(a)).toBe(true);
      for (const b of sets) {
        const union = a.union(b);
        expect(union.contains(a)).toBe(true);
        expect(union.contains(b)).toBe(true);
      }
    }
  });

  it('rejects unrecognized bits', () => {
    expect(() => Permissions.fromBits(64)).toThrow(RangeError);
    expect(() => Permissions.fromBits(64)).toThrow('Unrecognized permission bits: 64');
    expect(() => Permissions.fromBits(-1)).toThrow(RangeError);
    expect(() => Permissions.fromBits(1.5)).toThrow(RangeError);
    expect(isRecognizedBits(63)).toBe(true);
    expect(isRecognizedBits(65)).toBe(false);
    expect(isRecognizedBits(2 ** 32 + 2)).toBe(false);
    expect(isRecognizedBits(0x100)).toBe(false);
  });

  it('truncates unknown bits on request', () => {
    expect(Permissions.fromBitsTruncate(0xff).bits).toBe(63);
    expect(Permissions.fromBitsTruncate(64 | 2).bits).toBe(2);
    expect(() => Permissions.fromBitsTruncate(-4)).toThrow(RangeError);
  });

  it('builds sets from names', () => {
    expect(Permissions.fromNames(['ADMIN', 'REGULAR']).names()).toEqual(['REGULAR', 'ADMIN']);
    expect(Permissions.fromNames([]).isEmpty()).toBe(true);
    expect(() => Permissions.fromNames(['JANITOR'])).toThrow('Unknown permission name: JANITOR');
  });

  it('renders names and serializes to the bitmask', () => {
    expect(Permissions.empty().toString()).toBe('(empty)');
    expect(Permissions.all().isAll()).toBe(true);
    expect(JSON.stringify({ p: Permissions.ADMIN })).toBe('{"p":16}');
  });
});

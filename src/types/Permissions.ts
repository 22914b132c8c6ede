/**
 * Permissions
 *
 * Capability bitmask attached to access cards. Each named capability is an
 * independent bit of an unsigned 8-bit value; instances are immutable and
 * every set operation returns a new value.
 */

export const PERMISSION_FLAGS = {
  /** No permissions. */
  NONE: 1 << 0,
  /** Permission for regular cards. */
  REGULAR: 1 << 1,
  /** Permission for holders with IT support capabilities. */
  IT_SUPPORT: 1 << 2,
  /** Permission for holders who can operate the door systems. */
  OPEN_DOORS: 1 << 3,
  /** Bypasses everything, except what SUPER_ADMIN guards. */
  ADMIN: 1 << 4,
  /** Bypasses everything. */
  SUPER_ADMIN: 1 << 5,
} as const;

export type PermissionName = keyof typeof PERMISSION_FLAGS;

const PERMISSION_NAMES: readonly PermissionName[] = [
  'NONE',
  'REGULAR',
  'IT_SUPPORT',
  'OPEN_DOORS',
  'ADMIN',
  'SUPER_ADMIN',
];

/** Union of every recognized bit. */
export const ALL_PERMISSION_BITS = PERMISSION_NAMES.reduce(
  (bits, name) => bits | PERMISSION_FLAGS[name],
  0
);

/** Permission sets fit in an unsigned 8-bit value. */
export const PERMISSION_BITS_MAX = 0xff;

export function isPermissionName(value: string): value is PermissionName {
  return Object.prototype.hasOwnProperty.call(PERMISSION_FLAGS, value);
}

/**
 * True if `bits` is a non-negative integer made only of recognized bits.
 */
export function isRecognizedBits(bits: number): boolean {
  return (
    Number.isInteger(bits) &&
    bits >= 0 &&
    bits <= PERMISSION_BITS_MAX &&
    (bits & ~ALL_PERMISSION_BITS) === 0
  );
}

export class Permissions {
  static readonly NONE = new Permissions(PERMISSION_FLAGS.NONE);
  static readonly REGULAR = new Permissions(PERMISSION_FLAGS.REGULAR);
  static readonly IT_SUPPORT = new Permissions(PERMISSION_FLAGS.IT_SUPPORT);
  static readonly OPEN_DOORS = new Permissions(PERMISSION_FLAGS.OPEN_DOORS);
  static readonly ADMIN = new Permissions(PERMISSION_FLAGS.ADMIN);
  static readonly SUPER_ADMIN = new Permissions(PERMISSION_FLAGS.SUPER_ADMIN);

  private constructor(readonly bits: number) {}

  static empty(): Permissions {
    return new Permissions(0);
  }

  static all(): Permissions {
    return new Permissions(ALL_PERMISSION_BITS);
  }

  /**
   * All permissions excluding {@link Permissions.NONE}.
   */
  static privileged(): Permissions {
    return Permissions.all().symmetricDifference(Permissions.NONE);
  }

  /**
   * Build a set from a raw bitmask.
   * @throws RangeError if `bits` holds anything outside the recognized flags
   */
  static fromBits(bits: number): Permissions {
    if (!isRecognizedBits(bits)) {
      throw new RangeError(`Unrecognized permission bits: ${bits}`);
    }
    return new Permissions(bits);
  }

  /**
   * Build a set from a raw bitmask, dropping unrecognized bits.
   */
  static fromBitsTruncate(bits: number): Permissions {
    if (!Number.isInteger(bits) || bits < 0) {
      throw new RangeError(`Permission bits must be a non-negative integer: ${bits}`);
    }
    return new Permissions(bits & ALL_PERMISSION_BITS);
  }

  static fromNames(names: Iterable<string>): Permissions {
    let bits = 0;
    for (const name of names) {
      if (!isPermissionName(name)) {
        throw new RangeError(`Unknown permission name: ${name}`);
      }
      bits |= PERMISSION_FLAGS[name];
    }
    return new Permissions(bits);
  }

  contains(other: Permissions): boolean {
    return (this.bits & other.bits) === other.bits;
  }

  intersects(other: Permissions): boolean {
    return (this.bits & other.bits) !== 0;
  }

  union(other: Permissions): Permissions {
    return new Permissions(this.bits | other.bits);
  }

  intersect(other: Permissions): Permissions {
    return new Permissions(this.bits & other.bits);
  }

  difference(other: Permissions): Permissions {
    return new Permissions(this.bits & ~other.bits);
  }

  symmetricDifference(other: Permissions): Permissions {
    return new Permissions(this.bits ^ other.bits);
  }

  complement(): Permissions {
    return new Permissions(~this.bits & ALL_PERMISSION_BITS);
  }

  isEmpty(): boolean {
    return this.bits === 0;
  }

  isAll(): boolean {
    return this.bits === ALL_PERMISSION_BITS;
  }

  equals(other: Permissions): boolean {
    return this.bits === other.bits;
  }

  /**
   * Names of the set flags, in bit order.
   */
  names(): PermissionName[] {
    return PERMISSION_NAMES.filter((name) => (this.bits & PERMISSION_FLAGS[name]) !== 0);
  }

  toString(): string {
    const names = this.names();
    return names.length > 0 ? names.join(' | ') : '(empty)';
  }

  toJSON(): number {
    return this.bits;
  }
}

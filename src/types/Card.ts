/**
 * Card
 *
 * An access token record: a 16-bit identity bound to a permission set.
 * Cards are immutable; replacing permissions produces a new Card.
 */

import { ConversionError } from '../errors/ConversionError.js';
import { CARD_ID_MAX, CardPayloadSchema, type CardPayload } from '../schemas/CardPayload.js';
import { Permissions } from './Permissions.js';

const UTF8_ENCODER = new TextEncoder();
const UTF8_DECODER = new TextDecoder('utf-8', { fatal: true });

export function isCardId(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= CARD_ID_MAX;
}

export class Card {
  readonly id: number;
  readonly permissions: Permissions;

  /**
   * @throws RangeError if `id` is not an integer in 0..65535
   */
  constructor(id: number, permissions: Permissions) {
    if (!isCardId(id)) {
      throw new RangeError(`Card id must be an integer between 0 and ${CARD_ID_MAX}: ${id}`);
    }
    this.id = id;
    this.permissions = permissions;
  }

  /**
   * The default card: id 0 with regular permissions.
   */
  static default(): Card {
    return new Card(0, Permissions.REGULAR);
  }

  /**
   * Check if this card holds every requested permission.
   */
  is(permissions: Permissions): boolean {
    return this.permissions.contains(permissions);
  }

  withPermissions(permissions: Permissions): Card {
    return new Card(this.id, permissions);
  }

  equals(other: Card): boolean {
    return this.id === other.id && this.permissions.equals(other.permissions);
  }

  toPayload(): CardPayload {
    return { id: this.id, permissions: this.permissions.bits };
  }

  /**
   * Serialize into the UTF-8 JSON payload sent to hardware.
   */
  encode(): Uint8Array {
    return UTF8_ENCODER.encode(JSON.stringify(this.toPayload()));
  }

  /**
   * Parse a payload received from hardware.
   * @throws ConversionError when the buffer is not a well-formed card payload
   */
  static decode(bytes: Uint8Array): Card {
    let text: string;
    try {
      text = UTF8_DECODER.decode(bytes);
    } catch (error) {
      throw new ConversionError('Cannot convert to Card (payload is not valid UTF-8)', bytes, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ConversionError('Cannot convert to Card (payload is not valid JSON)', bytes, {
        cause: error,
      });
    }

    const result = CardPayloadSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload';
      const reason = issue ? issue.message : 'invalid payload';
      throw new ConversionError(`Cannot convert to Card (${field}: ${reason})`, bytes, {
        cause: result.error,
      });
    }

    return new Card(result.data.id, Permissions.fromBits(result.data.permissions));
  }

  toJSON(): CardPayload {
    return this.toPayload();
  }

  toString(): string {
    return `Card { id: ${this.id}, permissions: ${this.permissions.toString()} }`;
  }
}

/**
 * Kernel Errors
 *
 * Failures reported by a hardware kernel while reading or writing a card.
 */

export type KernelErrorKind = 'read' | 'write';

/**
 * 16-bit status codes attached to kernel failures.
 */
export enum KernelErrorCode {
  UNIMPLEMENTED = 0x0001,
  CARD_NOT_PRESENT = 0x0002,
  CARD_LOCKED = 0x0003,
  REFERENCE_RELEASED = 0x0004,
  ID_MISMATCH = 0x0005,
}

export const KERNEL_ERROR_CODE_MAX = 0xffff;

export class KernelError extends Error {
  readonly kind: KernelErrorKind;
  readonly code: number;

  /**
   * @throws RangeError if `code` is not an integer in 0..65535
   */
  constructor(kind: KernelErrorKind, message: string, code: KernelErrorCode | number) {
    if (!Number.isInteger(code) || code < 0 || code > KERNEL_ERROR_CODE_MAX) {
      throw new RangeError(
        `Kernel error code must be an integer between 0 and ${KERNEL_ERROR_CODE_MAX}: ${code}`
      );
    }
    super(message);
    this.name = 'KernelError';
    this.kind = kind;
    this.code = code;
  }

  static read(message: string, code: KernelErrorCode | number): KernelError {
    return new KernelError('read', message, code);
  }

  static write(message: string, code: KernelErrorCode | number): KernelError {
    return new KernelError('write', message, code);
  }

  isRead(): boolean {
    return this.kind === 'read';
  }

  isWrite(): boolean {
    return this.kind === 'write';
  }

  toString(): string {
    const label = this.kind === 'read' ? 'ReadError' : 'WriteError';
    return `${label}(message: ${this.message}, code: ${this.code})`;
  }
}

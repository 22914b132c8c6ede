export { ConversionError } from './ConversionError.js';
export { KernelError, KernelErrorCode, KERNEL_ERROR_CODE_MAX } from './KernelError.js';
export type { KernelErrorKind } from './KernelError.js';
export { CardNotBoundError } from './CardNotBoundError.js';

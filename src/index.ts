/**
 * CardVault
 *
 * Main entrypoint. Exports the permission and card types, the wire schema,
 * kernels, the registry and its helpers.
 */

// Types
export {
  Permissions,
  PERMISSION_FLAGS,
  ALL_PERMISSION_BITS,
  PERMISSION_BITS_MAX,
  isPermissionName,
  isRecognizedBits,
} from './types/Permissions.js';
export type { PermissionName } from './types/Permissions.js';
export { Card, isCardId } from './types/Card.js';

// Schemas
export {
  CardPayloadSchema,
  CARD_ID_MAX,
  validateCardPayload,
  isValidCardPayload,
} from './schemas/CardPayload.js';
export type { CardPayload } from './schemas/CardPayload.js';

// Errors
export {
  ConversionError,
  KernelError,
  KernelErrorCode,
  KERNEL_ERROR_CODE_MAX,
  CardNotBoundError,
} from './errors/index.js';
export type { KernelErrorKind } from './errors/index.js';

// Kernels
export { StubKernel, MemoryKernel, withCardMut } from './kernel/index.js';
export type { Kernel, MutableCardRef, MemoryKernelOptions } from './kernel/index.js';

// Registry
export { CardRegistry, CardSync, createKernel, createRegistry } from './registry/index.js';
export type { CardRegistryOptions, CardSyncOptions } from './registry/index.js';

// Config
export {
  loadEnvConfig,
  readEnvConfig,
  validateEnvConfig,
  isKernelMode,
  KERNEL_MODES,
} from './config/env.js';
export type { EnvConfig, RawEnvConfig, LoadEnvOptions, KernelMode } from './config/env.js';

// Utils
export { ConsoleLogger, isLogLevel, LOG_LEVELS } from './utils/Logger.js';
export type { Logger, LogLevel } from './utils/Logger.js';

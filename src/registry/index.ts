export { CardRegistry } from './CardRegistry.js';
export type { CardRegistryOptions } from './CardRegistry.js';
export { CardSync } from './CardSync.js';
export type { CardSyncOptions } from './CardSync.js';
export { createKernel, createRegistry } from './RegistryFactory.js';

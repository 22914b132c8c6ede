/**
 * Registry Factory
 *
 * Builds a registry over the kernel named by configuration.
 */

import type { EnvConfig, KernelMode } from '../config/env.js';
import type { Kernel } from '../kernel/IKernel.js';
import { MemoryKernel } from '../kernel/MemoryKernel.js';
import { StubKernel } from '../kernel/StubKernel.js';
import { ConsoleLogger, type Logger } from '../utils/Logger.js';
import { CardRegistry } from './CardRegistry.js';

export function createKernel(mode: KernelMode, logger?: Logger): Kernel {
  switch (mode) {
    case 'memory':
      return new MemoryKernel({ logger });
    case 'stub':
      return new StubKernel(logger);
  }
}

export function createRegistry(config: EnvConfig, logger?: Logger): CardRegistry {
  const log = logger ?? new ConsoleLogger(config.logLevel);
  const registry = CardRegistry.withKernel(createKernel(config.kernel, log), log);
  log.debug('Registry created', { kernel: config.kernel });
  return registry;
}

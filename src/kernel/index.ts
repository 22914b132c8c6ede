export type { Kernel, MutableCardRef } from './IKernel.js';
export { StubKernel } from './StubKernel.js';
export { MemoryKernel } from './MemoryKernel.js';
export type { MemoryKernelOptions } from './MemoryKernel.js';
export { withCardMut } from './withCardMut.js';

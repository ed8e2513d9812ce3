/**
 * @file Allocator barrel
 */
export { createAllocator } from "./allocator";
export type { Allocator, AllocatorOptions, Logger, PoolStats } from "./allocator";

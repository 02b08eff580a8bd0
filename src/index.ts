export { Allocator } from "./Allocator";
export type { AllocatorContext } from "./Allocator";
export { allocatedBlock, blockEnd, freeBlock, isAllocated, isFree } from "./Block";
export type { AllocatedBlock, Block, FreeBlock } from "./Block";
export { BlockStatus, DEFAULT_STRATEGY, STRATEGIES } from "./constants";
export type { Strategy } from "./constants";
export { findFreeBlock } from "./FreeBlocks";
export { render, renderBar, renderBlocks, renderEvent, renderStats } from "./render";
export { Simulation } from "./Simulation";
export type { SimulationContext, SimulationEvent, SimulationOptions, TickListener } from "./Simulation";

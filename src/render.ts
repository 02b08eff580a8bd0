import type { Allocator } from "./Allocator";
import { type Block, blockEnd, isFree } from "./Block";
import { Defaults, FREE_SYMBOL, OWNER_SYMBOLS } from "./constants";
import type { SimulationEvent } from "./Simulation";

type AllocatorView = Pick<Allocator, "capacity"|"snapshot"|"getFreeBytes"|"getAllocatedBytes"|"getFragmentation"|"getFreeBlockCount">;

export function ownerSymbol(owner:number) {
    return OWNER_SYMBOLS[(owner - 1) % OWNER_SYMBOLS.length];
}
// One cell per `capacity / width` address units, showing the block at the cell's first address
export function renderBar(blocks:readonly Block[], capacity:number, width:number = Defaults.WIDTH) {
    let bar = "";
    let i = 0;
    for (let cell = 0; cell < width; cell++) {
        const address = Math.floor(cell * capacity / width);
        while (i < blocks.length - 1 && blockEnd(blocks[i]) <= address) {
            i++;
        }
        const block = blocks[i];
        bar += isFree(block) ? FREE_SYMBOL : ownerSymbol(block.owner);
    }
    return `|${bar}|`;
}
export function renderBlocks(blocks:readonly Block[]) {
    return blocks.map(block => {
        const range = `[${block.start}-${blockEnd(block)})`;
        return isFree(block) ? `${range} Free` : `${range} PID:${block.owner}`;
    });
}
export function renderStats(allocator:AllocatorView) {
    return [
        `Total Memory: ${allocator.capacity}`,
        `Free Memory: ${allocator.getFreeBytes()}`,
        `Allocated Memory: ${allocator.getAllocatedBytes()}`,
        `Fragmentation: ${allocator.getFragmentation().toFixed(2)}%`,
        `Free Blocks: ${allocator.getFreeBlockCount()}`
    ];
}
export function render(allocator:AllocatorView, width:number = Defaults.WIDTH) {
    const blocks = allocator.snapshot();
    return [
        renderBar(blocks, allocator.capacity, width),
        ...renderBlocks(blocks),
        ...renderStats(allocator)
    ].join("\n");
}
export function renderEvent(event:SimulationEvent) {
    switch (event.type) {
        case "allocate":
            return `Allocated ${event.size} at ${event.address} using ${event.strategy}`;
        case "allocate-failed":
            return `Failed to allocate ${event.size} using ${event.strategy}`;
        case "deallocate":
            return `Deallocated memory at ${event.address}`;
    }
}

import { type Block, type AllocatedBlock, allocatedBlock, freeBlock, isAllocated, isFree } from "./Block";
import { DEFAULT_STRATEGY, STRATEGIES, STRATEGY_ALIASES, type Strategy } from "./constants";
import { findFreeBlock } from "./FreeBlocks";
import { createLogger, type Logger } from "./logger";
import { isPositiveInteger } from "./utils";

export type AllocatorContext = Partial<{
    logger:Logger;
}>;

function isStrategy(name:string):name is Strategy {
    return (STRATEGIES as readonly string[]).includes(name);
}

/**
 * Contiguous allocator over the address space `[0, capacity)`.
 *
 * The blocks always partition the whole space in address order and no two
 * neighbours are both free. Owner ids are issued once and never reused.
 */
export class Allocator {
    private _blocks:Block[];
    private _nextId = 0;
    private _logger;
    constructor(readonly capacity:number, context?:AllocatorContext) {
        if (!isPositiveInteger(capacity)) {
            throw new Error("Invalid capacity");
        }
        this._logger = context?.logger ?? createLogger("allocator");
        this._blocks = [ freeBlock(0, capacity) ];
    }
    get allocationCount() {
        return this._nextId;
    }
    private _resolveStrategy(name:string):Strategy {
        if (isStrategy(name)) {
            return name;
        }
        const alias = Object.hasOwn(STRATEGY_ALIASES, name) ? STRATEGY_ALIASES[name] : null;
        if (alias) {
            return alias;
        }
        this._logger.warn({ strategy: name, fallback: DEFAULT_STRATEGY }, `Invalid allocation strategy: ${name}. Using ${DEFAULT_STRATEGY}.`);
        return DEFAULT_STRATEGY;
    }
    private _splitAndAllocate(index:number, size:number) {
        const block = this._blocks[index];
        const owner = ++this._nextId;
        if (block.size === size) {
            this._blocks[index] = allocatedBlock(block.start, size, owner);
        } else {
            this._blocks.splice(index, 1,
                allocatedBlock(block.start, size, owner),
                freeBlock(block.start + size, block.size - size)
            );
        }
        return block.start;
    }
    allocate(size:number, strategy:string = DEFAULT_STRATEGY) {
        if (!isPositiveInteger(size)) {
            throw new Error("Invalid size");
        }
        const resolved = this._resolveStrategy(strategy);
        const index = findFreeBlock(this._blocks, size, resolved);
        if (index < 0) {
            this._logger.debug({ size, strategy: resolved }, "No space for allocation");
            return null;
        }
        const address = this._splitAndAllocate(index, size);
        this._logger.debug({ size, strategy: resolved, address, owner: this._nextId }, "Allocated block");
        return address;
    }
    deallocate(address:number) {
        const index = this._blocks.findIndex(block => block.start === address && isAllocated(block));
        if (index < 0) {
            this._logger.debug({ address }, "No allocated block at address");
            return false;
        }
        const block = this._blocks[index];
        this._blocks[index] = freeBlock(block.start, block.size);
        const merged = this.mergeFreeBlocks();
        this._logger.debug({ address, size: block.size, merged }, "Deallocated block");
        return true;
    }
    /**
     * Collapses every run of adjacent free blocks into its first block.
     * Returns how many blocks were absorbed, so 0 means nothing changed.
     */
    mergeFreeBlocks() {
        let merged = 0;
        let i = 0;
        while (i < this._blocks.length - 1) {
            const block = this._blocks[i];
            const next = this._blocks[i + 1];
            if (isFree(block) && isFree(next)) {
                this._blocks.splice(i, 2, freeBlock(block.start, block.size + next.size));
                merged++;
            } else {
                i++;
            }
        }
        return merged;
    }
    snapshot():Block[] {
        return this._blocks.slice();
    }
    getAllocatedBlocks():AllocatedBlock[] {
        return this._blocks.filter(isAllocated);
    }
    getFreeBytes() {
        let bytes = 0;
        for (const block of this._blocks) {
            if (isFree(block)) {
                bytes += block.size;
            }
        }
        return bytes;
    }
    getAllocatedBytes() {
        let bytes = 0;
        for (const block of this._blocks) {
            if (isAllocated(block)) {
                bytes += block.size;
            }
        }
        return bytes;
    }
    // Share of the whole space that is free, not a measure of how scattered it is
    getFragmentation() {
        return this.capacity > 0 ? (this.getFreeBytes() * 100) / this.capacity : 0;
    }
    getFreeBlockCount() {
        let count = 0;
        for (const block of this._blocks) {
            if (isFree(block)) {
                count++;
            }
        }
        return count;
    }
    getLargestFreeBlock() {
        let largest = 0;
        for (const block of this._blocks) {
            if (isFree(block) && block.size > largest) {
                largest = block.size;
            }
        }
        return largest;
    }
}

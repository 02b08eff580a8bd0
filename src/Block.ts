import { BlockStatus } from "./constants";

export type FreeBlock = {
    readonly start:number;
    readonly size:number;
    readonly status:BlockStatus.Free;
    readonly owner:null;
};
export type AllocatedBlock = {
    readonly start:number;
    readonly size:number;
    readonly status:BlockStatus.Allocated;
    readonly owner:number;
};
export type Block = FreeBlock | AllocatedBlock;

export function freeBlock(start:number, size:number):FreeBlock {
    return {
        start: start,
        size: size,
        status: BlockStatus.Free,
        owner: null
    };
}
export function allocatedBlock(start:number, size:number, owner:number):AllocatedBlock {
    return {
        start: start,
        size: size,
        status: BlockStatus.Allocated,
        owner: owner
    };
}
export function isFree(block:Block):block is FreeBlock {
    return block.status === BlockStatus.Free;
}
export function isAllocated(block:Block):block is AllocatedBlock {
    return block.status === BlockStatus.Allocated;
}
export function blockEnd(block:Block) {
    return block.start + block.size;
}

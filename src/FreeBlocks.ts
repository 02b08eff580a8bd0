import { type Block, isFree } from "./Block";
import type { Strategy } from "./constants";

// Each finder returns the index of the chosen Free block, or -1 if none fits.
// Ties are resolved to the first candidate met in address order.
type Finder = (blocks:readonly Block[], size:number) => number;

function firstFit(blocks:readonly Block[], size:number) {
    for (let i = 0; i < blocks.length; i++) {
        const block = blocks[i];
        if (isFree(block) && block.size >= size) {
            return i;
        }
    }
    return -1;
}
function bestFit(blocks:readonly Block[], size:number) {
    let index = -1;
    let minSize = Infinity;
    for (let i = 0; i < blocks.length; i++) {
        const block = blocks[i];
        if (isFree(block) && block.size >= size && block.size < minSize) {
            minSize = block.size;
            index = i;
        }
    }
    return index;
}
function worstFit(blocks:readonly Block[], size:number) {
    let index = -1;
    let maxSize = -1;
    for (let i = 0; i < blocks.length; i++) {
        const block = blocks[i];
        if (isFree(block) && block.size >= size && block.size > maxSize) {
            maxSize = block.size;
            index = i;
        }
    }
    return index;
}

const FINDERS:Record<Strategy, Finder> = {
    "first-fit": firstFit,
    "best-fit": bestFit,
    "worst-fit": worstFit
};

export function findFreeBlock(blocks:readonly Block[], size:number, strategy:Strategy) {
    return FINDERS[strategy](blocks, size);
}

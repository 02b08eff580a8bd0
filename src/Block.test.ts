import test from "arrange-act-assert";

import { assertDeepEqual, assertEqual } from "./testUtils";
import { allocatedBlock, blockEnd, freeBlock, isAllocated, isFree } from "./Block";
import { BlockStatus } from "./constants";

test.describe("Block", test => {
    test("should create a free block without owner", {
        ACT() {
            return freeBlock(10, 20);
        },
        ASSERT(block) {
            assertDeepEqual(block, {
                start: 10,
                size: 20,
                status: BlockStatus.Free,
                owner: null
            });
        }
    });
    test("should create an allocated block with owner", {
        ACT() {
            return allocatedBlock(30, 5, 7);
        },
        ASSERT(block) {
            assertDeepEqual(block, {
                start: 30,
                size: 5,
                status: BlockStatus.Allocated,
                owner: 7
            });
        }
    });
    test("should tell free and allocated blocks apart", {
        ACT() {
            const free = freeBlock(0, 4);
            const allocated = allocatedBlock(4, 4, 1);
            return [ isFree(free), isAllocated(free), isFree(allocated), isAllocated(allocated) ];
        },
        ASSERT(res) {
            assertDeepEqual(res, [ true, false, false, true ]);
        }
    });
    test("should compute the end address", {
        ACT() {
            return blockEnd(allocatedBlock(30, 5, 7));
        },
        ASSERT(end) {
            assertEqual(end, 35);
        }
    });
});

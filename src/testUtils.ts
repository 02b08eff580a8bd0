import * as Assert from "assert";

import pino from "pino";

import { type Block, blockEnd, isFree } from "./Block";

// Force equal types
export function assertDeepEqual<T>(a:T, b:NoInfer<T>) {
    return Assert.deepStrictEqual(a, b);
}
export function assertEqual<T>(a:T, b:NoInfer<T>) {
    return Assert.strictEqual(a, b);
}

// Blocks must cover [0, capacity) in order, with no two free neighbours
export function assertPartition(blocks:readonly Block[], capacity:number) {
    Assert.ok(blocks.length > 0, "no blocks");
    let end = 0;
    for (let i = 0; i < blocks.length; i++) {
        const block = blocks[i];
        assertEqual(block.start, end);
        Assert.ok(block.size > 0, `empty block at ${block.start}`);
        assertEqual(block.owner == null, isFree(block));
        if (i > 0) {
            Assert.ok(!(isFree(block) && isFree(blocks[i - 1])), `adjacent free blocks at ${block.start}`);
        }
        end = blockEnd(block);
    }
    assertEqual(end, capacity);
}

export type LogLine = {
    level:number;
    msg:string;
    [key:string]:unknown;
};
export function newTestLogger() {
    const lines:LogLine[] = [];
    const logger = pino({ level: "debug", base: null, timestamp: false }, {
        write(msg:string) {
            lines.push(JSON.parse(msg));
        }
    });
    return {
        logger,
        lines,
        messages(level:number) {
            return lines.filter(line => line.level === level).map(line => line.msg);
        }
    };
}

// Replays the given values in order, failing the test if more are requested
export function scriptedRandom(values:number[]) {
    const queue = values.slice();
    const random = () => {
        const value = queue.shift();
        if (value == null) {
            throw new Error("Random values exhausted");
        }
        return value;
    };
    return Object.assign(random, {
        remaining() {
            return queue.length;
        }
    });
}

export function newFakeScheduler() {
    const timers = new Map<NodeJS.Timeout, { cb:()=>void; ms:number }>();
    return {
        setInterval(cb:()=>void, ms:number) {
            // A real handle that is never left pending
            const timer = setTimeout(() => {}, 0);
            clearTimeout(timer);
            timers.set(timer, { cb, ms });
            return timer;
        },
        clearInterval(timer:NodeJS.Timeout) {
            timers.delete(timer);
        },
        tick(count = 1) {
            for (let i = 0; i < count; i++) {
                for (const { cb } of Array.from(timers.values())) {
                    cb();
                }
            }
        },
        intervals() {
            return Array.from(timers.values(), timer => timer.ms);
        }
    };
}

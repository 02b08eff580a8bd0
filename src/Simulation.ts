import seedrandom from "seedrandom";

import { Allocator } from "./Allocator";
import { Defaults, STRATEGIES, type Strategy } from "./constants";
import { createLogger, type Logger } from "./logger";
import { renderEvent } from "./render";
import { isPositiveInteger, pick, randomInt, type RandomSource } from "./utils";

export type SimulationOptions = {
    capacity?:number;
    interval?:number;
    allocateChance?:number;
    deallocateChance?:number;
    maxRequestSize?:number;
    strategies?:readonly Strategy[];
    seed?:string|null;
    maxSteps?:number;
};
export type SimulationContext = Partial<{
    random:RandomSource; // Inject "world access" dependencies for easier testing
    setInterval(cb:()=>void, ms:number):NodeJS.Timeout;
    clearInterval(timer:NodeJS.Timeout):void;
    logger:Logger;
}>;
export type SimulationEvent = {
    type:"allocate";
    size:number;
    strategy:Strategy;
    address:number;
} | {
    type:"allocate-failed";
    size:number;
    strategy:Strategy;
} | {
    type:"deallocate";
    address:number;
    owner:number;
};
export type TickListener = (events:SimulationEvent[], simulation:Simulation) => void;

function isChance(value:number) {
    return Number.isFinite(value) && value >= 0 && value <= 1;
}

export class Simulation {
    readonly allocator;
    readonly interval;
    readonly allocateChance;
    readonly deallocateChance;
    readonly maxRequestSize;
    readonly strategies:readonly [Strategy, ...Strategy[]];
    readonly maxSteps;
    private _steps = 0;
    private _timer:NodeJS.Timeout|null = null;
    private _context:Required<SimulationContext>;
    constructor(options:SimulationOptions = {}, context?:SimulationContext) {
        const capacity = options.capacity ?? Defaults.CAPACITY;
        this.interval = options.interval ?? Defaults.INTERVAL;
        if (!isPositiveInteger(this.interval)) {
            throw new Error("Invalid interval");
        }
        this.allocateChance = options.allocateChance ?? Defaults.ALLOCATE_CHANCE;
        if (!isChance(this.allocateChance)) {
            throw new Error("Invalid allocate chance");
        }
        this.deallocateChance = options.deallocateChance ?? Defaults.DEALLOCATE_CHANCE;
        if (!isChance(this.deallocateChance)) {
            throw new Error("Invalid deallocate chance");
        }
        this.maxRequestSize = options.maxRequestSize ?? Math.max(1, Math.floor(capacity / Defaults.MAX_REQUEST_DIVISOR));
        if (!isPositiveInteger(this.maxRequestSize)) {
            throw new Error("Invalid max request size");
        }
        const [first, ...rest] = options.strategies ?? STRATEGIES;
        if (first == null) {
            throw new Error("Invalid strategies");
        }
        this.strategies = [ first, ...rest ];
        this.maxSteps = options.maxSteps ?? 0;
        if (!Number.isSafeInteger(this.maxSteps) || this.maxSteps < 0) {
            throw new Error("Invalid max steps");
        }
        this._context = {
            random: context?.random ?? (options.seed != null ? seedrandom(options.seed) : Math.random),
            setInterval: context?.setInterval ?? setInterval,
            clearInterval: context?.clearInterval ?? clearInterval,
            logger: context?.logger ?? createLogger("simulation")
        };
        this.allocator = new Allocator(capacity, { logger: context?.logger });
    }
    get steps() {
        return this._steps;
    }
    get running() {
        return this._timer != null;
    }
    private _log(event:SimulationEvent) {
        this._context.logger.info(event, renderEvent(event));
    }
    step() {
        const events:SimulationEvent[] = [];
        const random = this._context.random;
        if (random() < this.allocateChance) {
            const size = randomInt(random, 1, this.maxRequestSize);
            const strategy = pick(random, this.strategies);
            const address = this.allocator.allocate(size, strategy);
            if (address != null) {
                events.push({ type: "allocate", size, strategy, address });
            } else {
                events.push({ type: "allocate-failed", size, strategy });
            }
        }
        if (random() < this.deallocateChance) {
            const victim = pick(random, this.allocator.getAllocatedBlocks());
            if (victim) {
                this.allocator.deallocate(victim.start);
                events.push({ type: "deallocate", address: victim.start, owner: victim.owner });
            }
        }
        this._steps++;
        for (const event of events) {
            this._log(event);
        }
        return events;
    }
    start(onTick?:TickListener) {
        if (this._timer) {
            return;
        }
        this._timer = this._context.setInterval(() => {
            const events = this.step();
            if (this.maxSteps > 0 && this._steps >= this.maxSteps) {
                this.stop();
            }
            if (onTick) {
                onTick(events, this);
            }
        }, this.interval);
    }
    stop() {
        if (!this._timer) {
            return;
        }
        this._context.clearInterval(this._timer);
        this._timer = null;
    }
}

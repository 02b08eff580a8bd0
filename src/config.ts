import { Defaults, STRATEGIES, STRATEGY_ALIASES, type Strategy } from "./constants";
import type { SimulationOptions } from "./Simulation";

export type Env = Readonly<Record<string, string|undefined>>;

export type CliConfig = {
    simulation:SimulationOptions;
    width:number;
};

function readInteger(env:Env, name:string) {
    const raw = env[name];
    if (raw == null || raw.trim() === "") {
        return undefined;
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
        throw new Error(`Invalid ${name}`);
    }
    return value;
}
function readNumber(env:Env, name:string) {
    const raw = env[name];
    if (raw == null || raw.trim() === "") {
        return undefined;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new Error(`Invalid ${name}`);
    }
    return value;
}
function readStrategies(env:Env, name:string) {
    const raw = env[name];
    if (raw == null || raw.trim() === "") {
        return undefined;
    }
    const strategies:Strategy[] = [];
    for (const item of raw.split(",")) {
        const strategyName = item.trim();
        const strategy = STRATEGIES.find(strategy => strategy === strategyName) ?? (Object.hasOwn(STRATEGY_ALIASES, strategyName) ? STRATEGY_ALIASES[strategyName] : null);
        if (!strategy) {
            throw new Error(`Invalid ${name}`);
        }
        strategies.push(strategy);
    }
    return strategies;
}

export function loadConfig(env:Env):CliConfig {
    const width = readInteger(env, "MEMSIM_WIDTH") ?? Defaults.WIDTH;
    if (width <= 0) {
        throw new Error("Invalid MEMSIM_WIDTH");
    }
    return {
        simulation: {
            capacity: readInteger(env, "MEMSIM_CAPACITY"),
            interval: readInteger(env, "MEMSIM_INTERVAL"),
            allocateChance: readNumber(env, "MEMSIM_ALLOCATE_CHANCE"),
            deallocateChance: readNumber(env, "MEMSIM_DEALLOCATE_CHANCE"),
            maxRequestSize: readInteger(env, "MEMSIM_MAX_REQUEST"),
            strategies: readStrategies(env, "MEMSIM_STRATEGIES"),
            seed: env.MEMSIM_SEED || null,
            maxSteps: readInteger(env, "MEMSIM_STEPS")
        },
        width: width
    };
}

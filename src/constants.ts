export const enum BlockStatus {
    Free = "free",
    Allocated = "allocated"
}

export const STRATEGIES = [ "first-fit", "best-fit", "worst-fit" ] as const;
export type Strategy = typeof STRATEGIES[number];

// Spellings accepted as well, mapped to the canonical name
export const STRATEGY_ALIASES:Readonly<Record<string, Strategy>> = {
    first_fit: "first-fit",
    best_fit: "best-fit",
    worst_fit: "worst-fit"
};

export const DEFAULT_STRATEGY:Strategy = "first-fit";

export const enum Defaults {
    CAPACITY = 100,
    INTERVAL = 500,
    ALLOCATE_CHANCE = 0.3,
    DEALLOCATE_CHANCE = 0.1,
    MAX_REQUEST_DIVISOR = 5,
    WIDTH = 50
}

export const FREE_SYMBOL = ".";
export const OWNER_SYMBOLS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

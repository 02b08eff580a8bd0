import pino from "pino";
import type { Logger } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info");

export const logger = pino({
    level: LOG_LEVEL,
    base: {
        pid: process.pid,
        service: "contiguous-memory-sim"
    },
    serializers: {
        err: pino.stdSerializers.err
    }
});

export function createLogger(component:string, context?:Record<string, unknown>):Logger {
    return logger.child({ component, ...context });
}

export function logError(logger:Logger, error:unknown, context?:Record<string, unknown>) {
    if (error instanceof Error) {
        logger.error({
            err: error,
            ...context
        }, error.message);
    } else {
        logger.error({
            error: String(error),
            ...context
        }, "Unknown error occurred");
    }
}

export type { Logger };

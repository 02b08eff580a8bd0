#!/usr/bin/env node
import { loadConfig } from "./config";
import { createLogger, logError } from "./logger";
import { render } from "./render";
import { Simulation } from "./Simulation";

const cliLogger = createLogger("cli");

function main() {
    const config = loadConfig(process.env);
    const simulation = new Simulation(config.simulation);
    const draw = () => {
        if (process.stdout.isTTY) {
            process.stdout.write("\x1b[2J\x1b[H");
        }
        process.stdout.write(render(simulation.allocator, config.width) + "\n");
    };
    const shutdown = () => {
        simulation.stop();
        cliLogger.info({ steps: simulation.steps }, "Simulation stopped");
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    draw();
    simulation.start(() => {
        draw();
        if (!simulation.running) {
            // Reached the configured number of steps
            process.removeListener("SIGINT", shutdown);
            process.removeListener("SIGTERM", shutdown);
            cliLogger.info({ steps: simulation.steps }, "Simulation finished");
        }
    });
    cliLogger.info({
        capacity: simulation.allocator.capacity,
        interval: simulation.interval,
        strategies: simulation.strategies
    }, "Simulation started");
}

try {
    main();
} catch (e) {
    logError(cliLogger, e);
    process.exitCode = 1;
}

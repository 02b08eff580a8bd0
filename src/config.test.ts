import test, { monad } from "arrange-act-assert";

import { assertDeepEqual, assertEqual } from "./testUtils";
import { loadConfig } from "./config";

test.describe("config", test => {
    test("should leave unset values to the defaults", {
        ACT() {
            return loadConfig({ MEMSIM_CAPACITY: "", MEMSIM_STRATEGIES: "  " });
        },
        ASSERTS: {
            "should not set the capacity"({ simulation }) {
                assertEqual(simulation.capacity, undefined);
            },
            "should not set the strategies"({ simulation }) {
                assertEqual(simulation.strategies, undefined);
            },
            "should not set a seed"({ simulation }) {
                assertEqual(simulation.seed, null);
            },
            "should use the default width"({ width }) {
                assertEqual(width, 50);
            }
        }
    });
    test("should read every variable", {
        ACT() {
            return loadConfig({
                MEMSIM_CAPACITY: "256",
                MEMSIM_INTERVAL: "100",
                MEMSIM_ALLOCATE_CHANCE: "0.5",
                MEMSIM_DEALLOCATE_CHANCE: "0.25",
                MEMSIM_MAX_REQUEST: "32",
                MEMSIM_STRATEGIES: "best-fit, worst_fit",
                MEMSIM_SEED: "test-seed",
                MEMSIM_STEPS: "10",
                MEMSIM_WIDTH: "80"
            });
        },
        ASSERT(config) {
            assertDeepEqual(config, {
                simulation: {
                    capacity: 256,
                    interval: 100,
                    allocateChance: 0.5,
                    deallocateChance: 0.25,
                    maxRequestSize: 32,
                    strategies: [ "best-fit", "worst-fit" ],
                    seed: "test-seed",
                    maxSteps: 10
                },
                width: 80
            });
        }
    });
    test("should reject a non numeric capacity", {
        ACT() {
            return monad(() => loadConfig({ MEMSIM_CAPACITY: "lots" }));
        },
        ASSERT(res) {
            res.should.error({
                message: "Invalid MEMSIM_CAPACITY"
            });
        }
    });
    test("should reject a fractional interval", {
        ACT() {
            return monad(() => loadConfig({ MEMSIM_INTERVAL: "12.5" }));
        },
        ASSERT(res) {
            res.should.error({
                message: "Invalid MEMSIM_INTERVAL"
            });
        }
    });
    test("should reject a non numeric chance", {
        ACT() {
            return monad(() => loadConfig({ MEMSIM_ALLOCATE_CHANCE: "often" }));
        },
        ASSERT(res) {
            res.should.error({
                message: "Invalid MEMSIM_ALLOCATE_CHANCE"
            });
        }
    });
    test("should reject an unknown strategy", {
        ACT() {
            return monad(() => loadConfig({ MEMSIM_STRATEGIES: "first-fit,next-fit" }));
        },
        ASSERT(res) {
            res.should.error({
                message: "Invalid MEMSIM_STRATEGIES"
            });
        }
    });
    test("should reject a zero width", {
        ACT() {
            return monad(() => loadConfig({ MEMSIM_WIDTH: "0" }));
        },
        ASSERT(res) {
            res.should.error({
                message: "Invalid MEMSIM_WIDTH"
            });
        }
    });
});

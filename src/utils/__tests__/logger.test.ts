import { describe, it, expect, afterEach } from "vitest";
import Logger from "../logger";

const logger = Logger.getInstance();

describe("Logger timing", () => {
    afterEach(() => {
        logger.setTimingEnabled(false);
        logger.clearTimings();
    });

    it("returns the stage result whether or not timing is on", () => {
        expect(logger.time("off", () => 42)).toBe(42);
        logger.setTimingEnabled(true);
        expect(logger.time("on", () => "done")).toBe("done");
    });

    it("records stages only while enabled", () => {
        logger.time("ignored", () => undefined);
        logger.setTimingEnabled(true);
        logger.time("first", () => undefined);
        logger.time("second", () => undefined);

        const timings = logger.getTimings();
        expect(timings.map(t => t.label)).toEqual(["first", "second"]);
        expect(timings.every(t => t.durationMs >= 0)).toBe(true);
    });

    it("clears recorded stages", () => {
        logger.setTimingEnabled(true);
        logger.time("stage", () => undefined);
        logger.clearTimings();

        expect(logger.getTimings()).toEqual([]);
    });

    it("hands out copies of the timing list", () => {
        logger.setTimingEnabled(true);
        logger.time("stage", () => undefined);
        logger.getTimings().pop();

        expect(logger.getTimings()).toHaveLength(1);
    });
});

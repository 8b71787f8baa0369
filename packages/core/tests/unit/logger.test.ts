// © 2026 LearnHubPlay BV. All rights reserved.
// packages/core/tests/unit/logger.test.ts

import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "../../src/utils/logger.js";

afterEach(() => {
    setLogLevel("INFO");
    vi.restoreAllMocks();
});

describe("createLogger", () => {
    it("prefixes messages with the scope", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        createLogger("dispatcher").warn("site-a failed");

        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0]?.[0]).toContain("[novelseek:dispatcher]");
        expect(warn.mock.calls[0]?.[0]).toContain("site-a failed");
    });

    it("drops messages below the threshold", () => {
        const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
        const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
        setLogLevel("WARNING");
        const log = createLogger("engine");

        log.debug("hidden");
        log.info("hidden");
        log.error("shown");

        expect(getLogLevel()).toBe("WARNING");
        expect(debug).not.toHaveBeenCalled();
        expect(info).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledTimes(1);
    });

    it("emits debug output at DEBUG", () => {
        const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
        setLogLevel("DEBUG");
        createLogger("task").debug("late failure");
        expect(debug).toHaveBeenCalledTimes(1);
    });
});

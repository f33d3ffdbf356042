import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/logger.js";

afterEach(() => {
    vi.restoreAllMocks();
});

describe("createLogger", () => {
    it("drops messages below the configured level", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const logger = createLogger("warn");

        logger.debug("chat model=qwen3:4b");
        logger.info("API listening");
        logger.warn("slow reply");

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toMatch(/\[!\].* slow reply$/);
    });

    it("writes info lines with the [+] tag", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        createLogger().info("API listening");
        expect(log).toHaveBeenCalledTimes(1);
        expect(log.mock.calls[0][0]).toMatch(/\[\+\].* API listening$/);
    });

    it("stays quiet when silent", () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => {});
        createLogger("silent").error("boom");
        expect(error).not.toHaveBeenCalled();
    });
});

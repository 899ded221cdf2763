import { describe, it, expect } from "vitest";
import { Logger } from "../src/infrastructure/logger.js";

function capture(level: "debug" | "info" = "info") {
    const lines: string[] = [];
    const logger = new Logger(
        { level },
        { write: (msg: string) => void lines.push(msg) }
    );
    const entries = (): Record<string, unknown>[] =>
        lines.map((line): Record<string, unknown> => JSON.parse(line));
    return { logger, entries };
}

describe("infrastructure/logger", () => {
    it("writes json lines with an upper-case level", () => {
        const { logger, entries } = capture();
        logger.info("test", { a: 1 }, "id");

        const [payload] = entries();
        expect(payload.level).toBe("INFO");
        expect(payload.message).toBe("test");
        expect(payload.a).toBe(1);
        expect(payload.correlationId).toBe("id");
        expect(payload.service).toBe("contact-monitor");
    });

    it("attaches the registered correlation context", () => {
        const { logger, entries } = capture();
        logger.setCorrelationId("session-1", "MonitoringSession");
        logger.warn("contact", {}, "session-1");
        logger.removeCorrelationId("session-1");
        logger.warn("contact", {}, "session-1");

        const [first, second] = entries();
        expect(first.correlationContext).toBe("MonitoringSession");
        expect(second.correlationContext).toBeUndefined();
        expect(second.level).toBe("WARN");
    });

    it("drops debug lines below the configured level", () => {
        const { logger, entries } = capture("info");
        logger.debug("hidden");
        logger.error("shown");

        expect(entries().map((e) => e.message)).toEqual(["shown"]);
        expect(logger.isDebugEnabled()).toBe(false);
    });

    it("reports debug as enabled at debug level", () => {
        const { logger } = capture("debug");
        expect(logger.isDebugEnabled()).toBe(true);
    });
});

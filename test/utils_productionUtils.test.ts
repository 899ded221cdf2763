import { describe, it, expect, vi, beforeEach } from "vitest";
import { ProductionUtils, TimeoutError } from "../src/utils/productionUtils.js";

describe("utils/productionUtils", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    it("sleep resolves after the delay", async () => {
        let done = false;
        const sleeping = ProductionUtils.sleep(100).then(() => {
            done = true;
        });

        await vi.advanceTimersByTimeAsync(99);
        expect(done).toBe(false);
        await vi.advanceTimersByTimeAsync(1);
        await sleeping;
        expect(done).toBe(true);
    });

    it("sleep resolves early on abort", async () => {
        const controller = new AbortController();
        const sleeping = ProductionUtils.sleep(10_000, controller.signal);
        controller.abort();
        await expect(sleeping).resolves.toBeUndefined();
        expect(vi.getTimerCount()).toBe(0);
    });

    it("sleep returns immediately for an aborted signal", async () => {
        const controller = new AbortController();
        controller.abort();
        await ProductionUtils.sleep(10_000, controller.signal);
        expect(vi.getTimerCount()).toBe(0);
    });

    it("withTimeout passes through a fast result and clears its timer", async () => {
        await expect(
            ProductionUtils.withTimeout(Promise.resolve(7), 100, "op")
        ).resolves.toBe(7);
        expect(vi.getTimerCount()).toBe(0);
    });

    it("withTimeout rejects with a TimeoutError", async () => {
        const pending = ProductionUtils.withTimeout(
            new Promise<number>(() => {}),
            250,
            "getSnapshot"
        );
        const assertion = expect(pending).rejects.toThrow(
            new TimeoutError("getSnapshot timed out after 250 ms", 250)
        );
        await vi.advanceTimersByTimeAsync(250);
        await assertion;
    });

    it("settleWithin reports whether the promise settled", async () => {
        await expect(
            ProductionUtils.settleWithin(Promise.reject(new Error("x")), 100)
        ).resolves.toBe(true);

        const waiting = ProductionUtils.settleWithin(new Promise(() => {}), 100);
        await vi.advanceTimersByTimeAsync(100);
        await expect(waiting).resolves.toBe(false);
    });
});

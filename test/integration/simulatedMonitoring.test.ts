import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { MonitorConfigSchema } from "../../src/core/config.js";
import { createDependencies, type Dependencies } from "../../src/core/dependencies.js";
import { shutdown } from "../../src/index.js";
import { createMockLogger } from "../../__mocks__/src/infrastructure/loggerInterface.js";

describe("integration/simulated monitoring", () => {
    let dir: string;

    beforeEach(() => {
        vi.useFakeTimers();
        dir = mkdtempSync(join(tmpdir(), "contact-monitor-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    const build = (dbPath: string | null): Dependencies =>
        createDependencies(
            MonitorConfigSchema.parse({
                sensitivity: "normal",
                calibration: { sampleCount: 3, sampleIntervalMs: 10 },
                report: { directory: dir, dbPath },
                simulator: {
                    voltageNoise: 0.05,
                    currentNoise: 0.01,
                    seed: 11,
                    contacts: [
                        { atMs: 1_000, durationMs: 300, joint: 2, voltageDrop: 6 },
                    ],
                },
            }),
            createMockLogger()
        );

    const run = async ({ arm, session }: Dependencies): Promise<void> => {
        await arm.connect();
        await arm.startSystem();
        const starting = session.start();
        await vi.advanceTimersByTimeAsync(20);
        await starting;
        await vi.advanceTimersByTimeAsync(2_000);
    };

    it("detects a scripted contact once and persists the session", async () => {
        const deps = build(":memory:");
        await run(deps);

        const report = await deps.session.report();

        expect(report.collisionCount).toBe(1);
        expect(report.events[0].affectedJoints).toEqual([2]);
        expect(report.events[0].method).toBe("voltage_drop");
        expect(report.baseline?.sampleCount).toBe(3);

        const stored = deps.sessionStore?.listSessions() ?? [];
        expect(stored.map((s) => s.collisionCount)).toEqual([1]);
        expect(deps.sessionStore?.getEvents(report.sessionId)).toHaveLength(1);

        const file = deps.reportWriter.getLastPath();
        expect(file).not.toBeNull();
        if (file === null) return;
        const written: { sessionId: string } = JSON.parse(readFileSync(file, "utf8"));
        expect(written.sessionId).toBe(report.sessionId);

        deps.sessionStore?.close();
    });

    it("shutdown writes the report and releases the arm", async () => {
        const deps = build(null);
        await run(deps);

        const exitCode = await shutdown(deps, "test");

        expect(exitCode).toBe(0);
        expect(deps.session.getState()).toBe("stopped");
        expect(deps.sessionStore).toBeNull();
        const file = deps.reportWriter.getLastPath();
        expect(file !== null && existsSync(file)).toBe(true);
        await expect(deps.arm.getSnapshot()).rejects.toThrow(
            "Telemetry source disconnected"
        );
    });
});

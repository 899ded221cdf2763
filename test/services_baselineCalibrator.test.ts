import { describe, it, expect, vi, beforeEach } from "vitest";
import {
    BaselineCalibrator,
    computeBaseline,
    createDefaultBaseline,
    elementwiseMean,
} from "../src/services/baselineCalibrator.js";
import type { ILogger } from "../src/infrastructure/loggerInterface.js";
import { TelemetryDisconnectedError } from "../src/utils/errorHandler.js";
import { createMockLogger } from "../__mocks__/src/infrastructure/loggerInterface.js";
import { makeSnapshot, ScriptedSource } from "./framework/telemetryFixtures.js";

const sample = (voltages: number[], currents: number[]) => ({
    joint_voltage: voltages,
    joint_current: currents,
});

describe("services/baselineCalibrator", () => {
    let logger: ILogger;
    let calibrator: BaselineCalibrator;

    beforeEach(() => {
        logger = createMockLogger();
        calibrator = new BaselineCalibrator(logger);
    });

    it("averages the collected samples per joint", async () => {
        const source = new ScriptedSource([
            sample([24, 22], [0.25, 1]),
            sample([23, 23], [0.5, 1]),
            sample([22, 24], [0.75, 1]),
        ]);

        const baseline = await calibrator.calibrate(source, {
            sampleCount: 3,
            sampleIntervalMs: 0,
        });

        expect(baseline.voltages).toEqual([23, 23]);
        expect(baseline.currents).toEqual([0.5, 1]);
        expect(baseline.sampleCount).toBe(3);
        expect(baseline.source).toBe("calibrated");
        expect(source.calls).toBe(3);
    });

    it("falls back to defaults when every read fails", async () => {
        const source = new ScriptedSource([], new Error("no link"));

        const baseline = await calibrator.calibrate(source, {
            sampleCount: 3,
            sampleIntervalMs: 0,
        });

        expect(baseline).toMatchObject({
            voltages: [24, 24, 24, 24, 24, 24],
            currents: [0.5, 0.5, 0.5, 0.5, 0.5, 0.5],
            sampleCount: 0,
            source: "default",
        });
        expect(logger.warn).toHaveBeenCalledWith(
            "No usable calibration samples, using default baseline",
            expect.objectContaining({ jointCount: 6 }),
            undefined
        );
    });

    it("sizes the default baseline from the configured values", async () => {
        const baseline = await calibrator.calibrate(new ScriptedSource([], null), {
            sampleCount: 2,
            sampleIntervalMs: 0,
            jointCount: 3,
            defaultVoltage: 48,
            defaultCurrent: 1.25,
        });

        expect(baseline.voltages).toEqual([48, 48, 48]);
        expect(baseline.currents).toEqual([1.25, 1.25, 1.25]);
    });

    it("skips empty, failed and malformed samples", async () => {
        const source = new ScriptedSource([
            null,
            new Error("checksum"),
            { joint_voltage: [24, 24] },
            sample([20, 21], [0.5, 0.5]),
        ]);

        const baseline = await calibrator.calibrate(source, {
            sampleCount: 4,
            sampleIntervalMs: 0,
        });

        expect(baseline.voltages).toEqual([20, 21]);
        expect(baseline.sampleCount).toBe(1);
        expect(logger.warn).toHaveBeenCalledTimes(3);
    });

    it("discards samples with a different joint count", async () => {
        const source = new ScriptedSource([
            sample([24, 24], [0.5, 0.5]),
            sample([10, 10, 10], [0.5, 0.5, 0.5]),
            sample([22, 22], [0.5, 0.5]),
        ]);

        const baseline = await calibrator.calibrate(source, {
            sampleCount: 3,
            sampleIntervalMs: 0,
        });

        expect(baseline.voltages).toEqual([23, 23]);
        expect(baseline.sampleCount).toBe(2);
    });

    it("stops at a disconnect and keeps what it had", async () => {
        const source = new ScriptedSource([
            sample([24, 24], [0.5, 0.5]),
            new TelemetryDisconnectedError(),
            sample([10, 10], [0.5, 0.5]),
        ]);

        const baseline = await calibrator.calibrate(source, {
            sampleCount: 3,
            sampleIntervalMs: 0,
        });

        expect(source.calls).toBe(2);
        expect(baseline.voltages).toEqual([24, 24]);
        expect(baseline.sampleCount).toBe(1);
    });

    it("does not read when already aborted", async () => {
        const controller = new AbortController();
        controller.abort();
        const source = new ScriptedSource();

        const baseline = await calibrator.calibrate(source, {
            signal: controller.signal,
        });

        expect(source.calls).toBe(0);
        expect(baseline.source).toBe("default");
    });

    it("spaces reads by the sample interval", async () => {
        vi.useFakeTimers();
        const source = new ScriptedSource();

        const calibrating = calibrator.calibrate(source, {
            sampleCount: 3,
            sampleIntervalMs: 100,
        });
        expect(source.calls).toBe(1);

        await vi.advanceTimersByTimeAsync(50);
        expect(source.calls).toBe(1);
        await vi.advanceTimersByTimeAsync(60);
        expect(source.calls).toBe(2);
        await vi.advanceTimersByTimeAsync(100);
        expect(source.calls).toBe(3);

        const baseline = await calibrating;
        expect(baseline.sampleCount).toBe(3);
    });

    describe("pure helpers", () => {
        it("elementwiseMean of nothing is empty", () => {
            expect(elementwiseMean([])).toEqual([]);
        });

        it("computeBaseline uses the fallback for no samples", () => {
            expect(
                computeBaseline(
                    [],
                    { jointCount: 2, defaultVoltage: 12, defaultCurrent: 0.1 },
                    5
                )
            ).toEqual(createDefaultBaseline(2, 12, 0.1, 5));
        });

        it("computeBaseline averages matching samples only", () => {
            const baseline = computeBaseline(
                [
                    makeSnapshot([24, 24], [0.5, 0.5]),
                    makeSnapshot([1], [1]),
                    makeSnapshot([22, 22], [0.5, 0.5]),
                ],
                { jointCount: 6, defaultVoltage: 24, defaultCurrent: 0.5 },
                5
            );
            expect(baseline).toEqual({
                voltages: [23, 23],
                currents: [0.5, 0.5],
                sampleCount: 2,
                source: "calibrated",
                establishedAt: 5,
            });
        });
    });
});

import { describe, it, expect } from "vitest";
import {
    AnomalyDetector,
    describeJointStatus,
    detectAnomaly,
    evaluateSnapshot,
} from "../src/services/anomalyDetector.js";
import { SENSITIVITY_PRESETS } from "../src/core/config.js";
import {
    makeBaseline,
    makeSnapshot,
    NOMINAL_CURRENTS,
    NOMINAL_VOLTAGES,
} from "./framework/telemetryFixtures.js";

const normal = SENSITIVITY_PRESETS.normal;

describe("services/anomalyDetector", () => {
    it("flags a voltage sag on one joint", () => {
        const event = detectAnomaly(
            makeSnapshot([24, 24, 18, 24, 24, 24]),
            makeBaseline(),
            normal
        );

        expect(event).not.toBeNull();
        expect(event?.method).toBe("voltage_drop");
        expect(event?.confidence).toBe(0.9);
        expect(event?.affectedJoints).toEqual([2]);
        expect(event?.voltageDrops).toEqual([0, 0, 6, 0, 0, 0]);
        expect(event?.details.detectionMethods).toEqual(["voltage_drop"]);
        expect(event?.details.maxVoltageDrop).toBe(6);
    });

    it("ignores a uniform sag below the threshold ratio", () => {
        // 1.0 V below baseline on every joint: under the 2.0 V threshold
        expect(
            detectAnomaly(makeSnapshot([23, 23, 23, 23, 23, 23]), makeBaseline(), normal)
        ).toBeNull();
    });

    it("returns null for nominal telemetry", () => {
        expect(detectAnomaly(makeSnapshot(), makeBaseline(), normal)).toBeNull();
        expect(evaluateSnapshot(makeSnapshot(), makeBaseline(), normal)).toEqual({
            kind: "nominal",
        });
    });

    it("requires the delta to exceed the threshold strictly", () => {
        // drop of exactly 2.0 V
        expect(
            detectAnomaly(makeSnapshot([24, 22, 24, 24, 24, 24]), makeBaseline(), normal)
        ).toBeNull();
    });

    it("flags a current spike", () => {
        const event = detectAnomaly(
            makeSnapshot(NOMINAL_VOLTAGES, [0.5, 0.5, 0.5, 0.5, 1.7, 0.5]),
            makeBaseline(),
            normal
        );

        expect(event?.method).toBe("current_spike");
        expect(event?.affectedJoints).toEqual([4]);
        expect(event?.confidence).toBe(0.9);
        expect(event?.details.maxCurrentSpike).toBe(1.2);
    });

    it("averages both rules and labels the event as a voltage drop", () => {
        // voltage: 5 V drop on joint 0 -> min(0.9, 5 / 4) = 0.9
        // current: 1.2 A rise on joint 3 -> min(0.9, 1.2 / 1.2) = 0.9
        const event = detectAnomaly(
            makeSnapshot([19, 24, 24, 24, 24, 24], [0.5, 0.5, 0.5, 1.7, 0.5, 0.5]),
            makeBaseline(),
            normal
        );

        expect(event?.method).toBe("voltage_drop");
        expect(event?.details.detectionMethods).toEqual([
            "voltage_drop",
            "current_spike",
        ]);
        expect(event?.affectedJoints).toEqual([0, 3]);
        expect(event?.confidence).toBe(0.9);
    });

    it("suppresses candidates below the confidence bar", () => {
        // 2.5 V drop -> 2.5 / 4 = 0.625 < 0.75
        const snapshot = makeSnapshot([24, 21.5, 24, 24, 24, 24]);

        expect(detectAnomaly(snapshot, makeBaseline(), normal)).toBeNull();
        expect(evaluateSnapshot(snapshot, makeBaseline(), normal)).toEqual({
            kind: "suppressed",
            confidence: 0.625,
            affectedJoints: [1],
        });
    });

    it("lets the same candidate through at high sensitivity", () => {
        // 2.5 V drop -> min(0.9, 2.5 / 2) = 0.9 >= 0.6
        const event = detectAnomaly(
            makeSnapshot([24, 21.5, 24, 24, 24, 24]),
            makeBaseline(),
            SENSITIVITY_PRESETS.high
        );
        expect(event?.confidence).toBe(0.9);
    });

    it("blends a strong and a weak rule", () => {
        // voltage: 3.5 V -> 3.5 / 4 = 0.875; current: 0.9 A -> 0.9 / 1.2 = 0.75
        const event = detectAnomaly(
            makeSnapshot([24, 24, 20.5, 24, 24, 24], [0.5, 0.5, 1.4, 0.5, 0.5, 0.5]),
            makeBaseline(),
            normal
        );
        expect(event?.affectedJoints).toEqual([2]);
        expect(event?.confidence).toBeCloseTo(0.8125, 10);
    });

    it("truncates to the shorter of snapshot and baseline", () => {
        const event = detectAnomaly(
            makeSnapshot([24, 24, 24, 24, 24, 24, 10], [...NOMINAL_CURRENTS, 0.5]),
            makeBaseline(),
            normal
        );
        expect(event).toBeNull();

        const short = detectAnomaly(
            makeSnapshot([24, 18], [0.5, 0.5]),
            makeBaseline(),
            normal
        );
        expect(short?.affectedJoints).toEqual([1]);
        expect(short?.liveVoltages).toEqual([24, 18]);
        expect(short?.details.baselineVoltages).toEqual([24, 24]);
    });

    it("returns no data for missing inputs", () => {
        expect(evaluateSnapshot(null, makeBaseline(), normal)).toEqual({
            kind: "no_data",
        });
        expect(evaluateSnapshot(makeSnapshot(), null, normal)).toEqual({
            kind: "no_data",
        });
        expect(
            evaluateSnapshot(makeSnapshot([], []), makeBaseline(), normal)
        ).toEqual({ kind: "no_data" });
    });

    it("is deterministic and leaves its inputs untouched", () => {
        const snapshot = makeSnapshot([24, 24, 18, 24, 24, 24]);
        const baseline = makeBaseline();

        const first = detectAnomaly(snapshot, baseline, normal);
        const second = detectAnomaly(snapshot, baseline, normal);

        expect(second).toEqual(first);
        expect(snapshot.voltages).toEqual([24, 24, 18, 24, 24, 24]);
        expect(baseline.voltages).toEqual(NOMINAL_VOLTAGES);
        expect(Object.isFrozen(first)).toBe(true);
    });

    it("stamps the event with the snapshot time", () => {
        const event = detectAnomaly(
            makeSnapshot([24, 24, 18, 24, 24, 24], NOMINAL_CURRENTS, 123_456),
            makeBaseline(),
            normal
        );
        expect(event?.timestamp).toBe(123_456);
    });

    it("AnomalyDetector delegates with its thresholds", () => {
        const detector = new AnomalyDetector(normal);
        expect(detector.getThresholds()).toBe(normal);
        expect(
            detector.detect(makeSnapshot([24, 24, 18, 24, 24, 24]), makeBaseline())
                ?.affectedJoints
        ).toEqual([2]);
    });

    describe("describeJointStatus", () => {
        it("reports per-joint differences", () => {
            const status = describeJointStatus(
                makeSnapshot([24, 23, 24, 24, 24, 24], [0.5, 0.5, 1.5, 0.5, 0.5, 0.5]),
                makeBaseline()
            );
            expect(status.voltageDifferences).toEqual([0, 1, 0, 0, 0, 0]);
            expect(status.currentDifferences).toEqual([0, 0, 1, 0, 0, 0]);
        });

        it("omits differences without a baseline", () => {
            const status = describeJointStatus(makeSnapshot(), null);
            expect(status.baselineVoltages).toBeNull();
            expect(status.voltageDifferences).toBeNull();
        });
    });
});

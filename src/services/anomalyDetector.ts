// src/services/anomalyDetector.ts
/**********************************************************************
 * AnomalyDetector - joint contact detection
 * Compares one live telemetry snapshot with the session baseline.
 * A contact shows up as a voltage sag and/or a current rise on the
 * joints that meet resistance. Each rule contributes a confidence and
 * the blend must clear the configured bar before an event exists.
 *********************************************************************/

import type {
    Baseline,
    DetectionEvent,
    DetectionMethod,
    JointStatus,
    TelemetrySnapshot,
    Thresholds,
} from "../types/telemetryTypes.js";

/** Cap on a single rule's contribution */
export const RULE_CONFIDENCE_CAP = 0.9;
/** Cap on the blended confidence */
export const EVENT_CONFIDENCE_CAP = 0.95;

export interface RuleOutcome {
    method: DetectionMethod;
    joints: number[];
    confidence: number;
}

/**
 * Outcome of evaluating a snapshot, including candidates the confidence gate
 * rejected.
 */
export type Evaluation =
    | { kind: "no_data" }
    | { kind: "nominal" }
    | { kind: "suppressed"; confidence: number; affectedJoints: number[] }
    | { kind: "event"; event: DetectionEvent };

function evaluateRule(
    method: DetectionMethod,
    deltas: readonly number[],
    threshold: number
): RuleOutcome | null {
    const joints: number[] = [];
    let maxDelta = -Infinity;

    deltas.forEach((delta, joint) => {
        if (delta > threshold) {
            joints.push(joint);
            maxDelta = Math.max(maxDelta, delta);
        }
    });

    if (joints.length === 0) return null;

    return {
        method,
        joints,
        confidence: Math.min(RULE_CONFIDENCE_CAP, maxDelta / (threshold * 2)),
    };
}

function maxOf(values: readonly number[]): number {
    return values.length > 0 ? Math.max(...values) : 0;
}

/**
 * Full evaluation of one snapshot against a baseline. Pure: identical inputs
 * give identical outputs.
 */
export function evaluateSnapshot(
    snapshot: TelemetrySnapshot | null | undefined,
    baseline: Baseline | null | undefined,
    thresholds: Thresholds
): Evaluation {
    if (
        !snapshot ||
        !baseline ||
        snapshot.voltages.length === 0 ||
        snapshot.currents.length === 0 ||
        baseline.voltages.length === 0
    ) {
        return { kind: "no_data" };
    }

    const joints = Math.min(
        snapshot.voltages.length,
        snapshot.currents.length,
        baseline.voltages.length,
        baseline.currents.length
    );

    const voltages = snapshot.voltages.slice(0, joints);
    const currents = snapshot.currents.slice(0, joints);
    const baselineVoltages = baseline.voltages.slice(0, joints);
    const baselineCurrents = baseline.currents.slice(0, joints);

    const voltageDrops = baselineVoltages.map((v, j) => v - voltages[j]);
    const currentIncreases = currents.map((c, j) => c - baselineCurrents[j]);

    // Voltage is tested first; it labels the event when both fire.
    const rules = [
        evaluateRule(
            "voltage_drop",
            voltageDrops,
            thresholds.voltageDropThreshold
        ),
        evaluateRule(
            "current_spike",
            currentIncreases,
            thresholds.currentSpikeThreshold
        ),
    ].filter((rule): rule is RuleOutcome => rule !== null);

    const firstRule = rules[0];
    if (!firstRule) {
        return { kind: "nominal" };
    }

    const affectedJoints = [
        ...new Set(rules.flatMap((rule) => rule.joints)),
    ].sort((a, b) => a - b);

    const confidence = Math.min(
        EVENT_CONFIDENCE_CAP,
        rules.reduce((sum, rule) => sum + rule.confidence, 0) / rules.length
    );

    if (confidence < thresholds.confidenceThreshold) {
        return { kind: "suppressed", confidence, affectedJoints };
    }

    const event: DetectionEvent = Object.freeze({
        timestamp: snapshot.timestamp,
        method: firstRule.method,
        confidence,
        liveVoltages: Object.freeze(voltages),
        liveCurrents: Object.freeze(currents),
        affectedJoints: Object.freeze(affectedJoints),
        voltageDrops: Object.freeze(voltageDrops),
        details: Object.freeze({
            detectionMethods: Object.freeze(rules.map((rule) => rule.method)),
            baselineVoltages: Object.freeze(baselineVoltages),
            baselineCurrents: Object.freeze(baselineCurrents),
            currentIncreases: Object.freeze(currentIncreases),
            maxVoltageDrop: maxOf(voltageDrops),
            maxCurrentSpike: maxOf(currentIncreases),
        }),
    });

    return { kind: "event", event };
}

/**
 * Contact event for a snapshot, or null when nothing clears the thresholds
 * and the confidence bar.
 */
export function detectAnomaly(
    snapshot: TelemetrySnapshot | null | undefined,
    baseline: Baseline | null | undefined,
    thresholds: Thresholds
): DetectionEvent | null {
    const evaluation = evaluateSnapshot(snapshot, baseline, thresholds);
    return evaluation.kind === "event" ? evaluation.event : null;
}

/**
 * Per-joint deviation from the baseline, for operator display.
 */
export function describeJointStatus(
    snapshot: TelemetrySnapshot,
    baseline: Baseline | null
): JointStatus {
    if (!baseline) {
        return {
            timestamp: snapshot.timestamp,
            voltages: snapshot.voltages,
            currents: snapshot.currents,
            baselineVoltages: null,
            baselineCurrents: null,
            voltageDifferences: null,
            currentDifferences: null,
        };
    }

    const voltageJoints = Math.min(
        snapshot.voltages.length,
        baseline.voltages.length
    );
    const currentJoints = Math.min(
        snapshot.currents.length,
        baseline.currents.length
    );

    return {
        timestamp: snapshot.timestamp,
        voltages: snapshot.voltages,
        currents: snapshot.currents,
        baselineVoltages: baseline.voltages,
        baselineCurrents: baseline.currents,
        voltageDifferences: baseline.voltages
            .slice(0, voltageJoints)
            .map((v, j) => v - snapshot.voltages[j]),
        currentDifferences: snapshot.currents
            .slice(0, currentJoints)
            .map((c, j) => c - baseline.currents[j]),
    };
}

/**
 * Holds one threshold set and evaluates snapshots against a caller-held
 * baseline. No memory between calls.
 */
export class AnomalyDetector {
    constructor(private readonly thresholds: Thresholds) {}

    public getThresholds(): Thresholds {
        return this.thresholds;
    }

    public evaluate(
        snapshot: TelemetrySnapshot | null | undefined,
        baseline: Baseline | null | undefined
    ): Evaluation {
        return evaluateSnapshot(snapshot, baseline, this.thresholds);
    }

    public detect(
        snapshot: TelemetrySnapshot | null | undefined,
        baseline: Baseline | null | undefined
    ): DetectionEvent | null {
        return detectAnomaly(snapshot, baseline, this.thresholds);
    }

    public getJointStatus(
        snapshot: TelemetrySnapshot,
        baseline: Baseline | null
    ): JointStatus {
        return describeJointStatus(snapshot, baseline);
    }
}

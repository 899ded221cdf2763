// src/types/telemetryTypes.ts

/**
 * One joint's electrical reading.
 */
export interface JointReading {
    /** Volts */
    readonly voltage: number;
    /** Amps */
    readonly current: number;
}

/**
 * One timestamped reading of every joint. Index `j` of both vectors belongs to
 * joint `j`.
 */
export interface TelemetrySnapshot {
    /** Capture time, ms since epoch */
    readonly timestamp: number;
    readonly voltages: readonly number[];
    readonly currents: readonly number[];
}

export type BaselineSource = "calibrated" | "default";

/**
 * Reference per-joint voltage/current vector representing the unloaded state.
 */
export interface Baseline {
    readonly voltages: readonly number[];
    readonly currents: readonly number[];
    /** Number of samples averaged; 0 for a default baseline */
    readonly sampleCount: number;
    readonly source: BaselineSource;
    readonly establishedAt: number;
}

export type Sensitivity = "high" | "normal" | "low";

export interface Thresholds {
    /** Minimum (baseline - live) volts on a joint to flag a voltage drop */
    readonly voltageDropThreshold: number;
    /** Minimum (live - baseline) amps on a joint to flag a current spike */
    readonly currentSpikeThreshold: number;
    /** Carried with the presets for reporting only */
    readonly powerChangeThreshold: number;
    /** Sampling rate of the monitoring loop, Hz */
    readonly detectionFrequency: number;
    /** Minimum blended confidence, 0..1 */
    readonly confidenceThreshold: number;
    readonly jointCount: number;
}

export type DetectionMethod = "voltage_drop" | "current_spike";

export interface DetectionDetails {
    /** Every rule that fired, in evaluation order */
    readonly detectionMethods: readonly DetectionMethod[];
    readonly baselineVoltages: readonly number[];
    readonly baselineCurrents: readonly number[];
    readonly currentIncreases: readonly number[];
    readonly maxVoltageDrop: number;
    readonly maxCurrentSpike: number;
}

export interface DetectionEvent {
    readonly timestamp: number;
    /** voltage_drop whenever that rule fired, otherwise current_spike */
    readonly method: DetectionMethod;
    /** Blended confidence, capped at 0.95 */
    readonly confidence: number;
    readonly liveVoltages: readonly number[];
    readonly liveCurrents: readonly number[];
    /** Ascending, unique, never empty */
    readonly affectedJoints: readonly number[];
    readonly voltageDrops: readonly number[];
    readonly details: DetectionDetails;
}

/**
 * Live deviation from the baseline, for operator display.
 */
export interface JointStatus {
    readonly timestamp: number;
    readonly voltages: readonly number[];
    readonly currents: readonly number[];
    readonly baselineVoltages: readonly number[] | null;
    readonly baselineCurrents: readonly number[] | null;
    readonly voltageDifferences: readonly number[] | null;
    readonly currentDifferences: readonly number[] | null;
}

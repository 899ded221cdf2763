// src/types/sessionTypes.ts
import type {
    Baseline,
    DetectionEvent,
    DetectionMethod,
    Sensitivity,
    Thresholds,
} from "./telemetryTypes.js";

export type SessionState = "idle" | "calibrating" | "monitoring" | "stopped";

export interface DetectionStats {
    /** Recorded contact events */
    readonly totalDetections: number;
    /** Recorded events in which the voltage-drop rule fired */
    readonly voltageDetections: number;
    /** Recorded events in which the current-spike rule fired */
    readonly currentDetections: number;
    /** Detections merged into an ongoing contact */
    readonly debouncedDetections: number;
    readonly telemetryFailures: number;
    readonly ticks: number;
}

export interface RecordedEvent {
    /** Seconds since the session started */
    readonly relativeTimeSec: number;
    readonly event: DetectionEvent;
}

export interface SessionRecord {
    readonly sessionId: string;
    readonly sensitivity: Sensitivity;
    readonly thresholds: Thresholds;
    readonly baseline: Baseline | null;
    readonly startedAt: number | null;
    readonly endedAt: number | null;
    readonly durationSec: number | null;
    readonly events: readonly RecordedEvent[];
    readonly stats: DetectionStats;
}

export interface ReportedEvent {
    /** 1-based position in the session */
    index: number;
    relativeTimeSec: number;
    timestamp: string;
    method: DetectionMethod;
    detectionMethods: DetectionMethod[];
    confidence: number;
    affectedJoints: number[];
    voltages: number[];
    currents: number[];
    voltageDrops: number[];
    baselineVoltages: number[];
    baselineCurrents: number[];
    maxVoltageDrop: number;
    maxCurrentSpike: number;
}

/**
 * Structured, lossless rendering of a finalized SessionRecord.
 */
export interface SessionReport {
    sessionId: string;
    sensitivity: Sensitivity;
    startTime: string | null;
    endTime: string | null;
    durationSec: number;
    collisionCount: number;
    stats: DetectionStats;
    thresholds: Thresholds;
    baseline: {
        voltages: number[];
        currents: number[];
        sampleCount: number;
        source: Baseline["source"];
        establishedAt: string;
    } | null;
    events: ReportedEvent[];
    summary: string[];
}

export interface ReportSink {
    readonly name: string;
    write(report: SessionReport): Promise<void>;
}

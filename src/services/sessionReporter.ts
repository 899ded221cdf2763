// src/services/sessionReporter.ts
import type {
    RecordedEvent,
    ReportedEvent,
    SessionRecord,
    SessionReport,
} from "../types/sessionTypes.js";

function isoOrNull(epochMs: number | null): string | null {
    return epochMs === null ? null : new Date(epochMs).toISOString();
}

function toReportedEvent(recorded: RecordedEvent, index: number): ReportedEvent {
    const { event } = recorded;
    return {
        index: index + 1,
        relativeTimeSec: recorded.relativeTimeSec,
        timestamp: new Date(event.timestamp).toISOString(),
        method: event.method,
        detectionMethods: [...event.details.detectionMethods],
        confidence: event.confidence,
        affectedJoints: [...event.affectedJoints],
        voltages: [...event.liveVoltages],
        currents: [...event.liveCurrents],
        voltageDrops: [...event.voltageDrops],
        baselineVoltages: [...event.details.baselineVoltages],
        baselineCurrents: [...event.details.baselineCurrents],
        maxVoltageDrop: event.details.maxVoltageDrop,
        maxCurrentSpike: event.details.maxCurrentSpike,
    };
}

/**
 * Operator-facing lines. Safe on a session with no events or no start.
 */
export function summarizeSession(record: SessionRecord): string[] {
    const durationSec = record.durationSec ?? 0;
    const lines = [
        `Session ${record.sessionId} (${record.sensitivity} sensitivity)`,
        `Start time: ${isoOrNull(record.startedAt) ?? "not started"}`,
        `End time: ${isoOrNull(record.endedAt) ?? "not started"}`,
        `Duration: ${durationSec.toFixed(1)} s`,
        `Contacts detected: ${record.stats.totalDetections}`,
        `Voltage-drop detections: ${record.stats.voltageDetections}`,
        `Current-spike detections: ${record.stats.currentDetections}`,
    ];

    if (record.stats.telemetryFailures > 0) {
        lines.push(`Telemetry failures: ${record.stats.telemetryFailures}`);
    }

    record.events.forEach(({ relativeTimeSec, event }, i) => {
        lines.push(
            `#${i + 1} at ${relativeTimeSec.toFixed(2)} s: joints ${event.affectedJoints.join(", ")} ` +
                `(${event.details.detectionMethods.join(" + ")}, confidence ${event.confidence.toFixed(2)})`
        );
    });

    return lines;
}

/**
 * Lossless JSON-ready rendering of a finalized SessionRecord. Does not touch
 * the record.
 */
export function buildSessionReport(record: SessionRecord): SessionReport {
    const { baseline } = record;

    return {
        sessionId: record.sessionId,
        sensitivity: record.sensitivity,
        startTime: isoOrNull(record.startedAt),
        endTime: isoOrNull(record.endedAt),
        durationSec: record.durationSec ?? 0,
        collisionCount: record.events.length,
        stats: { ...record.stats },
        thresholds: { ...record.thresholds },
        baseline: baseline
            ? {
                  voltages: [...baseline.voltages],
                  currents: [...baseline.currents],
                  sampleCount: baseline.sampleCount,
                  source: baseline.source,
                  establishedAt: new Date(baseline.establishedAt).toISOString(),
              }
            : null,
        events: record.events.map(toReportedEvent),
        summary: summarizeSession(record),
    };
}

// src/services/monitoringSession.ts
import { EventEmitter } from "events";
import { ulid } from "ulid";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { CircuitBreaker } from "../infrastructure/circuitBreaker.js";
import {
    readSnapshot,
    type TelemetrySource,
} from "../clients/telemetrySource.js";
import { AnomalyDetector } from "./anomalyDetector.js";
import { BaselineCalibrator } from "./baselineCalibrator.js";
import { buildSessionReport } from "./sessionReporter.js";
import type {
    Baseline,
    DetectionEvent,
    JointStatus,
    Sensitivity,
    Thresholds,
} from "../types/telemetryTypes.js";
import type {
    DetectionStats,
    RecordedEvent,
    ReportSink,
    SessionRecord,
    SessionReport,
    SessionState,
} from "../types/sessionTypes.js";
import type { CalibrationConfig, SessionConfig } from "../core/config.js";
import {
    ErrorHandler,
    ReportWriteError,
    TelemetryDisconnectedError,
    toError,
} from "../utils/errorHandler.js";
import { ProductionUtils } from "../utils/productionUtils.js";

const COMPONENT = "MonitoringSession";

export interface MonitoringSessionOptions {
    source: TelemetrySource;
    thresholds: Thresholds;
    logger: ILogger;
    sensitivity?: Sensitivity;
    calibration?: Partial<CalibrationConfig>;
    session?: Partial<SessionConfig>;
    sinks?: ReportSink[];
    calibrator?: BaselineCalibrator;
    sessionId?: string;
}

export interface StateChangeEvent {
    from: SessionState;
    to: SessionState;
}

type MutableStats = { -readonly [K in keyof DetectionStats]: DetectionStats[K] };

function sameJoints(a: DetectionEvent, b: DetectionEvent): boolean {
    return (
        a.affectedJoints.length === b.affectedJoints.length &&
        a.affectedJoints.every((joint, i) => joint === b.affectedJoints[i])
    );
}

/**
 * MonitoringSession – one calibrate → monitor → stop → report run against a
 * telemetry source.
 *
 * Emits:
 *  - "stateChange" ({ from, to })
 *  - "calibrated"  (Baseline)
 *  - "contact"     (RecordedEvent)
 *  - "telemetryError" ({ tick })
 *  - "disconnected" (TelemetryDisconnectedError)
 *  - "stopped"     (SessionRecord)
 *
 * The sampling loop is the only writer of the record. Readers get frozen
 * copies.
 */
export class MonitoringSession extends EventEmitter {
    private readonly sessionId: string;
    private readonly source: TelemetrySource;
    private readonly thresholds: Thresholds;
    private readonly sensitivity: Sensitivity;
    private readonly logger: ILogger;
    private readonly calibration: Partial<CalibrationConfig>;
    private readonly cfg: SessionConfig;
    private readonly sinks: ReportSink[];
    private readonly detector: AnomalyDetector;
    private readonly calibrator: BaselineCalibrator;
    private readonly breaker: CircuitBreaker;
    private readonly abortController = new AbortController();

    /* record */
    private state: SessionState = "idle";
    private baseline: Baseline | null = null;
    private startedAt: number | null = null;
    private endedAt: number | null = null;
    private durationSec: number | null = null;
    private readonly events: RecordedEvent[] = [];
    private readonly stats: MutableStats = {
        totalDetections: 0,
        voltageDetections: 0,
        currentDetections: 0,
        debouncedDetections: 0,
        telemetryFailures: 0,
        ticks: 0,
    };

    /* dedup tracking */
    private lastEvent: DetectionEvent | null = null;
    private lastRecordedAt = 0;

    /* runtime */
    private startPromise: Promise<void> | null = null;
    private loopPromise: Promise<void> | null = null;
    private stopPromise: Promise<SessionRecord> | null = null;

    constructor(options: MonitoringSessionOptions) {
        super();

        this.sessionId = options.sessionId ?? ulid();
        this.source = options.source;
        this.thresholds = options.thresholds;
        this.sensitivity = options.sensitivity ?? "normal";
        this.logger = options.logger;
        this.calibration = options.calibration ?? {};
        this.cfg = {
            debounceMs: 500,
            readTimeoutMs: 250,
            stopTimeoutMs: 2000,
            failureThreshold: 5,
            failureCooldownMs: 1000,
            ...options.session,
        };
        this.sinks = options.sinks ?? [];
        this.detector = new AnomalyDetector(this.thresholds);
        this.calibrator =
            options.calibrator ?? new BaselineCalibrator(this.logger);
        this.breaker = new CircuitBreaker(
            this.cfg.failureThreshold,
            this.cfg.failureCooldownMs,
            this.logger,
            "TelemetryCircuit"
        );

        this.logger.setCorrelationId(this.sessionId, COMPONENT);
        this.logger.info(
            "MonitoringSession created",
            {
                component: COMPONENT,
                sensitivity: this.sensitivity,
                thresholds: this.thresholds,
                cfg: this.cfg,
            },
            this.sessionId
        );
    }

    /* ---------------------------------------------------------------------- */
    /*  LIFECYCLE                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Calibrate, then launch the sampling loop in the background. Resolves once
     * monitoring is running. A no-op unless the session is idle.
     */
    public async start(): Promise<void> {
        if (this.state !== "idle" || this.stopPromise) {
            this.logger.warn(
                "start() ignored",
                { component: COMPONENT, state: this.state },
                this.sessionId
            );
            return;
        }

        this.startPromise = this.runStart();
        return this.startPromise;
    }

    /**
     * Idempotent. Cancels the loop, waits a bounded time for the in-flight
     * tick, finalizes the record once and returns it.
     */
    public stop(): Promise<SessionRecord> {
        this.stopPromise ??= this.performStop();
        return this.stopPromise;
    }

    /**
     * Stop if needed, then render the report and hand it to every sink. All
     * sinks are attempted; failures are raised together afterwards.
     */
    public async report(): Promise<SessionReport> {
        if (this.state !== "stopped") {
            await this.stop();
        }

        const report = buildSessionReport(this.getRecord());

        this.logger.info(
            "Session summary",
            { component: COMPONENT, summary: report.summary },
            this.sessionId
        );

        const failures: { sink: string; error: Error }[] = [];
        for (const sink of this.sinks) {
            try {
                await sink.write(report);
                this.logger.info(
                    "Report written",
                    { component: COMPONENT, sink: sink.name },
                    this.sessionId
                );
            } catch (error) {
                const err = toError(error);
                failures.push({ sink: sink.name, error: err });
                this.logger.error(
                    "Report sink failed",
                    {
                        component: COMPONENT,
                        sink: sink.name,
                        error: err.message,
                    },
                    this.sessionId
                );
            }
        }

        if (failures.length > 0) {
            throw new ReportWriteError(
                `Failed to write report to ${failures.map((f) => f.sink).join(", ")}`,
                {
                    operation: "report",
                    component: COMPONENT,
                    correlationId: this.sessionId,
                },
                failures
            );
        }

        return report;
    }

    private async runStart(): Promise<void> {
        this.transition("calibrating");

        const baseline = await this.calibrator.calibrate(this.source, {
            ...this.calibration,
            jointCount: this.thresholds.jointCount,
            readTimeoutMs: this.cfg.readTimeoutMs,
            signal: this.abortController.signal,
            correlationId: this.sessionId,
        });

        // stop() stopped waiting and has already finalized the record
        if (this.state === "stopped") return;

        this.baseline = baseline;
        this.notify("calibrated", baseline);

        // stop() arrived during calibration
        if (this.abortController.signal.aborted) return;

        this.startedAt = Date.now();
        this.transition("monitoring");
        this.loopPromise = this.runLoop();
    }

    private async performStop(): Promise<SessionRecord> {
        if (this.state === "stopped") {
            return this.getRecord();
        }

        this.abortController.abort();

        // Calibration never launches the loop once aborted, so loopPromise
        // is final after the first wait.
        await this.settle(this.startPromise);
        await this.settle(this.loopPromise);

        this.finish("stop requested");
        return this.getRecord();
    }

    private async settle(promise: Promise<void> | null): Promise<void> {
        if (!promise) return;

        const settled = await ProductionUtils.settleWithin(
            promise,
            this.cfg.stopTimeoutMs
        );
        if (!settled) {
            this.logger.warn(
                "In-flight work did not finish before the stop timeout",
                { component: COMPONENT, stopTimeoutMs: this.cfg.stopTimeoutMs },
                this.sessionId
            );
        }
    }

    private finish(reason: string): void {
        if (this.state === "stopped") return;

        this.abortController.abort();

        if (this.startedAt !== null && this.endedAt === null) {
            this.endedAt = Date.now();
            this.durationSec = (this.endedAt - this.startedAt) / 1000;
        }

        this.transition("stopped");

        const record = this.getRecord();
        this.logger.info(
            "Monitoring stopped",
            {
                component: COMPONENT,
                reason,
                durationSec: record.durationSec,
                stats: record.stats,
                circuit: this.breaker.getStats(),
            },
            this.sessionId
        );
        this.notify("stopped", record);
    }

    private transition(to: SessionState): void {
        const from = this.state;
        this.state = to;
        this.logger.debug(
            "Session state change",
            { component: COMPONENT, from, to },
            this.sessionId
        );
        this.notify("stateChange", { from, to } satisfies StateChangeEvent);
    }

    /* ---------------------------------------------------------------------- */
    /*  SAMPLING LOOP                                                         */
    /* ---------------------------------------------------------------------- */

    private async runLoop(): Promise<void> {
        const intervalMs = 1000 / this.thresholds.detectionFrequency;
        const signal = this.abortController.signal;

        this.logger.info(
            "Contact monitoring started",
            {
                component: COMPONENT,
                frequencyHz: this.thresholds.detectionFrequency,
                baselineSource: this.baseline?.source,
            },
            this.sessionId
        );

        try {
            while (!signal.aborted) {
                await this.tick();
                await ProductionUtils.sleep(intervalMs, signal);
            }
        } catch (error) {
            if (this.state === "stopped") {
                this.logger.debug(
                    "Late telemetry failure after stop ignored",
                    { component: COMPONENT, error: toError(error).message },
                    this.sessionId
                );
                return;
            }

            if (error instanceof TelemetryDisconnectedError) {
                this.logger.error(
                    "Telemetry source disconnected, ending monitoring",
                    { component: COMPONENT, error: error.message },
                    this.sessionId
                );
                this.notify("disconnected", error);
                this.finish("telemetry disconnected");
                return;
            }

            this.logger.error(
                "Sampling loop failed",
                {
                    component: COMPONENT,
                    error: toError(error).message,
                    stack: toError(error).stack,
                },
                this.sessionId
            );
            this.finish("sampling loop failed");
        }
    }

    private async tick(): Promise<void> {
        this.stats.ticks++;
        const tick = this.stats.ticks;

        if (!this.breaker.canExecute()) {
            return;
        }

        const snapshot = await ErrorHandler.handleErrorAsync(
            () => readSnapshot(this.source, this.cfg.readTimeoutMs, COMPONENT),
            {
                operation: "readSnapshot",
                component: COMPONENT,
                correlationId: this.sessionId,
                metadata: { tick },
            },
            {
                logger: this.logger,
                logLevel: "warn",
                rethrowIf: (error) => error instanceof TelemetryDisconnectedError,
            }
        );

        // stop() arrived while the read was in flight
        if (this.abortController.signal.aborted) return;

        if (snapshot === null) {
            this.breaker.recordError();
            this.stats.telemetryFailures++;
            this.lastEvent = null;
            this.notify("telemetryError", { tick });
            return;
        }
        this.breaker.recordSuccess();

        const evaluation = this.detector.evaluate(snapshot, this.baseline);
        if (evaluation.kind === "event") {
            this.handleDetection(evaluation.event, Date.now());
        } else {
            this.lastEvent = null;
        }
    }

    private handleDetection(event: DetectionEvent, now: number): void {
        if (this.lastEvent && now - this.lastRecordedAt >= this.cfg.debounceMs) {
            this.lastEvent = null;
        }

        if (this.lastEvent && sameJoints(this.lastEvent, event)) {
            this.stats.debouncedDetections++;
            this.lastEvent = event;
            return;
        }

        this.record(event, now);
    }

    private record(event: DetectionEvent, now: number): void {
        const entry: RecordedEvent = Object.freeze({
            relativeTimeSec:
                this.startedAt === null ? 0 : (now - this.startedAt) / 1000,
            event,
        });

        this.events.push(entry);
        this.stats.totalDetections++;
        if (event.details.detectionMethods.includes("voltage_drop")) {
            this.stats.voltageDetections++;
        }
        if (event.details.detectionMethods.includes("current_spike")) {
            this.stats.currentDetections++;
        }
        this.lastEvent = event;
        this.lastRecordedAt = now;

        this.logger.warn(
            "Contact detected",
            {
                component: COMPONENT,
                index: this.events.length,
                relativeTimeSec: entry.relativeTimeSec,
                method: event.method,
                detectionMethods: event.details.detectionMethods,
                affectedJoints: event.affectedJoints,
                confidence: event.confidence,
                maxVoltageDrop: event.details.maxVoltageDrop,
                maxCurrentSpike: event.details.maxCurrentSpike,
            },
            this.sessionId
        );
        this.notify("contact", entry);
    }

    /**
     * Listener failures are logged and never reach the loop.
     */
    private notify(eventName: string, payload: unknown): void {
        ErrorHandler.handleError(
            () => this.emit(eventName, payload),
            {
                operation: `notify:${eventName}`,
                component: COMPONENT,
                correlationId: this.sessionId,
            },
            { logger: this.logger }
        );
    }

    /* ---------------------------------------------------------------------- */
    /*  READERS                                                               */
    /* ---------------------------------------------------------------------- */

    public getSessionId(): string {
        return this.sessionId;
    }

    public getState(): SessionState {
        return this.state;
    }

    public getBaseline(): Baseline | null {
        return this.baseline;
    }

    public getStats(): DetectionStats {
        return Object.freeze({ ...this.stats });
    }

    public getRecord(): SessionRecord {
        return Object.freeze({
            sessionId: this.sessionId,
            sensitivity: this.sensitivity,
            thresholds: this.thresholds,
            baseline: this.baseline,
            startedAt: this.startedAt,
            endedAt: this.endedAt,
            durationSec: this.durationSec,
            events: Object.freeze([...this.events]),
            stats: this.getStats(),
        });
    }

    /**
     * One out-of-band read compared against the baseline, for operator
     * display. Null when the read fails.
     */
    public async getJointStatus(): Promise<JointStatus | null> {
        const snapshot = await ErrorHandler.handleErrorAsync(
            () => readSnapshot(this.source, this.cfg.readTimeoutMs, COMPONENT),
            {
                operation: "getJointStatus",
                component: COMPONENT,
                correlationId: this.sessionId,
            },
            { logger: this.logger, logLevel: "warn" }
        );

        return snapshot ? this.detector.getJointStatus(snapshot, this.baseline) : null;
    }
}

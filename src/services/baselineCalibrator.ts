// src/services/baselineCalibrator.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";
import {
    readSnapshot,
    type TelemetrySource,
} from "../clients/telemetrySource.js";
import type { Baseline, TelemetrySnapshot } from "../types/telemetryTypes.js";
import { TelemetryDisconnectedError } from "../utils/errorHandler.js";
import { ProductionUtils } from "../utils/productionUtils.js";

export interface CalibrationOptions {
    /** Snapshots to draw (default: 10) */
    sampleCount?: number;
    /** Delay between snapshots in ms (default: 100) */
    sampleIntervalMs?: number;
    /** Size of the fallback baseline (default: 6) */
    jointCount?: number;
    /** Fallback voltage per joint (default: 24.0) */
    defaultVoltage?: number;
    /** Fallback current per joint (default: 0.5) */
    defaultCurrent?: number;
    /** Per-read timeout in ms (default: 250) */
    readTimeoutMs?: number;
    /** Ends sampling early; whatever was collected is averaged */
    signal?: AbortSignal;
    correlationId?: string;
}

const COMPONENT = "BaselineCalibrator";

/**
 * Elementwise arithmetic mean of equal-length vectors.
 */
export function elementwiseMean(vectors: readonly (readonly number[])[]): number[] {
    const first = vectors[0];
    if (!first) return [];

    const sums = new Array<number>(first.length).fill(0);
    for (const vector of vectors) {
        for (let j = 0; j < sums.length; j++) {
            sums[j] += vector[j] ?? 0;
        }
    }
    return sums.map((sum) => sum / vectors.length);
}

export function createDefaultBaseline(
    jointCount: number,
    defaultVoltage: number,
    defaultCurrent: number,
    establishedAt = Date.now()
): Baseline {
    return Object.freeze({
        voltages: Object.freeze(new Array<number>(jointCount).fill(defaultVoltage)),
        currents: Object.freeze(new Array<number>(jointCount).fill(defaultCurrent)),
        sampleCount: 0,
        source: "default",
        establishedAt,
    });
}

/**
 * Reduce calibration samples to a Baseline. Samples whose joint count differs
 * from the first one are dropped. No samples yields the default baseline.
 */
export function computeBaseline(
    samples: readonly TelemetrySnapshot[],
    fallback: { jointCount: number; defaultVoltage: number; defaultCurrent: number },
    establishedAt = Date.now()
): Baseline {
    const first = samples[0];
    if (!first) {
        return createDefaultBaseline(
            fallback.jointCount,
            fallback.defaultVoltage,
            fallback.defaultCurrent,
            establishedAt
        );
    }

    const joints = first.voltages.length;
    const usable = samples.filter(
        (s) => s.voltages.length === joints && s.currents.length === joints
    );

    return Object.freeze({
        voltages: Object.freeze(elementwiseMean(usable.map((s) => s.voltages))),
        currents: Object.freeze(elementwiseMean(usable.map((s) => s.currents))),
        sampleCount: usable.length,
        source: "calibrated",
        establishedAt,
    });
}

/**
 * Draws reference samples before monitoring starts and averages them into a
 * per-joint baseline. Never throws: unusable samples are skipped and an empty
 * run falls back to the configured defaults.
 */
export class BaselineCalibrator {
    constructor(private readonly logger: ILogger) {}

    public async calibrate(
        source: TelemetrySource,
        options: CalibrationOptions = {}
    ): Promise<Baseline> {
        const sampleCount = options.sampleCount ?? 10;
        const sampleIntervalMs = options.sampleIntervalMs ?? 100;
        const readTimeoutMs = options.readTimeoutMs ?? 250;
        const fallback = {
            jointCount: options.jointCount ?? 6,
            defaultVoltage: options.defaultVoltage ?? 24.0,
            defaultCurrent: options.defaultCurrent ?? 0.5,
        };
        const { signal, correlationId } = options;

        this.logger.info(
            "Establishing electrical baseline",
            { component: COMPONENT, sampleCount, sampleIntervalMs },
            correlationId
        );

        const collected: TelemetrySnapshot[] = [];

        for (let i = 0; i < sampleCount; i++) {
            if (signal?.aborted) {
                this.logger.warn(
                    "Calibration interrupted",
                    { component: COMPONENT, collected: collected.length },
                    correlationId
                );
                break;
            }

            if (i > 0) {
                await ProductionUtils.sleep(sampleIntervalMs, signal);
                if (signal?.aborted) continue;
            }

            try {
                const snapshot = await readSnapshot(source, readTimeoutMs, COMPONENT);
                const expected = collected[0]?.voltages.length;

                if (
                    snapshot.voltages.length !== snapshot.currents.length ||
                    (expected !== undefined && snapshot.voltages.length !== expected)
                ) {
                    this.logger.warn(
                        "Discarding calibration sample with mismatched joint count",
                        {
                            component: COMPONENT,
                            sample: i + 1,
                            voltages: snapshot.voltages.length,
                            currents: snapshot.currents.length,
                            expected,
                        },
                        correlationId
                    );
                    continue;
                }

                collected.push(snapshot);
                this.logger.debug(
                    "Calibration sample",
                    {
                        component: COMPONENT,
                        sample: i + 1,
                        of: sampleCount,
                        voltages: snapshot.voltages,
                    },
                    correlationId
                );
            } catch (error) {
                if (error instanceof TelemetryDisconnectedError) {
                    this.logger.error(
                        "Telemetry disconnected during calibration",
                        { component: COMPONENT, collected: collected.length },
                        correlationId
                    );
                    break;
                }
                this.logger.warn(
                    "Calibration sample skipped",
                    {
                        component: COMPONENT,
                        sample: i + 1,
                        error: error instanceof Error ? error.message : String(error),
                    },
                    correlationId
                );
            }
        }

        const baseline = computeBaseline(collected, fallback);

        if (baseline.source === "default") {
            this.logger.warn(
                "No usable calibration samples, using default baseline",
                {
                    component: COMPONENT,
                    jointCount: fallback.jointCount,
                    defaultVoltage: fallback.defaultVoltage,
                    defaultCurrent: fallback.defaultCurrent,
                },
                correlationId
            );
        } else {
            this.logger.info(
                "Baseline established",
                {
                    component: COMPONENT,
                    samples: baseline.sampleCount,
                    voltages: baseline.voltages,
                    currents: baseline.currents,
                },
                correlationId
            );
        }

        return baseline;
    }
}

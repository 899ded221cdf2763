// src/clients/telemetrySource.ts
import { z } from "zod";
import type { TelemetrySnapshot } from "../types/telemetryTypes.js";
import {
    TelemetryDisconnectedError,
    TelemetryReadError,
    toError,
} from "../utils/errorHandler.js";
import { ProductionUtils, TimeoutError } from "../utils/productionUtils.js";

/**
 * Payload a source may hand back. Arm controllers report per-joint vectors
 * as `joint_voltage` / `joint_current`; in-process sources may use the
 * normalized field names directly.
 */
export type RawTelemetrySample = Readonly<Record<string, unknown>>;

/**
 * Anything that can produce one telemetry sample on demand. Returning
 * null/undefined means "no data this tick". Throw TelemetryDisconnectedError
 * when the link is gone for good.
 */
export interface TelemetrySource {
    getSnapshot(): Promise<RawTelemetrySample | null | undefined>;
    close?(): Promise<void>;
}

/**
 * Driver surface of the arm. Motion is not used by contact detection; only
 * the telemetry source is.
 */
export interface ArmDriver {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    startSystem(): Promise<void>;
    stopSystem(): Promise<void>;
    getTelemetrySource(): TelemetrySource;
}

const finiteVector = z.array(z.number().finite()).min(1);

const DriverSampleSchema = z.object({
    joint_voltage: finiteVector,
    joint_current: finiteVector,
    timestamp: z.number().finite().optional(),
});

const NormalizedSampleSchema = z.object({
    voltages: finiteVector,
    currents: finiteVector,
    timestamp: z.number().finite().optional(),
});

export type NormalizeResult =
    | { ok: true; snapshot: TelemetrySnapshot }
    | { ok: false; reason: string };

/**
 * Validate a raw sample and turn it into a frozen TelemetrySnapshot.
 */
export function normalizeSample(raw: unknown, now = Date.now()): NormalizeResult {
    if (raw === null || raw === undefined) {
        return { ok: false, reason: "no data returned" };
    }

    const driver = DriverSampleSchema.safeParse(raw);
    if (driver.success) {
        return {
            ok: true,
            snapshot: freezeSnapshot(
                driver.data.joint_voltage,
                driver.data.joint_current,
                driver.data.timestamp ?? now
            ),
        };
    }

    const normalized = NormalizedSampleSchema.safeParse(raw);
    if (normalized.success) {
        return {
            ok: true,
            snapshot: freezeSnapshot(
                normalized.data.voltages,
                normalized.data.currents,
                normalized.data.timestamp ?? now
            ),
        };
    }

    const issue = driver.error.issues[0];
    return {
        ok: false,
        reason: issue
            ? `${issue.path.join(".") || "sample"}: ${issue.message}`
            : "malformed sample",
    };
}

export function freezeSnapshot(
    voltages: readonly number[],
    currents: readonly number[],
    timestamp: number
): TelemetrySnapshot {
    return Object.freeze({
        timestamp,
        voltages: Object.freeze([...voltages]),
        currents: Object.freeze([...currents]),
    });
}

/**
 * One bounded read: the source call is raced against `timeoutMs` and the
 * payload validated. Anything short of a usable snapshot becomes a
 * TelemetryReadError, except TelemetryDisconnectedError which propagates.
 */
export async function readSnapshot(
    source: TelemetrySource,
    timeoutMs: number,
    component = "TelemetrySource"
): Promise<TelemetrySnapshot> {
    let raw: RawTelemetrySample | null | undefined;

    try {
        raw = await ProductionUtils.withTimeout(
            source.getSnapshot(),
            timeoutMs,
            "getSnapshot"
        );
    } catch (error) {
        if (error instanceof TelemetryDisconnectedError) {
            throw error;
        }
        const err = toError(error);
        throw new TelemetryReadError(
            error instanceof TimeoutError
                ? `Telemetry read timed out after ${timeoutMs} ms`
                : `Telemetry read failed: ${err.message}`,
            { operation: "getSnapshot", component },
            err
        );
    }

    const result = normalizeSample(raw);
    if (!result.ok) {
        throw new TelemetryReadError(`Unusable telemetry: ${result.reason}`, {
            operation: "normalizeSample",
            component,
        });
    }

    return result.snapshot;
}

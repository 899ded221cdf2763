// src/clients/simulatedArm.ts

import type { SimulatorConfig } from "../core/config.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { TelemetryDisconnectedError } from "../utils/errorHandler.js";
import type {
    ArmDriver,
    RawTelemetrySample,
    TelemetrySource,
} from "./telemetrySource.js";

/**
 * mulberry32: small seeded PRNG so simulated runs are reproducible.
 */
export function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export interface SimulatedArmOptions {
    jointCount: number;
    /** Clock in ms epoch; injectable for tests */
    now?: () => number;
}

/**
 * In-process stand-in for an arm controller.
 *
 * Produces a steady per-joint electrical profile with uniform noise. Scripted
 * contacts (relative to startSystem) sag the voltage and raise the current on
 * one joint for their duration. `dropoutRate` makes some reads come back empty.
 */
export class SimulatedArm implements ArmDriver, TelemetrySource {
    private readonly random: () => number;
    private readonly now: () => number;
    private readonly jointCount: number;
    private connected = false;
    private running = false;
    private systemStartedAt = 0;
    private samplesServed = 0;

    constructor(
        private readonly config: SimulatorConfig,
        private readonly logger: ILogger,
        options: SimulatedArmOptions
    ) {
        this.random = createRandom(config.seed);
        this.now = options.now ?? Date.now;
        this.jointCount = options.jointCount;
    }

    public async connect(): Promise<void> {
        this.connected = true;
        this.logger.info("Simulated arm connected", {
            component: "SimulatedArm",
            jointCount: this.jointCount,
            scriptedContacts: this.config.contacts.length,
        });
    }

    public async disconnect(): Promise<void> {
        this.connected = false;
        this.running = false;
        this.logger.info("Simulated arm disconnected", {
            component: "SimulatedArm",
            samplesServed: this.samplesServed,
        });
    }

    public async startSystem(): Promise<void> {
        if (!this.connected) {
            throw new TelemetryDisconnectedError("Arm not connected");
        }
        this.running = true;
        this.systemStartedAt = this.now();
    }

    public async stopSystem(): Promise<void> {
        this.running = false;
    }

    public getTelemetrySource(): TelemetrySource {
        return this;
    }

    public async getSnapshot(): Promise<RawTelemetrySample | null> {
        if (!this.connected) {
            throw new TelemetryDisconnectedError();
        }

        // Always draw the same number of values per read so the sequence
        // does not depend on which reads drop out.
        const dropout = this.random() < this.config.dropoutRate;
        const timestamp = this.now();
        const sample = this.generate(timestamp);

        if (dropout) {
            return null;
        }

        this.samplesServed++;
        return sample;
    }

    public async close(): Promise<void> {
        await this.disconnect();
    }

    private generate(timestamp: number): RawTelemetrySample {
        const elapsed = this.running ? timestamp - this.systemStartedAt : -1;
        const voltages: number[] = [];
        const currents: number[] = [];

        for (let joint = 0; joint < this.jointCount; joint++) {
            voltages.push(
                this.config.nominalVoltage +
                    (this.random() * 2 - 1) * this.config.voltageNoise
            );
            currents.push(
                this.config.nominalCurrent +
                    (this.random() * 2 - 1) * this.config.currentNoise
            );
        }

        for (const contact of this.config.contacts) {
            const active =
                elapsed >= contact.atMs &&
                elapsed < contact.atMs + contact.durationMs;
            if (!active || contact.joint >= this.jointCount) continue;

            voltages[contact.joint] -= contact.voltageDrop;
            currents[contact.joint] += contact.currentIncrease;
        }

        return {
            joint_voltage: voltages,
            joint_current: currents,
            timestamp,
        };
    }
}

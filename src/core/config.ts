// src/core/config.ts
import dotenv from "dotenv";
import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import type { Sensitivity, Thresholds } from "../types/telemetryTypes.js";
import { ConfigError } from "../utils/errorHandler.js";

export const SensitivitySchema = z.enum(["high", "normal", "low"]);

export const ThresholdsSchema = z
    .object({
        voltageDropThreshold: z.number().positive().max(48), // volts
        currentSpikeThreshold: z.number().positive().max(20), // amps
        powerChangeThreshold: z.number().nonnegative().max(500), // watts
        detectionFrequency: z.number().min(1).max(200), // Hz
        confidenceThreshold: z.number().min(0).max(1),
        jointCount: z.number().int().min(1).max(32),
    })
    .strict();

export const CalibrationSchema = z
    .object({
        sampleCount: z.number().int().min(1).max(1000).default(10),
        sampleIntervalMs: z.number().int().min(0).max(10000).default(100),
        defaultVoltage: z.number().positive().default(24.0),
        defaultCurrent: z.number().nonnegative().default(0.5),
    })
    .strict();

export const SessionSchema = z
    .object({
        debounceMs: z.number().int().min(0).max(60000).default(500),
        readTimeoutMs: z.number().int().min(1).max(10000).default(250),
        stopTimeoutMs: z.number().int().min(1).max(60000).default(2000),
        failureThreshold: z.number().int().min(1).max(1000).default(5),
        failureCooldownMs: z.number().int().min(0).max(600000).default(1000),
    })
    .strict()
    // Reads must time out before stop() stops waiting for them.
    .refine((session) => session.readTimeoutMs < session.stopTimeoutMs, {
        message: "must be shorter than stopTimeoutMs",
        path: ["readTimeoutMs"],
    });

export const ReportSchema = z
    .object({
        directory: z.string().min(1).default("./reports"),
        /** null disables the SQLite session store */
        dbPath: z.string().min(1).nullable().default("./storage/sessions.db"),
    })
    .strict();

export const ScriptedContactSchema = z
    .object({
        atMs: z.number().int().nonnegative(),
        durationMs: z.number().int().positive(),
        joint: z.number().int().nonnegative(),
        voltageDrop: z.number().nonnegative().default(0),
        currentIncrease: z.number().nonnegative().default(0),
    })
    .strict();

export const SimulatorSchema = z
    .object({
        nominalVoltage: z.number().positive().default(24.0),
        nominalCurrent: z.number().nonnegative().default(0.5),
        voltageNoise: z.number().nonnegative().default(0.1),
        currentNoise: z.number().nonnegative().default(0.02),
        dropoutRate: z.number().min(0).max(1).default(0),
        seed: z.number().int().default(1),
        contacts: z.array(ScriptedContactSchema).default([]),
        /** Stop and report automatically after this long */
        runForMs: z.number().int().positive().optional(),
    })
    .strict();

export const LoggingSchema = z
    .object({
        pretty: z.boolean().default(false),
        level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    })
    .strict();

export const MonitorConfigSchema = z
    .object({
        sensitivity: SensitivitySchema.default("normal"),
        /** Individual overrides on top of the sensitivity preset */
        thresholds: ThresholdsSchema.partial().default({}),
        calibration: CalibrationSchema.default({}),
        session: SessionSchema.default({}),
        report: ReportSchema.default({}),
        simulator: SimulatorSchema.default({}),
        logging: LoggingSchema.default({}),
    })
    .strict();

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;
export type CalibrationConfig = z.infer<typeof CalibrationSchema>;
export type SessionConfig = z.infer<typeof SessionSchema>;
export type SimulatorConfig = z.infer<typeof SimulatorSchema>;
export type ScriptedContact = z.infer<typeof ScriptedContactSchema>;

// Sensitivity presets. `high` flags smaller deviations at a lower confidence
// bar; `low` needs larger deviations and more confidence.
export const SENSITIVITY_PRESETS: Readonly<Record<Sensitivity, Thresholds>> =
    Object.freeze({
        high: Object.freeze({
            voltageDropThreshold: 1.0,
            currentSpikeThreshold: 0.3,
            powerChangeThreshold: 5.0,
            detectionFrequency: 20.0,
            confidenceThreshold: 0.6,
            jointCount: 6,
        }),
        normal: Object.freeze({
            voltageDropThreshold: 2.0,
            currentSpikeThreshold: 0.6,
            powerChangeThreshold: 10.0,
            detectionFrequency: 15.0,
            confidenceThreshold: 0.75,
            jointCount: 6,
        }),
        low: Object.freeze({
            voltageDropThreshold: 3.0,
            currentSpikeThreshold: 1.0,
            powerChangeThreshold: 15.0,
            detectionFrequency: 10.0,
            confidenceThreshold: 0.85,
            jointCount: 6,
        }),
    });

/**
 * Preset thresholds for a sensitivity name. Unknown names fall back to
 * `normal`.
 */
export function createThresholds(sensitivity: string = "normal"): Thresholds {
    const parsed = SensitivitySchema.safeParse(sensitivity.trim().toLowerCase());
    return SENSITIVITY_PRESETS[parsed.success ? parsed.data : "normal"];
}

export function resolveThresholds(
    sensitivity: Sensitivity,
    overrides: Partial<Thresholds> = {}
): Thresholds {
    const merged = ThresholdsSchema.parse({
        ...SENSITIVITY_PRESETS[sensitivity],
        ...overrides,
    });
    return Object.freeze(merged);
}

export interface LoadConfigOptions {
    /** Defaults to ./config.json in the working directory */
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    /** Populate process.env from .env first */
    loadDotEnv?: boolean;
}

function readConfigFile(configPath: string): unknown {
    if (!existsSync(configPath)) {
        return {};
    }

    try {
        return JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
        throw new ConfigError(
            `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function applyEnvOverrides(
    raw: unknown,
    env: NodeJS.ProcessEnv
): Record<string, unknown> {
    const base = isRecord(raw) ? raw : {};
    const section = (key: string): Record<string, unknown> => {
        const value = base[key];
        return isRecord(value) ? { ...value } : {};
    };

    const report = section("report");
    const logging = section("logging");
    const merged: Record<string, unknown> = { ...base };

    if (env.CONTACT_SENSITIVITY) {
        // Unknown names resolve to the normal preset, as in createThresholds.
        const parsed = SensitivitySchema.safeParse(
            env.CONTACT_SENSITIVITY.trim().toLowerCase()
        );
        merged.sensitivity = parsed.success ? parsed.data : "normal";
    }
    if (env.CONTACT_REPORT_DIR) {
        report.directory = env.CONTACT_REPORT_DIR;
    }
    if (env.CONTACT_DB_PATH !== undefined) {
        report.dbPath = env.CONTACT_DB_PATH === "" ? null : env.CONTACT_DB_PATH;
    }
    if (env.LOG_PRETTY !== undefined) {
        logging.pretty = env.LOG_PRETTY === "true";
    }
    if (env.LOG_LEVEL) {
        logging.level = env.LOG_LEVEL.trim().toLowerCase();
    }

    merged.report = report;
    merged.logging = logging;
    return merged;
}

/**
 * Load config.json (optional), apply environment overrides and validate.
 * Throws ConfigError listing every invalid field.
 */
export function loadConfig(options: LoadConfigOptions = {}): MonitorConfig {
    if (options.loadDotEnv ?? true) {
        dotenv.config();
    }

    const env = options.env ?? process.env;
    const configPath = resolve(
        process.cwd(),
        options.configPath ?? env.CONTACT_CONFIG ?? "config.json"
    );

    const raw = applyEnvOverrides(readConfigFile(configPath), env);
    const result = MonitorConfigSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.errors.map(
            (err) => `${err.path.join(".") || "(root)"}: ${err.message}`
        );
        throw new ConfigError(
            `Invalid configuration in ${configPath}`,
            issues
        );
    }

    return result.data;
}

/**
 * Thresholds in effect for a loaded configuration.
 */
export function thresholdsFor(config: MonitorConfig): Thresholds {
    return resolveThresholds(config.sensitivity, config.thresholds);
}

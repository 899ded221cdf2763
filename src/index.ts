// src/index.ts
import { loadConfig } from "./core/config.js";
import { createDependencies, type Dependencies } from "./core/dependencies.js";
import {
    ConfigError,
    ReportWriteError,
    toError,
} from "./utils/errorHandler.js";

export {
    createThresholds,
    loadConfig,
    resolveThresholds,
    SENSITIVITY_PRESETS,
    thresholdsFor,
} from "./core/config.js";
export type { MonitorConfig } from "./core/config.js";
export { createDependencies } from "./core/dependencies.js";
export type { Dependencies } from "./core/dependencies.js";
export {
    normalizeSample,
    readSnapshot,
} from "./clients/telemetrySource.js";
export type {
    ArmDriver,
    RawTelemetrySample,
    TelemetrySource,
} from "./clients/telemetrySource.js";
export { SimulatedArm } from "./clients/simulatedArm.js";
export { Logger } from "./infrastructure/logger.js";
export type { ILogger } from "./infrastructure/loggerInterface.js";
export { SqliteSessionStore } from "./infrastructure/sessionStore.js";
export {
    AnomalyDetector,
    detectAnomaly,
    describeJointStatus,
} from "./services/anomalyDetector.js";
export { BaselineCalibrator } from "./services/baselineCalibrator.js";
export { MonitoringSession } from "./services/monitoringSession.js";
export { buildSessionReport } from "./services/sessionReporter.js";
export { JsonReportWriter } from "./services/reportWriter.js";
export {
    ConfigError,
    ReportWriteError,
    TelemetryDisconnectedError,
    TelemetryReadError,
} from "./utils/errorHandler.js";
export type * from "./types/telemetryTypes.js";
export type * from "./types/sessionTypes.js";

/**
 * Stop monitoring, write the report and release the arm. Resolves to the
 * process exit code.
 */
export async function shutdown(
    dependencies: Dependencies,
    reason: string
): Promise<number> {
    const { logger, session, arm, sessionStore } = dependencies;
    let exitCode = 0;

    logger.info("Shutting down", { component: "Main", reason });

    try {
        await session.report();
    } catch (error) {
        exitCode = 1;
        logger.error("Report could not be written", {
            component: "Main",
            error: toError(error).message,
            failedSinks:
                error instanceof ReportWriteError
                    ? error.failures.map((f) => f.sink)
                    : undefined,
        });
    }

    try {
        await arm.stopSystem();
        await arm.disconnect();
    } catch (error) {
        exitCode = 1;
        logger.error("Failed to release the arm", {
            component: "Main",
            error: toError(error).message,
        });
    }

    sessionStore?.close();
    logger.removeCorrelationId(session.getSessionId());
    return exitCode;
}

/**
 * Main entry point: monitor the (simulated) arm until interrupted, the run
 * time elapses or the telemetry link drops.
 */
export async function main(): Promise<void> {
    try {
        const config = loadConfig();
        const dependencies = createDependencies(config);
        const { arm, session } = dependencies;

        let shuttingDown: Promise<void> | null = null;
        const stopAndExit = (reason: string): Promise<void> => {
            shuttingDown ??= shutdown(dependencies, reason).then((code) =>
                process.exit(code)
            );
            return shuttingDown;
        };

        process.on("SIGINT", () => {
            void stopAndExit("SIGINT");
        });
        process.on("SIGTERM", () => {
            void stopAndExit("SIGTERM");
        });
        session.on("disconnected", () => {
            void stopAndExit("telemetry disconnected");
        });

        await arm.connect();
        await arm.startSystem();
        await session.start();

        const { runForMs } = config.simulator;
        if (runForMs !== undefined) {
            setTimeout(() => {
                void stopAndExit("run time elapsed");
            }, runForMs);
        }
    } catch (error: unknown) {
        const err = toError(error);
        // Logger may not exist yet when configuration fails.
        console.error("Failed to start contact monitor:", err.message);
        if (error instanceof ConfigError) {
            for (const issue of error.issues) console.error(`  ${issue}`);
        } else {
            console.error(err.stack);
        }
        process.exit(1);
    }
}

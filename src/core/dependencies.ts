// src/core/dependencies.ts

import type { ILogger } from "../infrastructure/loggerInterface.js";
import { Logger } from "../infrastructure/logger.js";
import { getDB } from "../infrastructure/db.js";
import { SqliteSessionStore } from "../infrastructure/sessionStore.js";
import { SimulatedArm } from "../clients/simulatedArm.js";
import { MonitoringSession } from "../services/monitoringSession.js";
import { JsonReportWriter } from "../services/reportWriter.js";
import type { ReportSink } from "../types/sessionTypes.js";
import { thresholdsFor, type MonitorConfig } from "./config.js";

/**
 * Application dependencies interface
 */
export interface Dependencies {
    config: MonitorConfig;

    // Infrastructure
    logger: ILogger;
    sessionStore: SqliteSessionStore | null;

    // Arm
    arm: SimulatedArm;

    // Services
    reportWriter: JsonReportWriter;
    session: MonitoringSession;
}

/**
 * Factory function to create dependencies
 */
export function createDependencies(
    config: MonitorConfig,
    logger: ILogger = new Logger({
        level: config.logging.level,
        pretty: config.logging.pretty,
    })
): Dependencies {
    const thresholds = thresholdsFor(config);

    const sessionStore =
        config.report.dbPath === null
            ? null
            : new SqliteSessionStore(getDB(config.report.dbPath), logger);
    const reportWriter = new JsonReportWriter(config.report.directory, logger);

    const sinks: ReportSink[] = [reportWriter];
    if (sessionStore) {
        sinks.push(sessionStore);
    }

    const arm = new SimulatedArm(config.simulator, logger, {
        jointCount: thresholds.jointCount,
    });

    const session = new MonitoringSession({
        source: arm.getTelemetrySource(),
        thresholds,
        sensitivity: config.sensitivity,
        logger,
        calibration: config.calibration,
        session: config.session,
        sinks,
    });

    return { config, logger, sessionStore, arm, reportWriter, session };
}

// src/infrastructure/sessionStore.ts
import type { Database, Statement } from "better-sqlite3";
import type { ILogger } from "./loggerInterface.js";
import { runMigrations } from "./migrate.js";
import { withBusyRetries } from "./sqliteUtils.js";
import type { ReportSink, SessionReport } from "../types/sessionTypes.js";
import type { DetectionMethod } from "../types/telemetryTypes.js";

/**
 * Shape of the rows stored in the sessions table.
 */
interface SessionRow {
    sessionId: string;
    sensitivity: string;
    startTime: string | null;
    endTime: string | null;
    durationSec: number;
    collisionCount: number;
    statsJson: string;
    thresholdsJson: string;
    baselineJson: string | null;
    savedAt: number;
}

interface EventRow {
    sessionId: string;
    eventIndex: number;
    relativeTimeSec: number;
    timestamp: string;
    method: string;
    detectionMethods: string;
    confidence: number;
    affectedJoints: string;
    eventJson: string;
}

export interface StoredSessionSummary {
    sessionId: string;
    sensitivity: string;
    startTime: string | null;
    endTime: string | null;
    durationSec: number;
    collisionCount: number;
    savedAt: number;
}

export interface StoredEvent {
    eventIndex: number;
    relativeTimeSec: number;
    timestamp: string;
    method: DetectionMethod;
    confidence: number;
    affectedJoints: number[];
}

function parseNumberArray(json: string): number[] {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed)
        ? parsed.filter((v): v is number => typeof v === "number")
        : [];
}

function toMethod(value: string): DetectionMethod {
    return value === "current_spike" ? "current_spike" : "voltage_drop";
}

/**
 * Report sink persisting finished sessions to SQLite. Writing the same session
 * twice replaces the earlier copy.
 */
export class SqliteSessionStore implements ReportSink {
    public readonly name = "sqlite";

    private readonly insertSession: Statement<[SessionRow]>;
    private readonly deleteEvents: Statement<[{ sessionId: string }]>;
    private readonly insertEvent: Statement<[EventRow]>;
    private readonly selectSessions: Statement<[{ limit: number }], SessionRow>;
    private readonly selectEvents: Statement<[{ sessionId: string }], EventRow>;
    private readonly saveReport: (report: SessionReport, savedAt: number) => void;

    constructor(
        private readonly db: Database,
        private readonly logger: ILogger
    ) {
        runMigrations(db);

        this.insertSession = db.prepare<[SessionRow]>(`
            INSERT OR REPLACE INTO sessions (
                sessionId, sensitivity, startTime, endTime, durationSec,
                collisionCount, statsJson, thresholdsJson, baselineJson, savedAt
            ) VALUES (
                @sessionId, @sensitivity, @startTime, @endTime, @durationSec,
                @collisionCount, @statsJson, @thresholdsJson, @baselineJson, @savedAt
            )
        `);

        this.deleteEvents = db.prepare<[{ sessionId: string }]>(
            `DELETE FROM detection_events WHERE sessionId = @sessionId`
        );

        this.insertEvent = db.prepare<[EventRow]>(`
            INSERT INTO detection_events (
                sessionId, eventIndex, relativeTimeSec, timestamp, method,
                detectionMethods, confidence, affectedJoints, eventJson
            ) VALUES (
                @sessionId, @eventIndex, @relativeTimeSec, @timestamp, @method,
                @detectionMethods, @confidence, @affectedJoints, @eventJson
            )
        `);

        this.selectSessions = db.prepare<[{ limit: number }], SessionRow>(`
            SELECT * FROM sessions
            ORDER BY savedAt DESC, sessionId DESC
            LIMIT @limit
        `);

        this.selectEvents = db.prepare<[{ sessionId: string }], EventRow>(`
            SELECT * FROM detection_events
            WHERE sessionId = @sessionId
            ORDER BY eventIndex ASC
        `);

        this.saveReport = db.transaction(
            (report: SessionReport, savedAt: number) => {
                this.insertSession.run({
                    sessionId: report.sessionId,
                    sensitivity: report.sensitivity,
                    startTime: report.startTime,
                    endTime: report.endTime,
                    durationSec: report.durationSec,
                    collisionCount: report.collisionCount,
                    statsJson: JSON.stringify(report.stats),
                    thresholdsJson: JSON.stringify(report.thresholds),
                    baselineJson: report.baseline
                        ? JSON.stringify(report.baseline)
                        : null,
                    savedAt,
                });
                this.deleteEvents.run({ sessionId: report.sessionId });
                for (const event of report.events) {
                    this.insertEvent.run({
                        sessionId: report.sessionId,
                        eventIndex: event.index,
                        relativeTimeSec: event.relativeTimeSec,
                        timestamp: event.timestamp,
                        method: event.method,
                        detectionMethods: JSON.stringify(event.detectionMethods),
                        confidence: event.confidence,
                        affectedJoints: JSON.stringify(event.affectedJoints),
                        eventJson: JSON.stringify(event),
                    });
                }
            }
        );
    }

    public async write(report: SessionReport): Promise<void> {
        withBusyRetries(() => this.saveReport(report, Date.now()), {
            logger: this.logger,
            operation: "saveReport",
        });
        this.logger.debug("Session persisted", {
            component: "SqliteSessionStore",
            sessionId: report.sessionId,
            events: report.events.length,
        });
    }

    /**
     * Most recently saved sessions first.
     */
    public listSessions(limit = 20): StoredSessionSummary[] {
        return this.selectSessions.all({ limit }).map((row) => ({
            sessionId: row.sessionId,
            sensitivity: row.sensitivity,
            startTime: row.startTime,
            endTime: row.endTime,
            durationSec: row.durationSec,
            collisionCount: row.collisionCount,
            savedAt: row.savedAt,
        }));
    }

    public getEvents(sessionId: string): StoredEvent[] {
        return this.selectEvents.all({ sessionId }).map((row) => ({
            eventIndex: row.eventIndex,
            relativeTimeSec: row.relativeTimeSec,
            timestamp: row.timestamp,
            method: toMethod(row.method),
            confidence: row.confidence,
            affectedJoints: parseNumberArray(row.affectedJoints),
        }));
    }

    public close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }
}

// src/infrastructure/migrate.ts
import type { Database } from "better-sqlite3";

export function runMigrations(db: Pick<Database, "exec">): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
          sessionId      TEXT PRIMARY KEY,
          sensitivity    TEXT NOT NULL,
          startTime      TEXT,
          endTime        TEXT,
          durationSec    REAL NOT NULL,
          collisionCount INTEGER NOT NULL,
          statsJson      TEXT NOT NULL,
          thresholdsJson TEXT NOT NULL,
          baselineJson   TEXT,
          savedAt        INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_sessions_saved
          ON sessions (savedAt DESC);

      CREATE TABLE IF NOT EXISTS detection_events (
          sessionId        TEXT NOT NULL
              REFERENCES sessions (sessionId) ON DELETE CASCADE,
          eventIndex       INTEGER NOT NULL,
          relativeTimeSec  REAL NOT NULL,
          timestamp        TEXT NOT NULL,
          method           TEXT NOT NULL,
          detectionMethods TEXT NOT NULL,
          confidence       REAL NOT NULL,
          affectedJoints   TEXT NOT NULL,
          eventJson        TEXT NOT NULL,
          PRIMARY KEY (sessionId, eventIndex)
      );
  `);
}

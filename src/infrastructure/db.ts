// src/infrastructure/db.ts
import BetterSqlite3 from "better-sqlite3";
import type { Database } from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

/**
 * One connection per database file for the lifetime of the process.
 */
const connections = new Map<string, Database>();

/**
 * Open (or reuse) the database at `dbPath` with production pragmas.
 * ":memory:" always yields a fresh connection. A cached handle that its owner
 * has closed is replaced on the next call.
 */
export function getDB(dbPath = "./storage/sessions.db"): Database {
    const existing = connections.get(dbPath);
    if (existing?.open) {
        return existing;
    }

    if (dbPath !== ":memory:") {
        mkdirSync(dirname(dbPath), { recursive: true });
    }

    const db = new BetterSqlite3(dbPath);
    db.pragma("journal_mode = WAL"); // Write-Ahead Logging for performance
    db.pragma("synchronous = NORMAL");
    db.pragma("busy_timeout = 5000");
    db.pragma("foreign_keys = ON");

    if (dbPath !== ":memory:") {
        connections.set(dbPath, db);
    }
    return db;
}

// src/infrastructure/sqliteUtils.ts
import type { ILogger } from "./loggerInterface.js";

const RETRYABLE_CODES = new Set(["SQLITE_BUSY", "SQLITE_BUSY_SNAPSHOT", "SQLITE_LOCKED"]);

/**
 * Block the calling thread for `ms` via Atomics.wait. better-sqlite3 calls
 * are synchronous, so the retry has to be too.
 */
export function sleepSync(ms: number): void {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export function isBusyError(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        typeof error.code === "string" &&
        RETRYABLE_CODES.has(error.code)
    );
}

export interface BusyRetryOptions {
    /** Retries after the first attempt */
    retries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    logger?: ILogger;
    operation?: string;
}

/**
 * Run a database call, retrying with doubling (capped) delays while SQLite
 * reports the file busy or locked. Any other error propagates at once.
 */
export function withBusyRetries<T>(
    fn: () => T,
    options: BusyRetryOptions = {}
): T {
    const {
        retries = 5,
        initialDelayMs = 50,
        maxDelayMs = 1000,
        logger,
        operation = "sqlite",
    } = options;

    let delayMs = initialDelayMs;
    for (let attempt = 1; ; attempt++) {
        try {
            return fn();
        } catch (error) {
            if (!isBusyError(error) || attempt > retries) {
                throw error;
            }
            logger?.warn("Database busy, retrying", {
                component: "SqliteRetry",
                operation,
                attempt,
                delayMs,
            });
            sleepSync(delayMs);
            delayMs = Math.min(delayMs * 2, maxDelayMs);
        }
    }
}

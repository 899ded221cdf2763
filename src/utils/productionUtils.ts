// src/utils/productionUtils.ts

export class TimeoutError extends Error {
    constructor(
        message: string,
        public readonly timeoutMs: number
    ) {
        super(message);
        this.name = "TimeoutError";
    }
}

export class ProductionUtils {
    /**
     * Async sleep. Resolves early (never rejects) when the signal aborts.
     */
    public static sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise((resolve) => {
            if (signal?.aborted) {
                resolve();
                return;
            }

            const onAbort = (): void => {
                clearTimeout(timer);
                resolve();
            };
            const timer = setTimeout(() => {
                signal?.removeEventListener("abort", onAbort);
                resolve();
            }, Math.max(0, ms));

            signal?.addEventListener("abort", onAbort, { once: true });
        });
    }

    /**
     * Race a promise against a timer. The timer is cleared once either side
     * settles.
     */
    public static async withTimeout<T>(
        operation: Promise<T>,
        timeoutMs: number,
        label = "operation"
    ): Promise<T> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () =>
                    reject(
                        new TimeoutError(
                            `${label} timed out after ${timeoutMs} ms`,
                            timeoutMs
                        )
                    ),
                timeoutMs
            );
        });

        try {
            return await Promise.race([operation, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Wait for a promise for at most `timeoutMs`. Returns false when the wait
     * ran out. A rejection counts as settled.
     */
    public static async settleWithin(
        operation: Promise<unknown>,
        timeoutMs: number
    ): Promise<boolean> {
        try {
            await this.withTimeout(operation, timeoutMs, "settle");
            return true;
        } catch (error) {
            return !(error instanceof TimeoutError);
        }
    }
}

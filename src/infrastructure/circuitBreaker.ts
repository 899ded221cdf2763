// src/infrastructure/circuitBreaker.ts
import type { ILogger } from "./loggerInterface.js";
import type {
    CircuitBreakerStats,
    ICircuitBreaker,
} from "./circuitBreakerInterface.js";

export enum CircuitState {
    CLOSED = "CLOSED",
    OPEN = "OPEN",
    HALF_OPEN = "HALF_OPEN",
}

/**
 * Trips after `threshold` consecutive failures and stays open for
 * `timeoutMs`, after which one trial request is let through (half-open). A
 * success closes it again; a failed trial reopens it.
 */
export class CircuitBreaker implements ICircuitBreaker {
    private consecutiveFailures = 0;
    private totalFailures = 0;
    private lastTripTime = 0;
    private state: CircuitState = CircuitState.CLOSED;

    constructor(
        private readonly threshold: number,
        private readonly timeoutMs: number,
        private readonly logger: ILogger,
        private readonly name = "CircuitBreaker"
    ) {}

    public canExecute(): boolean {
        if (
            this.state === CircuitState.OPEN &&
            Date.now() - this.lastTripTime >= this.timeoutMs
        ) {
            this.state = CircuitState.HALF_OPEN;
            this.logger.info(`[${this.name}] Circuit half-open, allowing a trial request`, {
                component: this.name,
                consecutiveFailures: this.consecutiveFailures,
            });
        }

        return this.state !== CircuitState.OPEN;
    }

    public recordError(): void {
        this.consecutiveFailures++;
        this.totalFailures++;

        const shouldTrip =
            this.state === CircuitState.HALF_OPEN ||
            (this.state === CircuitState.CLOSED &&
                this.consecutiveFailures >= this.threshold);

        if (shouldTrip) {
            this.state = CircuitState.OPEN;
            this.lastTripTime = Date.now();
            this.logger.error(
                `[${this.name}] Circuit tripped after ${this.consecutiveFailures} consecutive failures`,
                {
                    component: this.name,
                    timeoutMs: this.timeoutMs,
                }
            );
        }
    }

    public recordSuccess(): void {
        this.consecutiveFailures = 0;

        if (this.state !== CircuitState.CLOSED) {
            this.state = CircuitState.CLOSED;
            this.logger.info(`[${this.name}] Circuit closed after recovery`, {
                component: this.name,
            });
        }
    }

    public getStats(): CircuitBreakerStats {
        return {
            consecutiveFailures: this.consecutiveFailures,
            totalFailures: this.totalFailures,
            isOpen: this.state === CircuitState.OPEN,
            lastTripTime: this.lastTripTime,
        };
    }

    public getState(): CircuitState {
        return this.state;
    }
}

// src/infrastructure/circuitBreakerInterface.ts
export interface CircuitBreakerStats {
    consecutiveFailures: number;
    totalFailures: number;
    isOpen: boolean;
    lastTripTime: number;
}

export interface ICircuitBreaker {
    canExecute(): boolean;
    recordError(): void;
    recordSuccess(): void;
    getStats(): CircuitBreakerStats;
    getState(): string;
}

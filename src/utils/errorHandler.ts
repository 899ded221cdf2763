// src/utils/errorHandler.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";

export interface ErrorContext {
    operation: string;
    component: string;
    correlationId?: string;
    metadata?: Record<string, unknown>;
}

export interface ErrorHandlerConfig {
    logger: ILogger;
    throwOnError?: boolean;
    logLevel?: "error" | "warn" | "info";
    /** Errors matching this predicate propagate untouched and are not logged */
    rethrowIf?: (error: unknown) => boolean;
}

export class StandardError extends Error {
    constructor(
        message: string,
        public readonly context: ErrorContext,
        public readonly originalError?: Error
    ) {
        super(message);
        this.name = "StandardError";

        // Preserve stack trace from original error if available
        if (originalError?.stack) {
            this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
        }
    }
}

/**
 * A single telemetry read produced no usable data: the source threw, timed
 * out, returned nothing, or returned a malformed payload. Recoverable.
 */
export class TelemetryReadError extends StandardError {
    constructor(message: string, context: ErrorContext, originalError?: Error) {
        super(message, context, originalError);
        this.name = "TelemetryReadError";
    }
}

/**
 * Thrown by a telemetry source when the link to the arm is gone for good.
 * Ends monitoring.
 */
export class TelemetryDisconnectedError extends Error {
    constructor(message = "Telemetry source disconnected") {
        super(message);
        this.name = "TelemetryDisconnectedError";
    }
}

export class ReportWriteError extends StandardError {
    constructor(
        message: string,
        context: ErrorContext,
        public readonly failures: ReadonlyArray<{ sink: string; error: Error }>
    ) {
        super(message, context, failures[0]?.error);
        this.name = "ReportWriteError";
    }
}

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: readonly string[] = []
    ) {
        super(message);
        this.name = "ConfigError";
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

export class ErrorHandler {
    /**
     * Standardized error handling wrapper for sync operations
     */
    public static handleError<T>(
        operation: () => T,
        context: ErrorContext,
        config: ErrorHandlerConfig
    ): T | null {
        try {
            return operation();
        } catch (error) {
            return this.processError(error, context, config);
        }
    }

    /**
     * Standardized error handling wrapper for async operations
     */
    public static async handleErrorAsync<T>(
        operation: () => Promise<T>,
        context: ErrorContext,
        config: ErrorHandlerConfig
    ): Promise<T | null> {
        try {
            return await operation();
        } catch (error) {
            return this.processError(error, context, config);
        }
    }

    /**
     * Process error with standardized logging
     */
    private static processError(
        error: unknown,
        context: ErrorContext,
        config: ErrorHandlerConfig
    ): null {
        if (config.rethrowIf?.(error)) {
            throw error;
        }

        const errorMessage =
            error instanceof Error ? error.message : String(error);

        const logData = {
            operation: context.operation,
            component: context.component,
            error:
                error instanceof Error
                    ? {
                          name: error.name,
                          message: error.message,
                      }
                    : error,
            ...context.metadata,
        };

        const logLevel = config.logLevel ?? "error";
        config.logger[logLevel](
            `[${context.component}] ${context.operation} failed`,
            logData,
            context.correlationId
        );

        if (config.throwOnError) {
            throw new StandardError(
                `${context.operation} failed: ${errorMessage}`,
                context,
                error instanceof Error ? error : undefined
            );
        }

        return null;
    }
}

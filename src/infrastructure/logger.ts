// src/infrastructure/logger.ts
import { pino } from "pino";
import type {
    DestinationStream,
    Level,
    Logger as PinoLogger,
    LoggerOptions,
} from "pino";
import type { ILogger } from "./loggerInterface.js";

export type LogLevel = Extract<Level, "debug" | "info" | "warn" | "error">;

export interface LoggerSettings {
    /** Human-readable output through pino-pretty */
    pretty?: boolean;
    level?: LogLevel;
    /** Service name stamped on every line */
    name?: string;
}

/**
 * Structured logger for the contact monitor. JSON lines by default.
 */
export class Logger implements ILogger {
    private readonly correlationContext = new Map<string, string>();
    private readonly pino: PinoLogger;

    /**
     * @param destination Overrides stdout; pretty output is ignored when set.
     */
    constructor(settings: LoggerSettings = {}, destination?: DestinationStream) {
        const options: LoggerOptions = {
            level: settings.level ?? "info",
            messageKey: "message",
            base: { service: settings.name ?? "contact-monitor" },
            timestamp: pino.stdTimeFunctions.isoTime,
        };

        if (destination) {
            this.pino = pino(
                {
                    ...options,
                    formatters: {
                        level: (label) => ({ level: label.toUpperCase() }),
                    },
                },
                destination
            );
        } else if (settings.pretty) {
            this.pino = pino({
                ...options,
                transport: {
                    target: "pino-pretty",
                    options: { colorize: true, messageKey: "message" },
                },
            });
        } else {
            this.pino = pino({
                ...options,
                formatters: {
                    level: (label) => ({ level: label.toUpperCase() }),
                },
            });
        }
    }

    public info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("info", message, context, correlationId);
    }

    public error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("error", message, context, correlationId);
    }

    public warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("warn", message, context, correlationId);
    }

    public debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("debug", message, context, correlationId);
    }

    public isDebugEnabled(): boolean {
        return this.pino.isLevelEnabled("debug");
    }

    private log(
        level: LogLevel,
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        const correlationLabel =
            correlationId !== undefined
                ? this.correlationContext.get(correlationId)
                : undefined;

        this.pino[level](
            {
                ...context,
                ...(correlationId !== undefined ? { correlationId } : {}),
                ...(correlationLabel !== undefined
                    ? { correlationContext: correlationLabel }
                    : {}),
            },
            message
        );
    }

    /**
     * Attach a label to a correlation id; it is logged with every line
     * carrying that id.
     */
    public setCorrelationId(id: string, context: string): void {
        this.correlationContext.set(id, context);
    }

    public removeCorrelationId(id: string): void {
        this.correlationContext.delete(id);
    }
}

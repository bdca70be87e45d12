// src/infrastructure/logger.ts
import util from "node:util";
import type { ILogger, LogLevel } from "./loggerInterface.js";
import { LOG_LEVELS } from "./loggerInterface.js";

/**
 * Structured logger for the engine. One JSON object per line, or an
 * inspected context in pretty mode.
 */
export class Logger implements ILogger {
    private readonly pretty: boolean;
    private readonly minLevel: number;

    constructor(pretty = false, level: LogLevel = "info") {
        this.pretty = pretty;
        this.minLevel = LOG_LEVELS.indexOf(level);
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
        return this.minLevel <= LOG_LEVELS.indexOf("debug");
    }

    private log(
        level: LogLevel,
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        if (LOG_LEVELS.indexOf(level) < this.minLevel) return;

        const label = level.toUpperCase();
        if (this.pretty) {
            console.log(
                `[${label}] ${message}`,
                context
                    ? util.inspect(context, {
                          colors: true,
                          depth: null,
                          compact: false,
                      })
                    : ""
            );
            return;
        }

        console.log(
            JSON.stringify({
                timestamp: new Date().toISOString(),
                level: label,
                message,
                correlationId,
                ...context,
            })
        );
    }
}

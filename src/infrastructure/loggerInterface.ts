export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

/**
 * Common interface for all logger implementations
 */
export interface ILogger {
    info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void;

    error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void;

    warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void;

    debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void;

    isDebugEnabled(): boolean;
}

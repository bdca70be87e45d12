// src/core/errors.ts

/**
 * Custom error types for the engine. Raised only at startup; the tick path
 * itself never throws.
 */

export class ConfigValidationError extends Error {
    constructor(
        message: string,
        public readonly issues: readonly string[] = []
    ) {
        super(message);
        this.name = "ConfigValidationError";
    }
}

export class ModelWeightsError extends Error {
    constructor(
        message: string,
        public readonly context: Record<string, unknown>,
        public readonly originalError?: Error
    ) {
        super(message);
        this.name = "ModelWeightsError";

        if (originalError?.stack) {
            this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
        }
    }
}

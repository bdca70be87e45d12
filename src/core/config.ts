// src/core/config.ts
import dotenv from "dotenv";
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigValidationError } from "./errors.js";
import { PRESET_NAMES } from "../indicators/thresholdPresets.js";
import { LOG_LEVELS } from "../infrastructure/loggerInterface.js";
import { U8_MAX } from "../utils/fixedPoint.js";

export const EngineConfigSchema = z.object({
    preset: z.enum(PRESET_NAMES),
    thresholdMode: z.enum(["preset", "adaptive"]),
    // Volume average must exceed this before VOLUME_SURGE can fire
    volumeFloor: z.number().int().min(0).max(4095),
    // Confidence handed to the circuit breaker for rule-path triggers
    ruleConfidence: z.number().int().min(1).max(U8_MAX),
    modelDir: z.string().min(1),
    logLevel: z.enum(LOG_LEVELS),
    prettyLogs: z.boolean(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Apply the supported environment overrides to a raw config object.
 */
function withEnvOverrides(
    raw: Record<string, unknown>,
    env: ConfigEnv
): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...raw };
    if (env.ENGINE_PRESET) merged.preset = env.ENGINE_PRESET.toUpperCase();
    if (env.ENGINE_MODEL_DIR) merged.modelDir = env.ENGINE_MODEL_DIR;
    if (env.LOG_LEVEL) merged.logLevel = env.LOG_LEVEL.toLowerCase();
    if (env.LOG_PRETTY) merged.prettyLogs = env.LOG_PRETTY === "true";
    return merged;
}

/**
 * Validate raw configuration, collecting every zod issue into one error.
 */
export function parseConfig(raw: unknown, env: ConfigEnv = {}): EngineConfig {
    if (!isRecord(raw)) {
        throw new ConfigValidationError("Configuration must be a JSON object");
    }

    const result = EngineConfigSchema.safeParse(withEnvOverrides(raw, env));
    if (!result.success) {
        const issues = result.error.errors.map(
            (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
        );
        throw new ConfigValidationError(
            `Invalid configuration: ${issues.join("; ")}`,
            issues
        );
    }
    return result.data;
}

/**
 * Read `config.json` (or `path`), then apply `.env` / process overrides.
 */
export function loadConfig(
    path = resolve(process.cwd(), "config.json"),
    env: ConfigEnv = process.env
): EngineConfig {
    dotenv.config();

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new ConfigValidationError(
            `Cannot read configuration from ${path}: ${
                error instanceof Error ? error.message : String(error)
            }`
        );
    }
    return parseConfig(raw, env);
}
